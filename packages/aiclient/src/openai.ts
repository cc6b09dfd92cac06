// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    ChatCompletionTurn,
    ChatMessage,
    CompleteOptions,
    CompleteUsageStatsCallback,
    CompletionSettings,
    CompletionUsageStats,
    TextEmbeddingModel,
    ToolCallRequest,
    ToolCallingChatModel,
} from "./models.js";
import { callJsonApi, FetchThrottler } from "./restClient.js";
import { EnvRecord, getEnvSetting, getIntFromEnv } from "./common.js";
import { Result, success, error } from "typechat";
import { priorityQueue } from "async";
import registerDebug from "debug";

const debugOpenAI = registerDebug("aiclient:openai");

export enum ModelType {
    Chat = "chat",
    Embedding = "embedding",
}

/**
 * Environment variables used to configure OpenAI clients
 */
export enum EnvVars {
    OPENAI_API_KEY = "OPENAI_API_KEY",
    OPENAI_ENDPOINT = "OPENAI_ENDPOINT",
    OPENAI_ENDPOINT_EMBEDDING = "OPENAI_ENDPOINT_EMBEDDING",
    OPENAI_ORGANIZATION = "OPENAI_ORGANIZATION",
    OPENAI_MODEL = "OPENAI_MODEL",
    OPENAI_MODEL_EMBEDDING = "OPENAI_MODEL_EMBEDDING",
    OPENAI_MAX_CONCURRENCY = "OPENAI_MAX_CONCURRENCY",
    OPENAI_MAX_RETRY_ATTEMPTS = "OPENAI_MAX_RETRY_ATTEMPTS",
    OPENAI_TIMEOUT_MS = "OPENAI_TIMEOUT_MS",
}

/**
 * Settings used by OpenAI clients
 */
export type ApiSettings = {
    modelType: ModelType;
    endpoint: string;
    apiKey: string;
    modelName: string;
    organization?: string | undefined;
    maxRetryAttempts?: number | undefined;
    retryPauseMs?: number | undefined;
    timeout?: number | undefined;
    maxConcurrency?: number | undefined;
    throttler?: FetchThrottler | undefined;
};

const defaultEndpoints: Record<ModelType, string> = {
    [ModelType.Chat]: "https://api.openai.com/v1/chat/completions",
    [ModelType.Embedding]: "https://api.openai.com/v1/embeddings",
};

const defaultModelNames: Record<ModelType, string> = {
    [ModelType.Chat]: "gpt-4o-mini",
    [ModelType.Embedding]: "text-embedding-3-small",
};

/**
 * Initialize settings from environment variables
 * @param modelType
 * @param env Environment variables or arbitrary Record
 * @param endpointName optional suffix to add to env variable names. Lets you target different backends
 * @returns
 */
export function apiSettingsFromEnv(
    modelType: ModelType = ModelType.Chat,
    env?: EnvRecord,
    endpointName?: string,
): ApiSettings {
    env ??= process.env;
    const isChat = modelType === ModelType.Chat;
    const organization = getEnvSetting(
        env,
        EnvVars.OPENAI_ORGANIZATION,
        endpointName,
        "",
    );
    return {
        modelType,
        apiKey: getEnvSetting(env, EnvVars.OPENAI_API_KEY, endpointName),
        endpoint: getEnvSetting(
            env,
            isChat ? EnvVars.OPENAI_ENDPOINT : EnvVars.OPENAI_ENDPOINT_EMBEDDING,
            endpointName,
            defaultEndpoints[modelType],
        ),
        modelName: getEnvSetting(
            env,
            isChat ? EnvVars.OPENAI_MODEL : EnvVars.OPENAI_MODEL_EMBEDDING,
            endpointName,
            defaultModelNames[modelType],
        ),
        organization: organization || undefined,
        maxConcurrency: getIntFromEnv(
            env,
            EnvVars.OPENAI_MAX_CONCURRENCY,
            endpointName,
        ),
        maxRetryAttempts: getIntFromEnv(
            env,
            EnvVars.OPENAI_MAX_RETRY_ATTEMPTS,
            endpointName,
        ),
        timeout: getIntFromEnv(env, EnvVars.OPENAI_TIMEOUT_MS, endpointName),
    };
}

/**
 * Limit the number of concurrent requests to an endpoint
 * Uses a priority queue, so callers can jump the line
 */
export function createThrottler(maxConcurrency: number): FetchThrottler {
    const q = priorityQueue<() => Promise<Response>>(
        async (task) => task(),
        maxConcurrency,
    );
    return (fn: () => Promise<Response>) => q.push<Response>(fn, 0);
}

function createApiHeaders(settings: ApiSettings): Record<string, string> {
    const headers: Record<string, string> = {
        Authorization: `Bearer ${settings.apiKey}`,
    };
    if (settings.organization) {
        headers["OpenAI-Organization"] = settings.organization;
    }
    return headers;
}

function withThrottler(settings: ApiSettings): ApiSettings {
    if (settings.throttler || settings.maxConcurrency === undefined) {
        return settings;
    }
    return {
        ...settings,
        throttler: createThrottler(settings.maxConcurrency),
    };
}

// NOTE: these are not complete
type ToolCall = {
    id: string;
    type: "function";
    function: {
        name: string;
        arguments: string;
    };
};

type ChatCompletion = {
    id: string;
    choices: {
        message?: {
            role: "assistant";
            content?: string | null;
            tool_calls?: ToolCall[];
        };
        finish_reason?: string;
    }[];
    usage?: CompletionUsageStats;
};

type WireMessage =
    | { role: "system" | "user"; content: string }
    | { role: "assistant"; content: string | null; tool_calls?: ToolCall[] }
    | { role: "tool"; tool_call_id: string; content: string };

function toWireMessage(message: ChatMessage): WireMessage {
    switch (message.role) {
        case "system":
        case "user":
            return { role: message.role, content: message.content };
        case "assistant":
            return message.toolCalls && message.toolCalls.length > 0
                ? {
                      role: "assistant",
                      content: message.content,
                      tool_calls: message.toolCalls.map((c) => ({
                          id: c.id,
                          type: "function" as const,
                          function: { name: c.name, arguments: c.arguments },
                      })),
                  }
                : { role: "assistant", content: message.content };
        case "tool":
            return {
                role: "tool",
                tool_call_id: message.toolCallId,
                content: message.content,
            };
    }
}

function isChatCompletion(data: unknown): data is ChatCompletion {
    return (
        typeof data === "object" &&
        data !== null &&
        "choices" in data &&
        Array.isArray(data.choices)
    );
}

/**
 * Create a client for an Open AI compatible chat model that supports function calling
 *  createChatModel()
 *     Initialize using standard Env variables
 *  createChatModel("GPT_4_O")
 *     Use the name as a SUFFIX for standard Env variable names
 *  createChatModel(apiSettings)
 *     You supply API settings
 * @param endpoint The name of the API endpoint OR explicit API settings with which to create a client
 * @param completionSettings Completion settings for the model
 * @returns ToolCallingChatModel
 */
export function createChatModel(
    endpoint?: string | ApiSettings,
    completionSettings?: CompletionSettings,
): ToolCallingChatModel {
    const settings = withThrottler(
        typeof endpoint === "object"
            ? endpoint
            : apiSettingsFromEnv(ModelType.Chat, undefined, endpoint),
    );
    const modelSettings: CompletionSettings = {
        temperature: 0,
        ...completionSettings,
    };
    const model: ToolCallingChatModel = {
        completionSettings: modelSettings,
        complete,
    };
    return model;

    async function complete(
        messages: ChatMessage[],
        options?: CompleteOptions,
        usageCallback?: CompleteUsageStatsCallback,
    ): Promise<Result<ChatCompletionTurn>> {
        const params: Record<string, unknown> = {
            model: settings.modelName,
            messages: messages.map(toWireMessage),
            ...modelSettings,
        };
        const tools = options?.tools;
        if (tools && tools.length > 0) {
            params.tools = tools;
            params.tool_choice = options?.toolChoice ?? "auto";
        }
        const result = await callJsonApi(
            createApiHeaders(settings),
            settings.endpoint,
            params,
            {
                retryMaxAttempts: settings.maxRetryAttempts,
                retryPauseMs: settings.retryPauseMs,
                timeout: settings.timeout,
                throttler: settings.throttler,
                signal: options?.signal,
            },
        );
        if (!result.success) {
            return result;
        }
        const data = result.data;
        if (!isChatCompletion(data) || data.choices.length === 0) {
            return error("No choices returned");
        }
        if (data.usage) {
            usageCallback?.(data.usage);
        }
        const message = data.choices[0].message;
        const text = message?.content ?? "";
        const toolCalls = message?.tool_calls;
        if (toolCalls && toolCalls.length > 0) {
            const calls: ToolCallRequest[] = [];
            for (const c of toolCalls) {
                if (c.type !== "function") {
                    return error("Invalid tool call type");
                }
                calls.push({
                    id: c.id,
                    name: c.function.name,
                    arguments: c.function.arguments,
                });
            }
            debugOpenAI(`${calls.length} tool call(s) requested`);
            const turn: ChatCompletionTurn = {
                type: "toolCalls",
                text: text || undefined,
                calls,
            };
            return success(turn);
        }
        const turn: ChatCompletionTurn = { type: "text", text };
        return success(turn);
    }
}

type EmbeddingData = { data: { embedding: number[] }[] };

function isEmbeddingData(data: unknown): data is EmbeddingData {
    return (
        typeof data === "object" &&
        data !== null &&
        "data" in data &&
        Array.isArray(data.data)
    );
}

/**
 * Create a client for the OpenAI embeddings service
 * @param apiSettings: settings to use to create the client
 * @param dimensions (optional) text-embedding-3 and later models allow variable length embeddings
 */
export function createEmbeddingModel(
    apiSettings?: ApiSettings,
    dimensions?: number,
): TextEmbeddingModel {
    // https://platform.openai.com/docs/api-reference/embeddings/create#embeddings-create-input
    const maxBatchSize = 2048;
    const settings = withThrottler(
        apiSettings ?? apiSettingsFromEnv(ModelType.Embedding),
    );
    const defaultParams: Record<string, unknown> = {
        model: settings.modelName,
    };
    if (dimensions && dimensions > 0) {
        defaultParams.dimensions = dimensions;
    }
    const model: TextEmbeddingModel = {
        generateEmbedding,
        generateEmbeddingBatch,
        maxBatchSize,
    };
    return model;

    async function generateEmbedding(
        input: string,
        signal?: AbortSignal,
    ): Promise<Result<number[]>> {
        if (!input) {
            return error("Empty input");
        }
        const result = await callApi(input, signal);
        if (!result.success) {
            return result;
        }
        return result.data.length > 0
            ? success(result.data[0])
            : error("No embedding returned");
    }

    async function generateEmbeddingBatch(
        input: string[],
        signal?: AbortSignal,
    ): Promise<Result<number[][]>> {
        if (input.length === 0) {
            return error("Empty input array");
        }
        if (input.length > maxBatchSize) {
            return error(`Batch size must be < ${maxBatchSize}`);
        }
        return callApi(input, signal);
    }

    async function callApi(
        input: string | string[],
        signal?: AbortSignal,
    ): Promise<Result<number[][]>> {
        const result = await callJsonApi(
            createApiHeaders(settings),
            settings.endpoint,
            { ...defaultParams, input },
            {
                retryMaxAttempts: settings.maxRetryAttempts,
                retryPauseMs: settings.retryPauseMs,
                timeout: settings.timeout,
                throttler: settings.throttler,
                signal,
            },
        );
        if (!result.success) {
            return result;
        }
        if (!isEmbeddingData(result.data)) {
            return error("Invalid embedding response");
        }
        return success(result.data.data.map((d) => d.embedding));
    }
}
