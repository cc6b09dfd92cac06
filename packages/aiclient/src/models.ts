// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Result } from "typechat";

/**
 * Settings sent with every chat completion request
 * https://platform.openai.com/docs/api-reference/chat/create
 */
export type CompletionSettings = {
    temperature?: number;
    max_tokens?: number;
    // Use fixed seed parameter to improve determinism
    seed?: number;
    top_p?: number;
};

/**
 * JSON schema of a function the model may call
 */
export type JsonSchemaObject = {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
    additionalProperties?: boolean;
};

export type FunctionCallingJsonSchema = {
    type: "function";
    function: {
        name: string;
        description?: string;
        parameters: JsonSchemaObject;
    };
};

/**
 * A function call requested by the model.
 * Arguments are left as the raw JSON text the model produced: callers validate them.
 */
export type ToolCallRequest = {
    id: string;
    name: string;
    arguments: string;
};

export type ChatMessage =
    | { role: "system"; content: string }
    | { role: "user"; content: string }
    | {
          role: "assistant";
          content: string | null;
          toolCalls?: ToolCallRequest[] | undefined;
      }
    | { role: "tool"; toolCallId: string; content: string };

/**
 * What the model produced for one completion call
 */
export type ChatCompletionTurn =
    | { type: "text"; text: string }
    | { type: "toolCalls"; text?: string | undefined; calls: ToolCallRequest[] };

export type ToolChoice = "auto" | "none" | "required";

export type CompleteOptions = {
    tools?: FunctionCallingJsonSchema[] | undefined;
    toolChoice?: ToolChoice | undefined;
    signal?: AbortSignal | undefined;
};

// Statistics returned by the OAI api
export type CompletionUsageStats = {
    completion_tokens: number;
    prompt_tokens: number;
    total_tokens: number;
};

export type CompleteUsageStatsCallback = (usage: CompletionUsageStats) => void;

/**
 * A chat model that can answer directly or ask for function calls
 */
export interface ToolCallingChatModel {
    readonly completionSettings: CompletionSettings;
    /**
     * Complete the conversation
     * @param messages conversation so far, including tool results
     * @param options tools the model may call, and an optional abort signal
     */
    complete(
        messages: ChatMessage[],
        options?: CompleteOptions,
        usageCallback?: CompleteUsageStatsCallback,
    ): Promise<Result<ChatCompletionTurn>>;
}

/**
 * A model that returns embeddings for the input K
 */
export interface EmbeddingModel<K> {
    generateEmbedding(
        input: K,
        signal?: AbortSignal,
    ): Promise<Result<number[]>>;
}

export interface TextEmbeddingModel extends EmbeddingModel<string> {
    /**
     * Optional: not all models/apis support batching
     */
    generateEmbeddingBatch?(
        inputs: string[],
        signal?: AbortSignal,
    ): Promise<Result<number[][]>>;
    /**
     * If no batching, maxBatchSize should be 1
     */
    readonly maxBatchSize: number;
}
