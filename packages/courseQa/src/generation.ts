// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    ChatMessage,
    CompleteUsageStatsCallback,
    FunctionCallingJsonSchema,
    ToolCallingChatModel,
    ToolCallRequest,
} from "@course-qa/aiclient";
import { Result, success } from "typechat";

export type GenerationRequest = {
    /**
     * The conversation so far: system prompt, the query, and any tool calls and results
     */
    messages: ChatMessage[];
    /**
     * Tools the service may ask for. Empty when the service must answer directly
     */
    tools: FunctionCallingJsonSchema[];
};

/**
 * The service either answers, or asks for tool calls before it can
 */
export type GenerationResponse =
    | { type: "answer"; text: string }
    | {
          type: "toolCalls";
          text?: string | undefined;
          calls: ToolCallRequest[];
      };

export interface GenerationService {
    generate(
        request: GenerationRequest,
        signal?: AbortSignal,
    ): Promise<Result<GenerationResponse>>;
}

/**
 * A generation service over a chat model with function calling
 * @param model
 * @param usageCallback optional: receives token usage of every call
 * @returns
 */
export function createGenerationService(
    model: ToolCallingChatModel,
    usageCallback?: CompleteUsageStatsCallback,
): GenerationService {
    return {
        generate,
    };

    async function generate(
        request: GenerationRequest,
        signal?: AbortSignal,
    ): Promise<Result<GenerationResponse>> {
        const result = await model.complete(
            request.messages,
            {
                tools: request.tools.length > 0 ? request.tools : undefined,
                signal,
            },
            usageCallback,
        );
        if (!result.success) {
            return result;
        }
        const turn = result.data;
        return turn.type === "toolCalls"
            ? success<GenerationResponse>({
                  type: "toolCalls",
                  text: turn.text,
                  calls: turn.calls,
              })
            : success<GenerationResponse>({ type: "answer", text: turn.text });
    }
}
