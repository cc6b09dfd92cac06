// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Exchange } from "./interfaces.js";
import { formatHistory } from "./sessionHistory.js";

export const systemPrompt = `You are an assistant that answers questions about course materials.
- Use the course outline tool for questions about a course's structure, link or lesson list.
- Use the content search tool only for questions about specific course content. Search at most once per query.
- Answer general knowledge questions directly, without tools.
- If a search returns nothing relevant, say so plainly.
- Answer directly and concisely. Do not describe your search process or mention the tools.`;

/**
 * The system prompt, with the session's previous exchanges appended
 * @param history
 * @returns
 */
export function createSystemPrompt(history: Exchange[]): string {
    return history.length > 0
        ? `${systemPrompt}\n\nPrevious conversation:\n${formatHistory(history)}`
        : systemPrompt;
}

export const fallbackAnswer =
    "I was not able to complete an answer to that question.";
