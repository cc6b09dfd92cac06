// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    ChatMessage,
    EnvRecord,
    FunctionCallingJsonSchema,
    openai,
    TextEmbeddingModel,
} from "@course-qa/aiclient";
import registerDebug from "debug";
import fs from "node:fs";
import path from "node:path";
import { chunkCourseDocument } from "./courseDocument.js";
import { CourseIndex, createCourseIndex } from "./courseIndex.js";
import { CourseSearch } from "./courseSearch.js";
import {
    OrchestrationError,
    ParseError,
    ServiceUnavailableError,
    throwIfCancelled,
} from "./errors.js";
import {
    createGenerationService,
    GenerationResponse,
    GenerationService,
} from "./generation.js";
import { CourseMetadata, SourceAttribution } from "./interfaces.js";
import { KeyedLock } from "./keyedLock.js";
import { CourseNameResolver } from "./nameResolver.js";
import { createSystemPrompt, fallbackAnswer } from "./prompts.js";
import { InMemorySessionStore, SessionStore } from "./sessionHistory.js";
import {
    courseQaSettingsFromEnv,
    createCourseQaSettings,
    CourseQaSettings,
} from "./settings.js";
import { createCourseTools, ToolRegistry } from "./tools.js";

const debugAssistant = registerDebug("course-qa:assistant");
const debugError = registerDebug("course-qa:assistant:error");

export type CourseAssistantOptions = {
    embeddingModel: TextEmbeddingModel;
    generation: GenerationService;
    settings?: CourseQaSettings | undefined;
    /**
     * Defaults to an in-memory store holding settings.maxHistory exchanges per session
     */
    sessions?: SessionStore | undefined;
};

export type QueryOptions = {
    signal?: AbortSignal | undefined;
};

export type QueryResponse = {
    answer: string;
    /**
     * Where the content used to answer came from. Empty if no tools were used
     */
    sources: SourceAttribution[];
    sessionId: string;
};

export type FolderIngestOptions = {
    /**
     * Remove every indexed course first
     */
    clearExisting?: boolean | undefined;
};

export type FolderIngestResult = {
    /**
     * Titles of the courses added
     */
    courses: string[];
    /**
     * Chunks added
     */
    chunks: number;
    /**
     * Titles already indexed, and left as they were
     */
    skipped: string[];
    failed: { fileName: string; message: string }[];
};

export type CourseAnalytics = {
    totalCourses: number;
    courseTitles: string[];
};

/**
 * Answers questions about ingested courses.
 * Each query is one turn: the generation service either answers directly, or asks for tool
 * calls (course search, course outline) whose results are sent back before it answers.
 * Tool rounds per turn are bounded by settings.maxToolRounds
 */
export class CourseAssistant {
    public readonly settings: CourseQaSettings;
    public readonly index: CourseIndex;
    public readonly resolver: CourseNameResolver;
    public readonly search: CourseSearch;
    public readonly tools: ToolRegistry;
    public readonly sessions: SessionStore;
    public readonly generation: GenerationService;
    private sessionLock = new KeyedLock();

    constructor(options: CourseAssistantOptions) {
        this.settings = options.settings ?? createCourseQaSettings();
        this.index = createCourseIndex(options.embeddingModel);
        this.resolver = new CourseNameResolver(
            this.index,
            this.settings.minCourseNameScore,
        );
        this.search = new CourseSearch(
            this.index,
            this.resolver,
            this.settings.maxResults,
        );
        this.tools = createCourseTools(this.search, this.resolver);
        this.sessions =
            options.sessions ??
            new InMemorySessionStore(this.settings.maxHistory);
        this.generation = options.generation;
    }

    /**
     * Answer a query
     * @param queryText
     * @param sessionId conversation to continue. A new session is started if not supplied
     * @param options
     * @returns the answer, its sources, and the session id
     */
    public async query(
        queryText: string,
        sessionId?: string,
        options?: QueryOptions,
    ): Promise<QueryResponse> {
        const signal = options?.signal;
        sessionId ??= this.sessions.createSessionId();
        throwIfCancelled(signal);

        const history = await this.sessions.get(sessionId);
        const messages: ChatMessage[] = [
            { role: "system", content: createSystemPrompt(history) },
            { role: "user", content: queryText },
        ];
        const turn = this.tools.beginTurn(signal);
        let answer: string | undefined;
        let toolRounds = 0;
        while (answer === undefined) {
            const toolsAllowed = toolRounds < this.settings.maxToolRounds;
            const response = await this.generate(
                messages,
                toolsAllowed ? this.tools.definitions : [],
                signal,
            );
            switch (response.type) {
                case "answer":
                    answer = response.text;
                    break;
                case "toolCalls":
                    if (!toolsAllowed) {
                        const e = new OrchestrationError(
                            `Tool calls requested after ${toolRounds} tool rounds`,
                        );
                        debugError(e.message);
                        answer = response.text || fallbackAnswer;
                        break;
                    }
                    messages.push({
                        role: "assistant",
                        content: response.text ?? null,
                        toolCalls: response.calls,
                    });
                    for (const call of response.calls) {
                        const result = await turn.execute(
                            call.name,
                            call.arguments,
                        );
                        throwIfCancelled(signal);
                        messages.push({
                            role: "tool",
                            toolCallId: call.id,
                            content: result,
                        });
                    }
                    ++toolRounds;
                    break;
            }
        }
        throwIfCancelled(signal);

        const exchange = { query: queryText, answer };
        const id = sessionId;
        await this.sessionLock.runExclusive(id, () =>
            this.sessions.append(id, exchange),
        );
        debugAssistant(
            `${id}: ${toolRounds} tool rounds, ${turn.callCount} tool calls`,
        );
        return { answer, sources: turn.sources, sessionId: id };
    }

    /**
     * Add a course document to the index, replacing any course with the same title
     * @param documentText
     * @param sourceName used in error messages
     * @returns the course's metadata. Throws ParseError if the document is malformed
     */
    public async ingest(
        documentText: string,
        sourceName?: string,
    ): Promise<CourseMetadata> {
        const { metadata, chunks } = chunkCourseDocument(
            documentText,
            this.settings,
            sourceName,
        );
        await this.index.addCourse(metadata, chunks);
        return metadata;
    }

    /**
     * Ingest every .txt course document in a folder, in file name order.
     * Courses already indexed are skipped. A document that fails to parse is reported
     * in the result; the others are still ingested
     * @param folderPath
     * @param options
     */
    public async ingestFolder(
        folderPath: string,
        options?: FolderIngestOptions,
    ): Promise<FolderIngestResult> {
        if (options?.clearExisting) {
            await this.index.clear();
        }
        const fileNames = (await fs.promises.readdir(folderPath))
            .filter((f) => path.extname(f).toLowerCase() === ".txt")
            .sort();
        const result: FolderIngestResult = {
            courses: [],
            chunks: 0,
            skipped: [],
            failed: [],
        };
        for (const fileName of fileNames) {
            const documentText = await fs.promises.readFile(
                path.join(folderPath, fileName),
                "utf-8",
            );
            try {
                const { metadata, chunks } = chunkCourseDocument(
                    documentText,
                    this.settings,
                    fileName,
                );
                if (this.index.hasCourse(metadata.title)) {
                    result.skipped.push(metadata.title);
                    continue;
                }
                await this.index.addCourse(metadata, chunks);
                result.courses.push(metadata.title);
                result.chunks += chunks.length;
            } catch (e) {
                if (e instanceof ParseError) {
                    debugError(e.message);
                    result.failed.push({ fileName, message: e.message });
                    continue;
                }
                throw e;
            }
        }
        debugAssistant(
            `${folderPath}: ${result.courses.length} courses, ${result.chunks} chunks, ${result.skipped.length} skipped, ${result.failed.length} failed`,
        );
        return result;
    }

    public getCourseAnalytics(): CourseAnalytics {
        return {
            totalCourses: this.index.getCourseCount(),
            courseTitles: this.index.getCourseTitles(),
        };
    }

    private async generate(
        messages: ChatMessage[],
        tools: FunctionCallingJsonSchema[],
        signal?: AbortSignal,
    ): Promise<GenerationResponse> {
        throwIfCancelled(signal);
        const result = await this.generation.generate(
            { messages: [...messages], tools },
            signal,
        );
        throwIfCancelled(signal);
        if (!result.success) {
            throw new ServiceUnavailableError(
                "Generation service",
                result.message,
            );
        }
        return result.data;
    }
}

/**
 * Create a course assistant over OpenAI models, configured from environment variables
 * @param env defaults to process.env
 * @returns
 */
export function createCourseAssistantFromEnv(
    env?: EnvRecord,
): CourseAssistant {
    env ??= process.env;
    const chatModel = openai.createChatModel(
        openai.apiSettingsFromEnv(openai.ModelType.Chat, env),
    );
    const embeddingModel = openai.createEmbeddingModel(
        openai.apiSettingsFromEnv(openai.ModelType.Embedding, env),
    );
    return new CourseAssistant({
        embeddingModel,
        generation: createGenerationService(chatModel),
        settings: courseQaSettingsFromEnv(env),
    });
}
