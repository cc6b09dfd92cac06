// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    FunctionCallingJsonSchema,
    JsonSchemaObject,
} from "@course-qa/aiclient";
import registerDebug from "debug";
import { z } from "zod";
import { CourseIndex } from "./courseIndex.js";
import { CourseSearch, formatSearchResult } from "./courseSearch.js";
import { OrchestrationError, throwIfCancelled } from "./errors.js";
import { CourseMetadata, SourceAttribution } from "./interfaces.js";
import { CourseNameResolver } from "./nameResolver.js";

const debugTools = registerDebug("course-qa:tools");

export type ToolOutput = {
    /**
     * Sent back to the generation service as the tool's result
     */
    text: string;
    sources: SourceAttribution[];
};

/**
 * A function the generation service can ask us to call
 */
export interface CourseTool<TArgs> {
    readonly name: string;
    readonly description: string;
    /**
     * JSON schema of the arguments, as sent to the generation service
     */
    readonly parameters: JsonSchemaObject;
    /**
     * Validates the arguments the generation service sends back
     */
    readonly argsSchema: z.ZodType<TArgs>;
    execute(args: TArgs, signal?: AbortSignal): Promise<ToolOutput>;
}

type RegisteredTool = {
    definition: FunctionCallingJsonSchema;
    run(args: unknown, signal?: AbortSignal): Promise<ToolOutput>;
};

/**
 * Tools available to the generation service, by name
 */
export class ToolRegistry {
    private tools = new Map<string, RegisteredTool>();

    public register<TArgs>(tool: CourseTool<TArgs>): void {
        if (this.tools.has(tool.name)) {
            throw new Error(`Tool ${tool.name} is already registered`);
        }
        this.tools.set(tool.name, {
            definition: {
                type: "function",
                function: {
                    name: tool.name,
                    description: tool.description,
                    parameters: tool.parameters,
                },
            },
            run: async (args: unknown, signal?: AbortSignal) => {
                const parsed = tool.argsSchema.safeParse(args);
                if (!parsed.success) {
                    throw new OrchestrationError(
                        `Invalid arguments for ${tool.name}: ${formatIssues(parsed.error)}`,
                    );
                }
                return tool.execute(parsed.data, signal);
            },
        });
    }

    public has(name: string): boolean {
        return this.tools.has(name);
    }

    public get definitions(): FunctionCallingJsonSchema[] {
        return [...this.tools.values()].map((t) => t.definition);
    }

    /**
     * Start collecting the tool calls of one query turn
     * @param signal cancels the turn's tool calls, including their embedding requests
     */
    public beginTurn(signal?: AbortSignal): ToolTurn {
        return new ToolTurn(this.tools, signal);
    }
}

/**
 * Executes the tool calls of one query turn, and collects the sources they retrieved.
 * Each turn has its own ToolTurn, so concurrent turns never see each other's sources
 */
export class ToolTurn {
    private sourceList: SourceAttribution[] = [];
    private sourceKeys = new Set<string>();
    private calls = 0;

    constructor(
        private tools: ReadonlyMap<string, RegisteredTool>,
        private signal?: AbortSignal,
    ) {}

    /**
     * Sources of every call so far, in first-seen order, without duplicates
     */
    public get sources(): SourceAttribution[] {
        return [...this.sourceList];
    }

    public get callCount(): number {
        return this.calls;
    }

    /**
     * Execute a tool call.
     * Unknown tools and invalid arguments are reported in the returned text; service failures are thrown
     * @param toolName
     * @param rawArguments arguments, as JSON text
     * @returns text to send back to the generation service
     */
    public async execute(
        toolName: string,
        rawArguments: string,
    ): Promise<string> {
        throwIfCancelled(this.signal);
        ++this.calls;
        try {
            const tool = this.tools.get(toolName);
            if (tool === undefined) {
                throw new OrchestrationError(`Unknown tool ${toolName}`);
            }
            const output = await tool.run(
                parseArguments(toolName, rawArguments),
                this.signal,
            );
            this.addSources(output.sources);
            debugTools(
                `${toolName}(${rawArguments}): ${output.sources.length} sources`,
            );
            return output.text;
        } catch (e) {
            if (e instanceof OrchestrationError) {
                debugTools(e.message);
                return `Error: ${e.message}`;
            }
            throw e;
        }
    }

    private addSources(sources: SourceAttribution[]): void {
        for (const source of sources) {
            const key = JSON.stringify([
                source.courseTitle,
                source.lessonNumber ?? null,
                source.link ?? null,
            ]);
            if (!this.sourceKeys.has(key)) {
                this.sourceKeys.add(key);
                this.sourceList.push(source);
            }
        }
    }
}

function parseArguments(toolName: string, rawArguments: string): unknown {
    if (rawArguments.trim().length === 0) {
        return {};
    }
    try {
        return JSON.parse(rawArguments);
    } catch (e) {
        throw new OrchestrationError(
            `Invalid arguments for ${toolName}: ${e instanceof Error ? e.message : String(e)}`,
        );
    }
}

function formatIssues(err: z.ZodError): string {
    return err.issues
        .map((i) =>
            i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
        )
        .join("; ");
}

//-------------------
//
// SEARCH TOOL
//
//-------------------

export const searchToolName = "search_course_content";

function searchArgsSchema() {
    return {
        query: z.string().min(1),
        course_name: z.string().nullish(),
        lesson_number: z.number().int().nonnegative().nullish(),
    };
}
const SearchArgsSchema = z.object(searchArgsSchema());
export type SearchArgs = z.infer<typeof SearchArgsSchema>;

export function createSearchTool(search: CourseSearch): CourseTool<SearchArgs> {
    return {
        name: searchToolName,
        description:
            "Search course materials with smart course name matching and lesson filtering",
        parameters: {
            type: "object",
            properties: {
                query: {
                    type: "string",
                    description: "What to search for in the course content",
                },
                course_name: {
                    type: "string",
                    description:
                        "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
                },
                lesson_number: {
                    type: "integer",
                    description:
                        "Specific lesson number to search within (e.g. 1, 2, 3)",
                },
            },
            required: ["query"],
        },
        argsSchema: SearchArgsSchema,
        execute,
    };

    async function execute(
        args: SearchArgs,
        signal?: AbortSignal,
    ): Promise<ToolOutput> {
        // A blank course_name means no course filter
        const result = await search.search(args.query, {
            courseName: args.course_name?.trim() || undefined,
            lessonNumber: args.lesson_number ?? undefined,
            signal,
        });
        if (!result.success) {
            return { text: result.message, sources: [] };
        }
        return {
            text: formatSearchResult(result.data),
            sources: result.data.matches.map((m) => m.source),
        };
    }
}

//-------------------
//
// OUTLINE TOOL
//
//-------------------

export const outlineToolName = "get_course_outline";

function outlineArgsSchema() {
    return {
        course_name: z.string().min(1),
    };
}
const OutlineArgsSchema = z.object(outlineArgsSchema());
export type OutlineArgs = z.infer<typeof OutlineArgsSchema>;

export function createOutlineTool(
    index: CourseIndex,
    resolver: CourseNameResolver,
): CourseTool<OutlineArgs> {
    return {
        name: outlineToolName,
        description:
            "Get a course outline: its title, link, instructor and complete list of lessons",
        parameters: {
            type: "object",
            properties: {
                course_name: {
                    type: "string",
                    description:
                        "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
                },
            },
            required: ["course_name"],
        },
        argsSchema: OutlineArgsSchema,
        execute,
    };

    async function execute(
        args: OutlineArgs,
        signal?: AbortSignal,
    ): Promise<ToolOutput> {
        const resolved = await resolver.resolve(args.course_name, signal);
        const course = resolved.success
            ? index.getCourse(resolved.data)
            : undefined;
        if (course === undefined) {
            return {
                text: `No course found matching '${args.course_name}'`,
                sources: [],
            };
        }
        return {
            text: formatCourseOutline(course),
            sources: [{ courseTitle: course.title, link: course.link }],
        };
    }
}

export function formatCourseOutline(course: CourseMetadata): string {
    const lines = [`Course Title: ${course.title}`];
    if (course.link) {
        lines.push(`Course Link: ${course.link}`);
    }
    if (course.instructor) {
        lines.push(`Course Instructor: ${course.instructor}`);
    }
    if (course.lessons.length > 0) {
        lines.push("Lessons:");
        for (const lesson of course.lessons) {
            lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}`);
        }
    } else {
        lines.push("Lessons: none");
    }
    return lines.join("\n");
}

/**
 * The tools the course assistant offers the generation service
 */
export function createCourseTools(
    search: CourseSearch,
    resolver: CourseNameResolver,
): ToolRegistry {
    const registry = new ToolRegistry();
    registry.register(createSearchTool(search));
    registry.register(createOutlineTool(search.index, resolver));
    return registry;
}
