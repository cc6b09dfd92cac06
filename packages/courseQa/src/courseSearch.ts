// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import registerDebug from "debug";
import { Result, success } from "typechat";
import { CourseIndex } from "./courseIndex.js";
import { SourceAttribution, sourceLabel } from "./interfaces.js";
import { CourseNameResolver } from "./nameResolver.js";

const debugSearch = registerDebug("course-qa:search");

export type CourseSearchOptions = {
    /**
     * Fuzzy course name, resolved against the catalog
     */
    courseName?: string | undefined;
    lessonNumber?: number | undefined;
    signal?: AbortSignal | undefined;
};

export type CourseSearchMatch = {
    text: string;
    source: SourceAttribution;
    score: number;
};

export type CourseSearchResult = {
    /**
     * The resolved course title, if the search was restricted to a course
     */
    courseTitle?: string | undefined;
    lessonNumber?: number | undefined;
    /**
     * Best match first. Empty if nothing matched
     */
    matches: CourseSearchMatch[];
};

/**
 * Semantic search over course content, optionally restricted to a course and lesson
 */
export class CourseSearch {
    constructor(
        public readonly index: CourseIndex,
        public readonly resolver: CourseNameResolver,
        public maxResults: number = 5,
    ) {}

    /**
     * @param query
     * @param options
     * @returns matches, or an error if options.courseName does not resolve to a course
     */
    public async search(
        query: string,
        options?: CourseSearchOptions,
    ): Promise<Result<CourseSearchResult>> {
        let courseTitle: string | undefined;
        const signal = options?.signal;
        if (options?.courseName !== undefined) {
            const resolved = await this.resolver.resolve(
                options.courseName,
                signal,
            );
            if (!resolved.success) {
                return resolved;
            }
            courseTitle = resolved.data;
        }
        const lessonNumber = options?.lessonNumber;
        const chunks = await this.index.searchContent(
            query,
            this.maxResults,
            { courseTitle, lessonNumber },
            signal,
        );
        debugSearch(
            `'${query}' [${courseTitle ?? "*"}:${lessonNumber ?? "*"}]: ${chunks.length} matches`,
        );
        const matches = chunks.map((c) => ({
            text: c.item.text,
            source: {
                courseTitle: c.item.courseTitle,
                lessonNumber: c.item.lessonNumber,
                link: this.index.getLessonLink(
                    c.item.courseTitle,
                    c.item.lessonNumber,
                ),
            },
            score: c.score,
        }));
        return success({ courseTitle, lessonNumber, matches });
    }
}

/**
 * Render search results as text for the generation service
 * @param result
 * @returns one block per match, separated by blank lines, or a "No relevant content found" marker
 */
export function formatSearchResult(result: CourseSearchResult): string {
    if (result.matches.length === 0) {
        let marker = "No relevant content found";
        if (result.courseTitle !== undefined) {
            marker += ` in course '${result.courseTitle}'`;
        }
        if (result.lessonNumber !== undefined) {
            marker += ` in lesson ${result.lessonNumber}`;
        }
        return marker + ".";
    }
    return result.matches
        .map((m) => `[${sourceLabel(m.source)}]\n${m.text}`)
        .join("\n\n");
}
