// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import registerDebug from "debug";
import { error, Result, success } from "typechat";
import { CourseIndex } from "./courseIndex.js";

const debugSearch = registerDebug("course-qa:search");

/**
 * Maps a fuzzy course name ("MCP", "the retrieval course") to the canonical title of
 * the single best matching course in the catalog
 */
export class CourseNameResolver {
    constructor(
        public readonly index: CourseIndex,
        public minScore: number = 0.3,
    ) {}

    /**
     * @param courseName
     * @param signal
     * @returns the canonical title, or an error: "No course found matching '<courseName>'"
     */
    public async resolve(
        courseName: string,
        signal?: AbortSignal,
    ): Promise<Result<string>> {
        const name = courseName.trim();
        if (name.length > 0) {
            const exactMatch = this.findExactTitle(name);
            if (exactMatch !== undefined) {
                return success(exactMatch);
            }
            const [bestMatch] = await this.index.searchCatalog(
                name,
                1,
                signal,
            );
            if (bestMatch !== undefined) {
                debugSearch(
                    `'${name}' -> '${bestMatch.item.title}' (${bestMatch.score.toFixed(3)})`,
                );
                if (bestMatch.score >= this.minScore) {
                    return success(bestMatch.item.title);
                }
            }
        }
        return error(`No course found matching '${courseName}'`);
    }

    private findExactTitle(name: string): string | undefined {
        const lowerName = name.toLowerCase();
        return this.index
            .getCourseTitles()
            .find((title) => title.trim().toLowerCase() === lowerName);
    }
}
