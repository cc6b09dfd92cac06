// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createCourseIndex } from "../src/courseIndex.js";
import {
    CourseSearch,
    CourseSearchResult,
    formatSearchResult,
} from "../src/courseSearch.js";
import { CourseNameResolver } from "../src/nameResolver.js";
import { BagOfWordsEmbeddingModel, createTestIndex } from "./testCommon.js";

async function createTestSearch(): Promise<CourseSearch> {
    const index = await createTestIndex();
    return new CourseSearch(index, new CourseNameResolver(index));
}

function getResult(
    result: Awaited<ReturnType<CourseSearch["search"]>>,
): CourseSearchResult {
    if (!result.success) {
        throw new Error(result.message);
    }
    return result.data;
}

describe("courseSearch", () => {
    test("courseFilter", async () => {
        const search = await createTestSearch();
        const result = getResult(
            await search.search("setup", { courseName: "MCP" }),
        );
        expect(result.courseTitle).toEqual("Intro to MCP");
        expect(result.matches).toHaveLength(3);
        expect(
            result.matches.every(
                (m) => m.source.courseTitle === "Intro to MCP",
            ),
        ).toBe(true);
        expect(result.matches[0].source).toEqual({
            courseTitle: "Intro to MCP",
            lessonNumber: 1,
            link: "https://example.com/courses/mcp/lesson-1",
        });
    });
    test("unfiltered", async () => {
        const search = await createTestSearch();
        const result = getResult(await search.search("setup"));
        expect(result.courseTitle).toBeUndefined();
        expect(result.matches).toHaveLength(5);
        // 1/sqrt(11) for the MCP setup lesson, 1/sqrt(13) for the retrieval introduction
        expect(result.matches.slice(0, 2).map((m) => m.source)).toEqual([
            {
                courseTitle: "Intro to MCP",
                lessonNumber: 1,
                link: "https://example.com/courses/mcp/lesson-1",
            },
            {
                courseTitle: "Advanced Retrieval",
                lessonNumber: 0,
                link: "https://example.com/courses/retrieval/lesson-0",
            },
        ]);
    });
    test("maxResults", async () => {
        const search = await createTestSearch();
        search.maxResults = 2;
        const result = getResult(await search.search("setup"));
        expect(result.matches).toHaveLength(2);
    });
    test("lessonFilter", async () => {
        const search = await createTestSearch();
        let result = getResult(
            await search.search("tools", {
                courseName: "MCP",
                lessonNumber: 2,
            }),
        );
        expect(result.matches.map((m) => m.source.lessonNumber)).toEqual([2]);

        result = getResult(await search.search("vectors", { lessonNumber: 1 }));
        expect(result.matches.map((m) => m.source)).toEqual([
            {
                courseTitle: "Advanced Retrieval",
                lessonNumber: 1,
                link: undefined,
            },
            {
                courseTitle: "Intro to MCP",
                lessonNumber: 1,
                link: "https://example.com/courses/mcp/lesson-1",
            },
        ]);
    });
    test("courseNotFound", async () => {
        const search = await createTestSearch();
        expect(
            await search.search("setup", { courseName: "photosynthesis" }),
        ).toEqual({
            success: false,
            message: "No course found matching 'photosynthesis'",
        });
    });
    test("noContent", async () => {
        const index = createCourseIndex(new BagOfWordsEmbeddingModel());
        const search = new CourseSearch(index, new CourseNameResolver(index));
        const result = getResult(await search.search("photosynthesis"));
        expect(result.matches).toEqual([]);
        expect(formatSearchResult(result)).toEqual("No relevant content found.");
    });
    test("noContentInLesson", async () => {
        const search = await createTestSearch();
        const result = getResult(
            await search.search("setup", { courseName: "MCP", lessonNumber: 9 }),
        );
        expect(result.matches).toEqual([]);
        expect(formatSearchResult(result)).toEqual(
            "No relevant content found in course 'Intro to MCP' in lesson 9.",
        );
    });
    test("format", async () => {
        const search = await createTestSearch();
        const result = getResult(
            await search.search("setup", { courseName: "MCP", lessonNumber: 1 }),
        );
        expect(formatSearchResult(result)).toEqual(
            "[Intro to MCP - Lesson 1]\nCourse Intro to MCP Lesson 1 content: Install the server package. Run the setup script to configure the client.",
        );
        expect(
            formatSearchResult({
                matches: [
                    {
                        text: "one",
                        source: { courseTitle: "A", lessonNumber: 1 },
                        score: 1,
                    },
                    { text: "two", source: { courseTitle: "B" }, score: 0.5 },
                ],
            }),
        ).toEqual("[A - Lesson 1]\none\n\n[B]\ntwo");
    });
});
