// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { chunkCourseDocument } from "../src/courseDocument.js";
import { createCourseIndex } from "../src/courseIndex.js";
import { ServiceUnavailableError } from "../src/errors.js";
import { createCourseQaSettings } from "../src/settings.js";
import {
    BagOfWordsEmbeddingModel,
    createTestIndex,
    loadTestCourse,
} from "./testCommon.js";

describe("courseIndex", () => {
    const settings = createCourseQaSettings();
    const mcpTitle = "Intro to MCP";

    test("addCourse", async () => {
        const index = await createTestIndex();
        expect(index.getCourseCount()).toEqual(2);
        expect(index.getCourseTitles()).toEqual([
            mcpTitle,
            "Advanced Retrieval",
        ]);
        expect(index.getContentCount()).toEqual(5);
        expect(index.getContentCount({ courseTitle: mcpTitle })).toEqual(3);
        expect(
            index.getContentCount({ courseTitle: mcpTitle, lessonNumber: 2 }),
        ).toEqual(1);
        expect(index.getCourse(mcpTitle)?.instructor).toEqual("Ada Example");
        expect(index.getCourse("Unknown")).toBeUndefined();
        expect(index.hasCourse("Advanced Retrieval")).toBe(true);
    });
    test("lessonLinks", async () => {
        const index = await createTestIndex();
        expect(index.getLessonLink(mcpTitle, 2)).toEqual(
            "https://example.com/courses/mcp/lesson-2",
        );
        expect(index.getLessonLink(mcpTitle, 3)).toBeUndefined();
        expect(index.getLessonLink(mcpTitle)).toEqual(
            "https://example.com/courses/mcp",
        );
        expect(index.getLessonLink("Unknown", 1)).toBeUndefined();
    });
    test("reingestIsIdempotent", async () => {
        const index = await createTestIndex();
        const before = index.content.getAll();
        const { metadata, chunks } = chunkCourseDocument(
            loadTestCourse("intro_to_mcp.txt"),
            settings,
        );
        await index.addCourse(metadata, chunks);
        expect(index.getCourseCount()).toEqual(2);
        expect(index.getContentCount()).toEqual(5);
        expect(
            index.content
                .getAll({ courseTitle: mcpTitle })
                .map((r) => r.text),
        ).toEqual(
            before
                .filter((r) => r.metadata.courseTitle === mcpTitle)
                .map((r) => r.text),
        );
    });
    test("reingestReplaces", async () => {
        const index = await createTestIndex();
        const { metadata, chunks } = chunkCourseDocument(
            "Course Title: Intro to MCP\nLesson 1: Only\nNew text.",
            settings,
        );
        await index.addCourse(metadata, chunks);
        expect(index.getCourse(mcpTitle)?.lessons).toEqual([
            { lessonNumber: 1, title: "Only" },
        ]);
        expect(index.getCourse(mcpTitle)?.instructor).toBeUndefined();
        expect(index.getContentCount({ courseTitle: mcpTitle })).toEqual(1);
        expect(index.getContentCount()).toEqual(3);
    });
    test("embeddingFailureLeavesIndexUnchanged", async () => {
        const model = new BagOfWordsEmbeddingModel();
        const index = await createTestIndex(model);
        model.failWith = "model offline";
        const { metadata, chunks } = chunkCourseDocument(
            "Course Title: Intro to MCP\nLesson 1: Only\nNew text.",
            settings,
        );
        await expect(index.addCourse(metadata, chunks)).rejects.toBeInstanceOf(
            ServiceUnavailableError,
        );
        expect(index.getCourse(mcpTitle)?.lessons).toHaveLength(3);
        expect(index.getContentCount({ courseTitle: mcpTitle })).toEqual(3);
    });
    test("concurrentAddsOfSameCourse", async () => {
        const index = await createTestIndex();
        const first = chunkCourseDocument(
            "Course Title: Intro to MCP\nLesson 1: A\nFirst.\nLesson 2: B\nSecond.",
            settings,
        );
        const second = chunkCourseDocument(
            "Course Title: Intro to MCP\nLesson 5: C\nThird.",
            settings,
        );
        await Promise.all([
            index.addCourse(first.metadata, first.chunks),
            index.addCourse(second.metadata, second.chunks),
        ]);
        expect(index.getCourse(mcpTitle)?.lessons).toEqual([
            { lessonNumber: 5, title: "C" },
        ]);
        expect(
            index.content
                .getAll({ courseTitle: mcpTitle })
                .map((r) => r.metadata.lessonNumber),
        ).toEqual([5]);
    });
    test("catalogUpdatedWithContent", async () => {
        const index = createCourseIndex(new BagOfWordsEmbeddingModel());
        const replaceWhere = index.content.replaceWhere;
        const linksSeen: (string | undefined)[] = [];
        jest.spyOn(index.content, "replaceWhere").mockImplementation(
            async (filter, records) => {
                const removed = await replaceWhere(filter, records);
                // What a search running right after the content write would see
                linksSeen.push(index.getLessonLink(mcpTitle, 1));
                return removed;
            },
        );
        const { metadata, chunks } = chunkCourseDocument(
            loadTestCourse("intro_to_mcp.txt"),
            settings,
            "intro_to_mcp.txt",
        );
        await index.addCourse(metadata, chunks);
        expect(linksSeen).toEqual(["https://example.com/courses/mcp/lesson-1"]);
    });
    test("searchCatalog", async () => {
        const index = await createTestIndex();
        const matches = await index.searchCatalog("retrieval", 2);
        expect(matches.map((m) => m.item.title)).toEqual([
            "Advanced Retrieval",
            mcpTitle,
        ]);
        expect(matches[0].score).toBeCloseTo(Math.SQRT1_2);
        expect(matches[1].score).toBeCloseTo(0);
    });
    test("clear", async () => {
        const index = await createTestIndex();
        await index.clear();
        expect(index.getCourseCount()).toEqual(0);
        expect(index.getContentCount()).toEqual(0);
    });
});
