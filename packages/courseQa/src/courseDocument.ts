// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import registerDebug from "debug";
import { CourseChunk, CourseMetadata, Lesson } from "./interfaces.js";
import { ParseError } from "./errors.js";
import { ChunkingSettings } from "./settings.js";
import { splitIntoLines, splitTextIntoChunks } from "./textChunker.js";

const debugIngest = registerDebug("course-qa:ingest");

/**
 * A chunk, as produced from a course document
 */
export type CourseDocumentChunk = CourseChunk & {
    /**
     * The chunk's untrimmed text, without its lesson-context prefix
     */
    body: string;
    /**
     * Leading characters of body repeated from the previous chunk of the same lesson
     */
    overlap: number;
};

export type CourseDocumentSection = {
    /**
     * Undefined for text that precedes the first lesson heading
     */
    lesson?: Lesson | undefined;
    text: string;
};

export type ParsedCourseDocument = {
    metadata: CourseMetadata;
    sections: CourseDocumentSection[];
};

export type ChunkedCourseDocument = {
    metadata: CourseMetadata;
    chunks: CourseDocumentChunk[];
};

const courseTitleRegex = /^course\s+title\s*:\s*(.*)$/i;
const courseLinkRegex = /^course\s+link\s*:\s*(.*)$/i;
const courseInstructorRegex = /^course\s+instructor\s*:\s*(.*)$/i;
const lessonHeaderRegex = /^lesson\s+(\d+)\s*:\s*(.+)$/i;
const lessonLinkRegex = /^lesson\s+link\s*:\s*(.*)$/i;

/**
 * Parse a course document:
 *   Course Title: ...
 *   Course Link: ...
 *   Course Instructor: ...
 *   Lesson 0: Introduction
 *   Lesson Link: ...
 *   lesson text...
 * @param documentText
 * @param sourceName used in error messages
 * @returns course metadata and the text of each lesson
 */
export function parseCourseDocument(
    documentText: string,
    sourceName?: string,
): ParsedCourseDocument {
    const lines = splitIntoLines(documentText);
    let title: string | undefined;
    let link: string | undefined;
    let instructor: string | undefined;

    const lessons: Lesson[] = [];
    const sections: CourseDocumentSection[] = [];
    let currentLesson: Lesson | undefined;
    let sectionLines: string[] = [];

    for (let i = 0; i < lines.length; ++i) {
        const line = lines[i].trim();
        const lessonMatch = lessonHeaderRegex.exec(line);
        if (lessonMatch) {
            flushSection();
            const lessonNumber = Number.parseInt(lessonMatch[1], 10);
            if (lessons.some((l) => l.lessonNumber === lessonNumber)) {
                throw new ParseError(
                    `Duplicate lesson number ${lessonNumber}`,
                    sourceName,
                );
            }
            currentLesson = { lessonNumber, title: lessonMatch[2].trim() };
            const linkMatch =
                i + 1 < lines.length
                    ? lessonLinkRegex.exec(lines[i + 1].trim())
                    : null;
            if (linkMatch) {
                currentLesson.link = nonEmpty(linkMatch[1]);
                ++i;
            }
            lessons.push(currentLesson);
            continue;
        }
        if (currentLesson === undefined) {
            // Header block
            const titleMatch = courseTitleRegex.exec(line);
            if (titleMatch && title === undefined) {
                title = nonEmpty(titleMatch[1]);
                continue;
            }
            const linkMatch = courseLinkRegex.exec(line);
            if (linkMatch && link === undefined) {
                link = nonEmpty(linkMatch[1]);
                continue;
            }
            const instructorMatch = courseInstructorRegex.exec(line);
            if (instructorMatch && instructor === undefined) {
                instructor = nonEmpty(instructorMatch[1]);
                continue;
            }
        }
        sectionLines.push(lines[i]);
    }
    flushSection();

    if (!title) {
        throw new ParseError("Missing course title", sourceName);
    }
    return {
        metadata: { title, link, instructor, lessons },
        sections,
    };

    function flushSection() {
        const text = sectionLines.join("\n").trim();
        if (text.length > 0) {
            sections.push({ lesson: currentLesson, text });
        }
        sectionLines = [];
    }
}

/**
 * Parse a course document and split its lessons into overlapping chunks.
 * Chunk indexes are contiguous from 0, in document order
 * @param documentText
 * @param settings chunk size and overlap
 * @param sourceName used in error messages
 * @returns
 */
export function chunkCourseDocument(
    documentText: string,
    settings: ChunkingSettings,
    sourceName?: string,
): ChunkedCourseDocument {
    const { metadata, sections } = parseCourseDocument(
        documentText,
        sourceName,
    );
    const chunks: CourseDocumentChunk[] = [];
    for (const section of sections) {
        const lessonNumber = section.lesson?.lessonNumber;
        const prefix = lessonContextPrefix(metadata.title, lessonNumber);
        for (const chunk of splitTextIntoChunks(
            section.text,
            settings.chunkSize,
            settings.chunkOverlap,
        )) {
            chunks.push({
                text: prefix + chunk.body.trim(),
                courseTitle: metadata.title,
                lessonNumber,
                chunkIndex: chunks.length,
                body: chunk.body,
                overlap: chunk.overlap,
            });
        }
    }
    debugIngest(
        `${metadata.title}: ${metadata.lessons.length} lessons, ${chunks.length} chunks`,
    );
    return { metadata, chunks };
}

export function lessonContextPrefix(
    courseTitle: string,
    lessonNumber?: number,
): string {
    return lessonNumber !== undefined
        ? `Course ${courseTitle} Lesson ${lessonNumber} content: `
        : `Course ${courseTitle} content: `;
}

function nonEmpty(value: string): string | undefined {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}
