// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type Lesson = {
    lessonNumber: number;
    title: string;
    link?: string | undefined;
};

/**
 * Course metadata, as parsed from the header of a course document.
 * The title is the course's identity
 */
export type CourseMetadata = {
    title: string;
    link?: string | undefined;
    instructor?: string | undefined;
    /**
     * In document order
     */
    lessons: Lesson[];
};

/**
 * The atomic retrievable unit of a course
 */
export type CourseChunk = {
    /**
     * Chunk text, with its lesson-context prefix
     */
    text: string;
    courseTitle: string;
    /**
     * Undefined if the chunk precedes any lesson heading
     */
    lessonNumber?: number | undefined;
    /**
     * Zero-based, contiguous within a course, in document order
     */
    chunkIndex: number;
};

/**
 * Where a piece of retrieved content came from
 */
export type SourceAttribution = {
    courseTitle: string;
    lessonNumber?: number | undefined;
    link?: string | undefined;
};

/**
 * One query and its answer
 */
export type Exchange = {
    query: string;
    answer: string;
};

export type Scored<T> = {
    item: T;
    score: number;
};

export function sourceLabel(source: SourceAttribution): string {
    return source.lessonNumber !== undefined
        ? `${source.courseTitle} - Lesson ${source.lessonNumber}`
        : source.courseTitle;
}
