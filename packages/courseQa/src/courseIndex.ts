// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { TextEmbeddingModel } from "@course-qa/aiclient";
import registerDebug from "debug";
import { CourseChunk, CourseMetadata, Scored } from "./interfaces.js";
import { KeyedLock } from "./keyedLock.js";
import {
    createVectorCollection,
    VectorCollection,
} from "./vector/vectorCollection.js";

const debugIndex = registerDebug("course-qa:index");

export type ContentMetadata = {
    courseTitle: string;
    lessonNumber?: number | undefined;
    chunkIndex: number;
};

export type ContentFilter = {
    courseTitle?: string | undefined;
    lessonNumber?: number | undefined;
};

/**
 * Two collections:
 *  catalog: one record per course, embedded from its title. Used to resolve course names
 *  content: one record per chunk, embedded from the chunk text. Used to answer questions
 */
export class CourseIndex {
    private courseLock = new KeyedLock();

    constructor(
        public readonly catalog: VectorCollection<CourseMetadata>,
        public readonly content: VectorCollection<ContentMetadata>,
    ) {}

    /**
     * Add a course and its chunks, replacing any course with the same title.
     * All embeddings are computed before anything is changed: if the embedding model fails,
     * the index is left as it was. Concurrent adds of the same title are serialized
     * @param metadata
     * @param chunks
     */
    public addCourse(
        metadata: CourseMetadata,
        chunks: CourseChunk[],
    ): Promise<void> {
        return this.courseLock.runExclusive(metadata.title, async () => {
            const [catalogRecord] = await this.catalog.embed([
                {
                    id: metadata.title,
                    text: metadata.title,
                    metadata: copyMetadata(metadata),
                },
            ]);
            const contentRecords = await this.content.embed(
                chunks.map((c) => ({
                    id: contentId(metadata.title, c.chunkIndex),
                    text: c.text,
                    metadata: {
                        courseTitle: metadata.title,
                        lessonNumber: c.lessonNumber,
                        chunkIndex: c.chunkIndex,
                    },
                })),
            );
            // Content and catalog change in the same synchronous step
            const [removed] = await Promise.all([
                this.content.replaceWhere(
                    { courseTitle: metadata.title },
                    contentRecords,
                ),
                this.catalog.upsert([catalogRecord]),
            ]);
            debugIndex(
                `${metadata.title}: ${contentRecords.length} chunks indexed, ${removed} replaced`,
            );
        });
    }

    public getCourse(title: string): CourseMetadata | undefined {
        return this.catalog.get(title)?.metadata;
    }

    public hasCourse(title: string): boolean {
        return this.catalog.get(title) !== undefined;
    }

    public getCourseTitles(): string[] {
        return this.catalog.getAll().map((r) => r.metadata.title);
    }

    public getCourseCount(): number {
        return this.catalog.count();
    }

    public getContentCount(filter?: ContentFilter): number {
        return this.content.count(filter);
    }

    /**
     * Link of a lesson; the course link when lessonNumber is undefined
     */
    public getLessonLink(
        courseTitle: string,
        lessonNumber?: number,
    ): string | undefined {
        const course = this.getCourse(courseTitle);
        if (course === undefined) {
            return undefined;
        }
        if (lessonNumber === undefined) {
            return course.link;
        }
        return course.lessons.find((l) => l.lessonNumber === lessonNumber)
            ?.link;
    }

    /**
     * Courses whose titles are most similar to name, best first
     */
    public async searchCatalog(
        name: string,
        maxMatches: number,
        signal?: AbortSignal,
    ): Promise<Scored<CourseMetadata>[]> {
        const matches = await this.catalog.query(
            name,
            maxMatches,
            undefined,
            signal,
        );
        return matches.map((m) => ({
            item: m.item.metadata,
            score: m.score,
        }));
    }

    /**
     * Chunks most similar to query, best first.
     * The filter is applied before ranking, so maxMatches are returned whenever that many chunks match it
     */
    public async searchContent(
        query: string,
        maxMatches: number,
        filter?: ContentFilter,
        signal?: AbortSignal,
    ): Promise<Scored<CourseChunk>[]> {
        const matches = await this.content.query(
            query,
            maxMatches,
            filter,
            signal,
        );
        return matches.map((m) => ({
            item: {
                text: m.item.text,
                courseTitle: m.item.metadata.courseTitle,
                lessonNumber: m.item.metadata.lessonNumber,
                chunkIndex: m.item.metadata.chunkIndex,
            },
            score: m.score,
        }));
    }

    public async clear(): Promise<void> {
        await this.content.clear();
        await this.catalog.clear();
    }
}

export function createCourseIndex(
    embeddingModel: TextEmbeddingModel,
    catalogEmbeddingModel?: TextEmbeddingModel,
): CourseIndex {
    return new CourseIndex(
        createVectorCollection<CourseMetadata>(
            "course_catalog",
            catalogEmbeddingModel ?? embeddingModel,
        ),
        createVectorCollection<ContentMetadata>(
            "course_content",
            embeddingModel,
        ),
    );
}

function contentId(courseTitle: string, chunkIndex: number): string {
    return `${courseTitle}#${chunkIndex}`;
}

function copyMetadata(metadata: CourseMetadata): CourseMetadata {
    return {
        ...metadata,
        lessons: metadata.lessons.map((l) => ({ ...l })),
    };
}
