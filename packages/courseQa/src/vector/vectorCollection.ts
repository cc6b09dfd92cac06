// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { TextEmbeddingModel } from "@course-qa/aiclient";
import { Scored } from "../interfaces.js";
import {
    generateTextEmbedding,
    generateTextEmbeddings,
    NormalizedEmbedding,
} from "./embeddings.js";
import { dotProduct } from "./vector.js";

/**
 * A piece of text stored with its metadata, under a unique id
 */
export type VectorRecord<TMetadata> = {
    id: string;
    text: string;
    metadata: TMetadata;
};

export type EmbeddedRecord<TMetadata> = VectorRecord<TMetadata> & {
    embedding: NormalizedEmbedding;
};

/**
 * Exact-match filter over metadata fields. Fields that are absent or undefined match anything
 */
export type MetadataFilter<TMetadata> = {
    [K in keyof TMetadata]?: TMetadata[K] | undefined;
};

/**
 * A named collection of embedded text records, searchable by semantic similarity.
 * Embedding is a separate step from storing, so callers can compute every embedding they
 * need before they change anything
 */
export interface VectorCollection<TMetadata extends object> {
    readonly name: string;
    count(filter?: MetadataFilter<TMetadata>): number;
    get(id: string): VectorRecord<TMetadata> | undefined;
    /**
     * Records matching filter, in insertion order
     */
    getAll(filter?: MetadataFilter<TMetadata>): VectorRecord<TMetadata>[];
    embed(records: VectorRecord<TMetadata>[]): Promise<EmbeddedRecord<TMetadata>[]>;
    /**
     * Insert records, replacing any with the same id
     */
    upsert(records: EmbeddedRecord<TMetadata>[]): Promise<void>;
    /**
     * Delete every record matching filter, then insert records, as one step:
     * readers see either the old records or the new ones
     * @returns number of records deleted
     */
    replaceWhere(
        filter: MetadataFilter<TMetadata>,
        records: EmbeddedRecord<TMetadata>[],
    ): Promise<number>;
    /**
     * Return the topK records most similar to text, best first. Ties keep insertion order
     */
    query(
        text: string,
        topK: number,
        filter?: MetadataFilter<TMetadata>,
        signal?: AbortSignal,
    ): Promise<Scored<VectorRecord<TMetadata>>[]>;
    clear(): Promise<void>;
}

export function matchesFilter<TMetadata extends object>(
    metadata: TMetadata,
    filter?: MetadataFilter<TMetadata>,
): boolean {
    if (filter) {
        for (const key in filter) {
            const expected = filter[key];
            if (expected !== undefined && metadata[key] !== expected) {
                return false;
            }
        }
    }
    return true;
}

/**
 * An in-memory vector collection over a text embedding model.
 * Embeddings are normalized, so similarity is a dot product
 * @param name
 * @param model
 * @returns
 */
export function createVectorCollection<TMetadata extends object>(
    name: string,
    model: TextEmbeddingModel,
): VectorCollection<TMetadata> {
    const records = new Map<string, EmbeddedRecord<TMetadata>>();
    return {
        name,
        count,
        get,
        getAll,
        embed,
        upsert,
        replaceWhere,
        query,
        clear,
    };

    function count(filter?: MetadataFilter<TMetadata>): number {
        if (!filter) {
            return records.size;
        }
        let total = 0;
        for (const record of records.values()) {
            if (matchesFilter(record.metadata, filter)) {
                ++total;
            }
        }
        return total;
    }

    function get(id: string): VectorRecord<TMetadata> | undefined {
        const record = records.get(id);
        return record ? toVectorRecord(record) : undefined;
    }

    function getAll(
        filter?: MetadataFilter<TMetadata>,
    ): VectorRecord<TMetadata>[] {
        const matches: VectorRecord<TMetadata>[] = [];
        for (const record of records.values()) {
            if (matchesFilter(record.metadata, filter)) {
                matches.push(toVectorRecord(record));
            }
        }
        return matches;
    }

    async function embed(
        toEmbed: VectorRecord<TMetadata>[],
    ): Promise<EmbeddedRecord<TMetadata>[]> {
        const embeddings = await generateTextEmbeddings(
            model,
            toEmbed.map((r) => r.text),
        );
        return toEmbed.map((r, i) => ({ ...r, embedding: embeddings[i] }));
    }

    async function upsert(toAdd: EmbeddedRecord<TMetadata>[]): Promise<void> {
        for (const record of toAdd) {
            records.set(record.id, record);
        }
    }

    async function replaceWhere(
        filter: MetadataFilter<TMetadata>,
        toAdd: EmbeddedRecord<TMetadata>[],
    ): Promise<number> {
        const removed = removeMatching(filter);
        for (const record of toAdd) {
            records.set(record.id, record);
        }
        return removed;
    }

    async function query(
        text: string,
        topK: number,
        filter?: MetadataFilter<TMetadata>,
        signal?: AbortSignal,
    ): Promise<Scored<VectorRecord<TMetadata>>[]> {
        if (topK <= 0 || records.size === 0) {
            return [];
        }
        const embedding = await generateTextEmbedding(model, text, signal);
        const matches: Scored<VectorRecord<TMetadata>>[] = [];
        for (const record of records.values()) {
            if (matchesFilter(record.metadata, filter)) {
                matches.push({
                    item: toVectorRecord(record),
                    score: dotProduct(embedding, record.embedding),
                });
            }
        }
        // Array.sort is stable
        matches.sort((x, y) => y.score - x.score);
        return matches.slice(0, topK);
    }

    async function clear(): Promise<void> {
        records.clear();
    }

    function removeMatching(filter: MetadataFilter<TMetadata>): number {
        let removed = 0;
        for (const [id, record] of records) {
            if (matchesFilter(record.metadata, filter)) {
                records.delete(id);
                ++removed;
            }
        }
        return removed;
    }
}

function toVectorRecord<TMetadata>(
    record: EmbeddedRecord<TMetadata>,
): VectorRecord<TMetadata> {
    return { id: record.id, text: record.text, metadata: record.metadata };
}
