// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { TextEmbeddingModel } from "@course-qa/aiclient";
import { Result } from "typechat";
import { ServiceUnavailableError, throwIfCancelled } from "../errors.js";
import { normalizeInPlace, Vector } from "./vector.js";

/**
 * A normalized embedding has unit length.
 * This lets us use Dot Products instead of Cosine Similarity in nearest neighbor searches
 */
export type NormalizedEmbedding = Float32Array;

export function createNormalized(src: Vector): NormalizedEmbedding {
    const embedding = new Float32Array(src);
    normalizeInPlace(embedding);
    return embedding;
}

/**
 * Generate a normalized embedding for text
 * @param model
 * @param text
 * @param signal aborts the request. Throws TurnCancelledError once aborted
 * @returns the embedding. Throws ServiceUnavailableError if the model fails
 */
export async function generateTextEmbedding(
    model: TextEmbeddingModel,
    text: string,
    signal?: AbortSignal,
): Promise<NormalizedEmbedding> {
    throwIfCancelled(signal);
    const result = await model.generateEmbedding(text, signal);
    throwIfCancelled(signal);
    return createNormalized(getEmbeddingData(result));
}

/**
 * Generate normalized embeddings for texts
 * Uses batching if model supports it
 * @param model
 * @param texts
 * @returns embeddings, in the same order as texts
 */
export async function generateTextEmbeddings(
    model: TextEmbeddingModel,
    texts: string[],
    signal?: AbortSignal,
): Promise<NormalizedEmbedding[]> {
    if (texts.length === 0) {
        return [];
    }
    if (model.maxBatchSize > 1 && model.generateEmbeddingBatch) {
        const embeddings: NormalizedEmbedding[] = [];
        for (let i = 0; i < texts.length; i += model.maxBatchSize) {
            const batch = texts.slice(i, i + model.maxBatchSize);
            throwIfCancelled(signal);
            const result = await model.generateEmbeddingBatch(batch, signal);
            throwIfCancelled(signal);
            const vectors = getEmbeddingData(result);
            if (vectors.length !== batch.length) {
                throw new ServiceUnavailableError(
                    "Embedding model",
                    `expected ${batch.length} embeddings, got ${vectors.length}`,
                );
            }
            embeddings.push(...vectors.map((v) => createNormalized(v)));
        }
        return embeddings;
    }
    const embeddings: NormalizedEmbedding[] = [];
    for (const text of texts) {
        embeddings.push(await generateTextEmbedding(model, text, signal));
    }
    return embeddings;
}

function getEmbeddingData<T>(result: Result<T>): T {
    if (!result.success) {
        throw new ServiceUnavailableError("Embedding model", result.message);
    }
    return result.data;
}
