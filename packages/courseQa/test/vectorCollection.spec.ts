// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { ServiceUnavailableError } from "../src/errors.js";
import {
    dotProduct,
    normalizeInPlace,
} from "../src/vector/vector.js";
import {
    createVectorCollection,
    matchesFilter,
    VectorCollection,
} from "../src/vector/vectorCollection.js";
import { BagOfWordsEmbeddingModel } from "./testCommon.js";

type TestMetadata = {
    color: string;
    kind: string;
};

describe("vector", () => {
    test("dotProduct", () => {
        expect(dotProduct([1, 2, 3], [4, 5, 6])).toEqual(32);
        expect(() => dotProduct([1], [1, 2])).toThrow();
    });
    test("normalize", () => {
        const v = [3, 4];
        normalizeInPlace(v);
        expect(v[0]).toBeCloseTo(0.6);
        expect(v[1]).toBeCloseTo(0.8);
        const zero = [0, 0];
        normalizeInPlace(zero);
        expect(zero).toEqual([0, 0]);
    });
});

describe("vectorCollection", () => {
    let model: BagOfWordsEmbeddingModel;
    let collection: VectorCollection<TestMetadata>;

    beforeEach(async () => {
        model = new BagOfWordsEmbeddingModel();
        collection = createVectorCollection<TestMetadata>("test", model);
        await collection.upsert(
            await collection.embed([
                {
                    id: "a",
                    text: "red apple",
                    metadata: { color: "red", kind: "fruit" },
                },
                {
                    id: "b",
                    text: "green apple",
                    metadata: { color: "green", kind: "fruit" },
                },
                {
                    id: "c",
                    text: "red car",
                    metadata: { color: "red", kind: "vehicle" },
                },
            ]),
        );
    });

    test("query", async () => {
        const matches = await collection.query("apple", 2);
        expect(matches.map((m) => m.item.id)).toEqual(["a", "b"]);
        expect(matches[0].score).toBeCloseTo(Math.SQRT1_2);
        expect(matches[0].item).toEqual({
            id: "a",
            text: "red apple",
            metadata: { color: "red", kind: "fruit" },
        });
    });
    test("queryFilter", async () => {
        let matches = await collection.query("apple", 5, { color: "red" });
        expect(matches.map((m) => m.item.id)).toEqual(["a", "c"]);
        matches = await collection.query("apple", 5, {
            color: "red",
            kind: "vehicle",
        });
        expect(matches.map((m) => m.item.id)).toEqual(["c"]);
        matches = await collection.query("apple", 5, { color: "blue" });
        expect(matches).toHaveLength(0);
    });
    test("count", () => {
        expect(collection.count()).toEqual(3);
        expect(collection.count({ color: "red" })).toEqual(2);
        expect(collection.count({ color: undefined })).toEqual(3);
    });
    test("upsert", async () => {
        await collection.upsert(
            await collection.embed([
                {
                    id: "a",
                    text: "red cherry",
                    metadata: { color: "red", kind: "fruit" },
                },
            ]),
        );
        expect(collection.count()).toEqual(3);
        expect(collection.get("a")?.text).toEqual("red cherry");
        expect(collection.getAll().map((r) => r.id)).toEqual(["a", "b", "c"]);
    });
    test("replaceWhere", async () => {
        const records = await collection.embed([
            {
                id: "d",
                text: "red bike",
                metadata: { color: "red", kind: "vehicle" },
            },
        ]);
        const removed = await collection.replaceWhere({ color: "red" }, records);
        expect(removed).toEqual(2);
        expect(collection.getAll().map((r) => r.id)).toEqual(["b", "d"]);
    });
    test("clear", async () => {
        await collection.clear();
        expect(collection.count()).toEqual(0);
        const callCount = model.callCount;
        expect(await collection.query("apple", 5)).toEqual([]);
        expect(model.callCount).toEqual(callCount);
    });
    test("embeddingFailure", async () => {
        model.failWith = "model offline";
        await expect(collection.query("apple", 2)).rejects.toThrow(
            new ServiceUnavailableError("Embedding model", "model offline"),
        );
        await expect(
            collection.embed([
                {
                    id: "e",
                    text: "blue boat",
                    metadata: { color: "blue", kind: "vehicle" },
                },
            ]),
        ).rejects.toBeInstanceOf(ServiceUnavailableError);
        expect(collection.count()).toEqual(3);
    });
    test("matchesFilter", () => {
        const metadata = { color: "red", kind: "fruit" };
        expect(matchesFilter(metadata)).toBe(true);
        expect(matchesFilter(metadata, {})).toBe(true);
        expect(matchesFilter(metadata, { color: "red" })).toBe(true);
        expect(matchesFilter(metadata, { color: "red", kind: "car" })).toBe(
            false,
        );
    });
});
