// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { KeyedLock } from "../src/keyedLock.js";

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("keyedLock", () => {
    test("serializesSameKey", async () => {
        const lock = new KeyedLock();
        const events: string[] = [];
        const first = lock.runExclusive("a", async () => {
            events.push("first:start");
            await delay(20);
            events.push("first:end");
            return 1;
        });
        const second = lock.runExclusive("a", async () => {
            events.push("second:start");
            events.push("second:end");
            return 2;
        });
        expect(await Promise.all([first, second])).toEqual([1, 2]);
        expect(events).toEqual([
            "first:start",
            "first:end",
            "second:start",
            "second:end",
        ]);
        await delay(0);
        expect(lock.activeKeys).toEqual(0);
    });
    test("differentKeysRunConcurrently", async () => {
        const lock = new KeyedLock();
        const events: string[] = [];
        const slow = lock.runExclusive("a", async () => {
            events.push("a:start");
            await delay(20);
            events.push("a:end");
        });
        const fast = lock.runExclusive("b", async () => {
            events.push("b:start");
            events.push("b:end");
        });
        await Promise.all([slow, fast]);
        expect(events.indexOf("b:end")).toBeLessThan(events.indexOf("a:end"));
    });
    test("errorsReleaseLock", async () => {
        const lock = new KeyedLock();
        const failed = lock.runExclusive("a", async () => {
            throw new Error("failed");
        });
        const next = lock.runExclusive("a", async () => "ok");
        await expect(failed).rejects.toThrow("failed");
        expect(await next).toEqual("ok");
    });
});
