// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { queue, QueueObject } from "async";

type LockedTask = () => Promise<void>;

/**
 * Serializes async work per key. Work for different keys runs concurrently
 */
export class KeyedLock {
    private queues = new Map<string, QueueObject<LockedTask>>();

    /**
     * Run fn once all work queued earlier for the same key has completed
     * @param key
     * @param fn
     * @returns the result of fn
     */
    public runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const q = this.getQueue(key);
        return new Promise<T>((resolve, reject) => {
            q.push(
                async () => {
                    try {
                        resolve(await fn());
                    } catch (e) {
                        reject(e);
                    }
                },
                () => {
                    if (q.idle()) {
                        this.queues.delete(key);
                    }
                },
            );
        });
    }

    /**
     * Number of keys with pending or running work
     */
    public get activeKeys(): number {
        return this.queues.size;
    }

    private getQueue(key: string): QueueObject<LockedTask> {
        let q = this.queues.get(key);
        if (q === undefined) {
            q = queue<LockedTask>(async (task) => task(), 1);
            this.queues.set(key, q);
        }
        return q;
    }
}
