// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Exchange } from "./interfaces.js";

/**
 * Bounded conversation history, per session.
 * Sessions are created on first use
 */
export interface SessionStore {
    /**
     * Oldest exchanges are evicted when a session holds more than this
     */
    readonly maxExchanges: number;
    createSessionId(): string;
    /**
     * @returns exchanges of the session, most recent last. Empty for unknown sessions
     */
    get(sessionId: string): Promise<Exchange[]>;
    append(sessionId: string, exchange: Exchange): Promise<void>;
}

export class InMemorySessionStore implements SessionStore {
    private sessions = new Map<string, Exchange[]>();
    private sessionCounter = 0;

    constructor(public readonly maxExchanges: number = 2) {
        if (!Number.isInteger(maxExchanges) || maxExchanges <= 0) {
            throw new Error(`Invalid maxExchanges ${maxExchanges}`);
        }
    }

    public get sessionCount(): number {
        return this.sessions.size;
    }

    public createSessionId(): string {
        ++this.sessionCounter;
        return `session_${this.sessionCounter}`;
    }

    public async get(sessionId: string): Promise<Exchange[]> {
        const exchanges = this.sessions.get(sessionId);
        return exchanges ? [...exchanges] : [];
    }

    public async append(sessionId: string, exchange: Exchange): Promise<void> {
        let exchanges = this.sessions.get(sessionId);
        if (exchanges === undefined) {
            exchanges = [];
            this.sessions.set(sessionId, exchanges);
        }
        exchanges.push({ ...exchange });
        if (exchanges.length > this.maxExchanges) {
            exchanges.splice(0, exchanges.length - this.maxExchanges);
        }
    }
}

/**
 * Render history for a prompt
 * @param exchanges
 * @returns "User: ..." and "Assistant: ..." lines, oldest first
 */
export function formatHistory(exchanges: Exchange[]): string {
    const lines: string[] = [];
    for (const exchange of exchanges) {
        lines.push(`User: ${exchange.query}`);
        lines.push(`Assistant: ${exchange.answer}`);
    }
    return lines.join("\n");
}
