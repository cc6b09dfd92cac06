// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * A course document could not be parsed. Ingestion of that document is aborted
 */
export class ParseError extends Error {
    constructor(
        message: string,
        public readonly sourceName?: string | undefined,
    ) {
        super(sourceName ? `${sourceName}: ${message}` : message);
        this.name = "ParseError";
    }
}

/**
 * The tool loop went wrong: too many tool rounds, unknown tools or malformed arguments.
 * Logged; the turn still completes with a best-effort answer
 */
export class OrchestrationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "OrchestrationError";
    }
}

/**
 * An external service (embedding model, vector store, generation service) failed.
 * Not retried here: callers decide their retry policy
 */
export class ServiceUnavailableError extends Error {
    constructor(
        public readonly serviceName: string,
        message: string,
    ) {
        super(`${serviceName} unavailable: ${message}`);
        this.name = "ServiceUnavailableError";
    }
}

/**
 * The caller cancelled a query turn. Nothing was written to session history
 */
export class TurnCancelledError extends Error {
    constructor() {
        super("Query cancelled");
        this.name = "TurnCancelledError";
    }
}

export class SettingsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SettingsError";
    }
}

export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new TurnCancelledError();
    }
}
