// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { success, error, Result } from "typechat";
import registerDebug from "debug";

const debugUrl = registerDebug("aiclient:rest:url");
const debugHeader = registerDebug("aiclient:rest:header");
const debugError = registerDebug("aiclient:rest:error");

export type FetchThrottler = (fn: () => Promise<Response>) => Promise<Response>;

export type FetchOptions = {
    /**
     * Maximum retries of transient Http errors. Default is 0: callers own retry policy
     */
    retryMaxAttempts?: number | undefined;
    retryPauseMs?: number | undefined;
    /**
     * Total time allowed, in milliseconds. Default is 1 minute
     */
    timeout?: number | undefined;
    throttler?: FetchThrottler | undefined;
    /**
     * Aborts the request, including any pending retries
     */
    signal?: AbortSignal | undefined;
};

/**
 * POST a JSON body to an API
 * @param headers
 * @param url
 * @param body
 * @param options
 * @returns
 */
export function callApi(
    headers: Record<string, string>,
    url: string,
    body: object,
    options?: FetchOptions,
): Promise<Result<Response>> {
    const init: RequestInit = {
        method: "POST",
        body: JSON.stringify(body),
        headers: {
            "content-type": "application/json",
            ...headers,
        },
    };
    return fetchWithRetry(url, init, options);
}

/**
 * POST a JSON body to an API and return the parsed Json response
 */
export async function callJsonApi(
    headers: Record<string, string>,
    url: string,
    body: object,
    options?: FetchOptions,
): Promise<Result<unknown>> {
    const result = await callApi(headers, url, body, options);
    if (!result.success) {
        return result;
    }
    try {
        const json: unknown = await result.data.json();
        return success(json);
    } catch (e) {
        return error(`callJsonApi(): .json(): ${errorMessage(e)}`);
    }
}

/**
 * fetch that automatically retries transient Http errors
 * @param url
 * @param init
 * @param options
 * @returns Response object
 */
export async function fetchWithRetry(
    url: string,
    init?: RequestInit,
    options?: FetchOptions,
): Promise<Result<Response>> {
    const retryMaxAttempts = options?.retryMaxAttempts ?? 0;
    const retryPauseMs = options?.retryPauseMs ?? 1000;
    const timeout = options?.timeout ?? 60_000;

    let retryCount = 0;
    const startTime = Date.now();
    try {
        while (true) {
            const response = await callFetch(url, init, timeout, options);
            debugHeader(response.status, response.statusText);
            if (response.status === 200 || response.status === 201) {
                return success(response);
            }
            const timeTaken = Date.now() - startTime;
            if (
                !isTransientHttpError(response.status) ||
                retryCount >= retryMaxAttempts ||
                timeTaken > timeout
            ) {
                return error(
                    `fetch error: ${await getErrorMessage(response, retryCount, timeTaken)}`,
                );
            }
            if (debugError.enabled) {
                debugError(await getErrorMessage(response));
            }
            // Honor Retry-After, backing off further with each retry
            await sleep(
                getRetryAfterMs(response, retryPauseMs) +
                    retryCount * retryPauseMs,
                options?.signal,
            );
            retryCount++;
        }
    } catch (e) {
        return error(`fetch error: ${errorMessage(e)}`);
    }
}

/**
 * When servers return a 429, they can include a Retry-After header that says how long the caller
 * should wait before retrying
 * @returns How many milliseconds to pause before retrying
 */
export function getRetryAfterMs(
    response: Response,
    defaultValue: number,
): number {
    const pauseHeader = response.headers.get("Retry-After")?.trim();
    if (!pauseHeader) {
        return defaultValue;
    }
    const seconds = Number.parseInt(pauseHeader, 10);
    const pauseMs = Number.isNaN(seconds)
        ? new Date(pauseHeader).getTime() - Date.now()
        : seconds * 1000;
    if (Number.isNaN(pauseMs)) {
        console.log(`Failed to parse Retry-After header ${pauseHeader}`);
        return defaultValue;
    }
    return pauseMs > 0 ? pauseMs : defaultValue;
}

async function callFetch(
    url: string,
    init: RequestInit | undefined,
    timeout: number,
    options?: FetchOptions,
): Promise<Response> {
    const throttler = options?.throttler;
    const signal = options?.signal;
    return throttler
        ? throttler(() => fetchWithTimeout(url, init, timeout, signal))
        : fetchWithTimeout(url, init, timeout, signal);
}

async function fetchWithTimeout(
    url: string,
    init: RequestInit | undefined,
    timeoutMs: number,
    signal?: AbortSignal,
): Promise<Response> {
    debugUrl(url);
    signal?.throwIfAborted();

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort);
    const id =
        timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
    try {
        return await fetch(url, { ...init, signal: controller.signal });
    } catch (e) {
        if (e instanceof Error && e.name === "AbortError") {
            throw new Error(
                signal?.aborted ? "fetch aborted" : `fetch timeout ${timeoutMs}ms`,
            );
        }
        throw e;
    } finally {
        clearTimeout(id);
        signal?.removeEventListener("abort", onAbort);
    }
}

async function getErrorMessage(
    response: Response,
    retries?: number,
    timeTaken?: number,
): Promise<string> {
    let bodyMessage = "";
    try {
        const bodyText = await response.text();
        debugError(bodyText);
        bodyMessage = getBodyErrorMessage(JSON.parse(bodyText));
    } catch {
        // Body is not Json: report the status alone
        bodyMessage = "";
    }
    return `${response.status}: ${response.statusText}${bodyMessage ? `: ${bodyMessage}` : ""}${retries !== undefined ? ` Quitting after ${retries} retries` : ""}${timeTaken !== undefined ? ` in ${timeTaken}ms` : ""}`;
}

function getBodyErrorMessage(body: unknown): string {
    if (typeof body !== "object" || body === null || !("error" in body)) {
        return "";
    }
    const bodyError = body.error;
    if (typeof bodyError === "string") {
        return bodyError;
    }
    if (
        typeof bodyError === "object" &&
        bodyError !== null &&
        "message" in bodyError &&
        typeof bodyError.message === "string"
    ) {
        return bodyError.message;
    }
    return JSON.stringify(bodyError);
}

enum HttpStatusCode {
    TooManyRequests = 429,
    InternalServerError = 500,
    BadGateway = 502,
    ServiceUnavailable = 503,
    GatewayTimeout = 504,
}

function isTransientHttpError(code: number): boolean {
    switch (code) {
        case HttpStatusCode.TooManyRequests:
        case HttpStatusCode.InternalServerError:
        case HttpStatusCode.BadGateway:
        case HttpStatusCode.ServiceUnavailable:
        case HttpStatusCode.GatewayTimeout:
            return true;
    }
    return false;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(id);
            reject(new Error("fetch aborted"));
        };
        const id = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) {
        return e.cause instanceof Error ? e.cause.message : e.message;
    }
    return String(e);
}
