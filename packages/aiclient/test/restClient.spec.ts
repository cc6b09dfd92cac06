// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    callJsonApi,
    fetchWithRetry,
    getRetryAfterMs,
} from "../src/restClient.js";

function jsonResponse(body: unknown, status = 200, statusText = "OK") {
    return new Response(JSON.stringify(body), { status, statusText });
}

describe("restClient", () => {
    let fetchMock: jest.SpiedFunction<typeof fetch>;
    beforeEach(() => {
        fetchMock = jest.spyOn(globalThis, "fetch");
    });
    afterEach(() => {
        fetchMock.mockRestore();
    });

    test("callJsonApi", async () => {
        fetchMock.mockResolvedValueOnce(jsonResponse({ value: 42 }));
        const result = await callJsonApi(
            { Authorization: "Bearer test-secret" },
            "https://example.com/api",
            { input: "hello" },
        );
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data).toEqual({ value: 42 });
        }
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toEqual("https://example.com/api");
        expect(init?.method).toEqual("POST");
        expect(init?.headers).toEqual({
            "content-type": "application/json",
            Authorization: "Bearer test-secret",
        });
        expect(JSON.parse(String(init?.body))).toEqual({ input: "hello" });
    });
    test("retryTransient", async () => {
        fetchMock
            .mockResolvedValueOnce(
                jsonResponse({}, 503, "Service Unavailable"),
            )
            .mockResolvedValueOnce(jsonResponse({ ok: true }));
        const result = await fetchWithRetry("https://example.com/api", undefined, {
            retryMaxAttempts: 2,
            retryPauseMs: 1,
        });
        expect(result.success).toBe(true);
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });
    test("retryReleasesAbortListeners", async () => {
        fetchMock
            .mockResolvedValueOnce(
                jsonResponse({}, 503, "Service Unavailable"),
            )
            .mockResolvedValueOnce(jsonResponse({ ok: true }));
        const controller = new AbortController();
        const addListener = jest.spyOn(controller.signal, "addEventListener");
        const removeListener = jest.spyOn(
            controller.signal,
            "removeEventListener",
        );
        const result = await fetchWithRetry("https://example.com/api", undefined, {
            retryMaxAttempts: 2,
            retryPauseMs: 1,
            signal: controller.signal,
        });
        expect(result.success).toBe(true);
        // Two requests and one pause between them
        expect(addListener).toHaveBeenCalledTimes(3);
        expect(removeListener).toHaveBeenCalledTimes(3);
    });
    test("noRetryByDefault", async () => {
        fetchMock.mockResolvedValueOnce(
            jsonResponse({}, 503, "Service Unavailable"),
        );
        const result = await fetchWithRetry("https://example.com/api");
        expect(result.success).toBe(false);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
    test("errorBody", async () => {
        fetchMock.mockResolvedValueOnce(
            jsonResponse(
                { error: { message: "bad input" } },
                400,
                "Bad Request",
            ),
        );
        const result = await fetchWithRetry("https://example.com/api", undefined, {
            retryMaxAttempts: 3,
            retryPauseMs: 1,
        });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.message).toContain(
                "fetch error: 400: Bad Request: bad input Quitting after 0 retries",
            );
        }
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
    test("abortedSignal", async () => {
        const controller = new AbortController();
        controller.abort();
        const result = await fetchWithRetry("https://example.com/api", undefined, {
            signal: controller.signal,
        });
        expect(result.success).toBe(false);
        expect(fetchMock).not.toHaveBeenCalled();
    });
    test("getRetryAfterMs", () => {
        const withHeader = new Response(null, {
            status: 429,
            headers: { "Retry-After": "2" },
        });
        expect(getRetryAfterMs(withHeader, 100)).toEqual(2000);
        const withoutHeader = new Response(null, { status: 429 });
        expect(getRetryAfterMs(withoutHeader, 100)).toEqual(100);
    });
});
