// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    getEnvSetting,
    getIntFromEnv,
} from "../src/common.js";

describe("common", () => {
    const env = {
        OPENAI_API_KEY: "test-secret",
        OPENAI_API_KEY_SECONDARY: "test-secret-2",
        OPENAI_MAX_CONCURRENCY: "4",
        OPENAI_TIMEOUT_MS: "abc",
        OPENAI_MAX_RETRY_ATTEMPTS: "0",
    };
    test("getEnvSetting", () => {
        expect(getEnvSetting(env, "OPENAI_API_KEY")).toEqual("test-secret");
        expect(getEnvSetting(env, "OPENAI_API_KEY", "SECONDARY")).toEqual(
            "test-secret-2",
        );
        // Falls back to the unsuffixed key
        expect(getEnvSetting(env, "OPENAI_API_KEY", "OTHER")).toEqual(
            "test-secret",
        );
        expect(getEnvSetting(env, "OPENAI_MODEL", undefined, "m")).toEqual(
            "m",
        );
        expect(() => getEnvSetting(env, "OPENAI_MODEL")).toThrow(
            "Missing ApiSetting: OPENAI_MODEL",
        );
    });
    test("getIntFromEnv", () => {
        expect(getIntFromEnv(env, "OPENAI_MAX_CONCURRENCY")).toEqual(4);
        expect(getIntFromEnv(env, "OPENAI_ENDPOINT")).toBeUndefined();
        expect(getIntFromEnv(env, "OPENAI_ENDPOINT", undefined, 7)).toEqual(7);
        expect(() => getIntFromEnv(env, "OPENAI_TIMEOUT_MS")).toThrow(
            "Invalid value for OPENAI_TIMEOUT_MS: abc",
        );
        expect(() => getIntFromEnv(env, "OPENAI_MAX_RETRY_ATTEMPTS")).toThrow(
            "Invalid value for OPENAI_MAX_RETRY_ATTEMPTS: 0",
        );
    });
});
