// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type EnvRecord = Record<string, string | undefined>;

/**
 * Retrieve a setting from environment variables.
 * With an endpoint name, `KEY_<endpointName>` is tried first, then `KEY`.
 * @param env environment variables
 * @param key setting key
 * @param endpointName optional suffix; lets you target different backends
 * @param defaultValue used when neither variable is set
 * @returns the setting. Throws if the setting is missing and there is no default
 */
export function getEnvSetting(
    env: EnvRecord,
    key: string,
    endpointName?: string,
    defaultValue?: string,
): string {
    const value =
        (endpointName ? env[`${key}_${endpointName}`] : undefined) ??
        env[key] ??
        defaultValue;
    if (value === undefined) {
        throw new Error(`Missing ApiSetting: ${key}`);
    }
    return value;
}

/**
 * Read a positive integer setting
 * @returns the number, or defaultValue if the setting is not present
 */
export function getIntFromEnv(
    env: EnvRecord,
    key: string,
    endpointName?: string,
    defaultValue?: number,
): number | undefined {
    const numString = getEnvSetting(env, key, endpointName, "").trim();
    if (!numString) {
        return defaultValue;
    }
    const num = Number.parseInt(numString, 10);
    if (num.toString() !== numString || num <= 0) {
        throw new Error(`Invalid value for ${key}: ${numString}`);
    }
    return num;
}
