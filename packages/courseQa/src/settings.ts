// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EnvRecord, getIntFromEnv } from "@course-qa/aiclient";
import { SettingsError } from "./errors.js";

export type ChunkingSettings = {
    /**
     * Target size of a chunk, in characters
     */
    chunkSize: number;
    /**
     * Characters carried over from the tail of a chunk into the head of the next
     */
    chunkOverlap: number;
};

export type CourseQaSettings = ChunkingSettings & {
    /**
     * Maximum content chunks returned by a search
     */
    maxResults: number;
    /**
     * Maximum exchanges kept per session
     */
    maxHistory: number;
    /**
     * Maximum rounds of tool calls in one query turn
     */
    maxToolRounds: number;
    /**
     * Minimum catalog similarity for a course name to resolve
     */
    minCourseNameScore: number;
};

export enum EnvVars {
    COURSE_QA_CHUNK_SIZE = "COURSE_QA_CHUNK_SIZE",
    COURSE_QA_CHUNK_OVERLAP = "COURSE_QA_CHUNK_OVERLAP",
    COURSE_QA_MAX_RESULTS = "COURSE_QA_MAX_RESULTS",
    COURSE_QA_MAX_HISTORY = "COURSE_QA_MAX_HISTORY",
    COURSE_QA_MAX_TOOL_ROUNDS = "COURSE_QA_MAX_TOOL_ROUNDS",
}

export function createCourseQaSettings(
    overrides?: Partial<CourseQaSettings>,
): CourseQaSettings {
    const settings: CourseQaSettings = {
        chunkSize: 800,
        chunkOverlap: 100,
        maxResults: 5,
        maxHistory: 2,
        maxToolRounds: 2,
        minCourseNameScore: 0.3,
        ...overrides,
    };
    validateSettings(settings);
    return settings;
}

/**
 * Load settings from environment variables. Unset variables keep their defaults
 * @param env
 * @returns
 */
export function courseQaSettingsFromEnv(env?: EnvRecord): CourseQaSettings {
    env ??= process.env;
    const defaults = createCourseQaSettings();
    try {
        return createCourseQaSettings({
            chunkSize:
                getIntFromEnv(env, EnvVars.COURSE_QA_CHUNK_SIZE) ??
                defaults.chunkSize,
            chunkOverlap:
                getIntFromEnv(env, EnvVars.COURSE_QA_CHUNK_OVERLAP) ??
                defaults.chunkOverlap,
            maxResults:
                getIntFromEnv(env, EnvVars.COURSE_QA_MAX_RESULTS) ??
                defaults.maxResults,
            maxHistory:
                getIntFromEnv(env, EnvVars.COURSE_QA_MAX_HISTORY) ??
                defaults.maxHistory,
            maxToolRounds:
                getIntFromEnv(env, EnvVars.COURSE_QA_MAX_TOOL_ROUNDS) ??
                defaults.maxToolRounds,
        });
    } catch (e) {
        if (e instanceof SettingsError) {
            throw e;
        }
        throw new SettingsError(e instanceof Error ? e.message : String(e));
    }
}

export function validateSettings(settings: CourseQaSettings): void {
    const integers: (keyof CourseQaSettings)[] = [
        "chunkSize",
        "chunkOverlap",
        "maxResults",
        "maxHistory",
        "maxToolRounds",
    ];
    for (const name of integers) {
        const value = settings[name];
        if (!Number.isInteger(value) || value <= 0) {
            throw new SettingsError(
                `${name} must be a positive integer: ${value}`,
            );
        }
    }
    if (settings.chunkOverlap >= settings.chunkSize) {
        throw new SettingsError(
            `chunkOverlap (${settings.chunkOverlap}) must be less than chunkSize (${settings.chunkSize})`,
        );
    }
    const minScore = settings.minCourseNameScore;
    if (!(minScore >= -1 && minScore <= 1)) {
        throw new SettingsError(
            `minCourseNameScore must be between -1 and 1: ${minScore}`,
        );
    }
}
