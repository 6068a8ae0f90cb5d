/**
 * @fileoverview Decoder Configuration Loader
 *
 * Loads CLI defaults from a YAML file and applies environment overrides.
 *
 * ```yaml
 * maxIterations: 10
 * verbose: false
 * flagPrefixes: [DUCTF]
 * rulesDirs: [../rules/system, ../user/rules]
 * ```
 *
 * Relative rule directories are resolved against the config file's own
 * directory.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { errorMessage, type EngineLogger } from "@unravel/engine";

/**
 * Resolved decoder configuration.
 */
export interface DecoderConfig {
    /** Iteration cap per run */
    maxIterations: number;

    /** Log step-by-step engine progress */
    verbose: boolean;

    /** Flag prefixes recognised in addition to the built-in ones */
    flagPrefixes: string[];

    /** Directories of YAML validator rules, loaded in order */
    rulesDirs: string[];
}

/**
 * Environment variables read by applyEnvOverrides.
 */
export const ENV_MAX_ITERATIONS = "UNRAVEL_MAX_ITERATIONS";
export const ENV_VERBOSE = "UNRAVEL_VERBOSE";

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Parse a positive integer, or return null.
 */
export function parsePositiveInteger(value: string): number | null {
    if (!/^\d+$/.test(value.trim())) {
        return null;
    }
    const parsed = Number.parseInt(value, 10);
    return parsed > 0 ? parsed : null;
}

/**
 * Parse a boolean switch ("1", "true", "yes", "on" and their negatives).
 */
export function parseBooleanFlag(value: string): boolean | null {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
    }
    if (["0", "false", "no", "off", ""].includes(normalized)) {
        return false;
    }
    return null;
}

/**
 * Load the decoder configuration from a YAML file.
 *
 * Every key is optional; missing keys take their default.
 *
 * @param filePath - Path to the unravel.yml file
 * @returns Resolved configuration
 * @throws Error if the file doesn't exist or a key has the wrong type
 *
 * @example
 * ```typescript
 * const config = loadDecoderConfig("./config/unravel.yml");
 * // { maxIterations: 10, verbose: false, flagPrefixes: [], rulesDirs: [...] }
 * ```
 */
export function loadDecoderConfig(filePath: string): DecoderConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content) ?? {};

    if (!isRecord(parsed)) {
        throw new Error("Invalid config file format: expected a mapping");
    }

    const config = getDefaultConfig();

    const { maxIterations, verbose, flagPrefixes, rulesDirs } = parsed;

    if (maxIterations !== undefined) {
        if (typeof maxIterations !== "number" || !Number.isInteger(maxIterations) || maxIterations <= 0) {
            throw new Error("Invalid config: 'maxIterations' must be a positive integer");
        }
        config.maxIterations = maxIterations;
    }

    if (verbose !== undefined) {
        if (typeof verbose !== "boolean") {
            throw new Error("Invalid config: 'verbose' must be a boolean");
        }
        config.verbose = verbose;
    }

    if (flagPrefixes !== undefined) {
        if (!isStringArray(flagPrefixes)) {
            throw new Error("Invalid config: 'flagPrefixes' must be a list of strings");
        }
        config.flagPrefixes = flagPrefixes;
    }

    if (rulesDirs !== undefined) {
        if (!isStringArray(rulesDirs)) {
            throw new Error("Invalid config: 'rulesDirs' must be a list of strings");
        }
        const baseDir = dirname(filePath);
        config.rulesDirs = rulesDirs.map((dir) => resolve(baseDir, dir));
    }

    return config;
}

/**
 * Load the decoder configuration with fallback to defaults.
 *
 * @param filePath - Path to the unravel.yml file
 * @param logger - Receives the warning when loading fails
 */
export function loadDecoderConfigWithFallback(filePath: string, logger?: EngineLogger): DecoderConfig {
    try {
        return loadDecoderConfig(filePath);
    }
    catch (error) {
        const message = `Failed to load config from ${filePath}: ${errorMessage(error)}`;
        if (logger) {
            logger.warn(message);
        }
        else {
            console.warn(message);
        }
        return getDefaultConfig();
    }
}

/**
 * Apply UNRAVEL_MAX_ITERATIONS and UNRAVEL_VERBOSE on top of a config.
 * Unset or empty variables leave the config as it is.
 *
 * @param config - Configuration loaded from file
 * @param env - Environment (default: process.env, after dotenv has loaded .env)
 * @throws Error if a variable is set to an unparseable value
 */
export function applyEnvOverrides(
    config: DecoderConfig,
    env: Readonly<Record<string, string | undefined>> = process.env
): DecoderConfig {
    const result: DecoderConfig = { ...config };

    const rawMax = env[ENV_MAX_ITERATIONS];
    if (rawMax !== undefined && rawMax.trim() !== "") {
        const maxIterations = parsePositiveInteger(rawMax);
        if (maxIterations === null) {
            throw new Error(`Invalid ${ENV_MAX_ITERATIONS}: "${rawMax}" (expected a positive integer)`);
        }
        result.maxIterations = maxIterations;
    }

    const rawVerbose = env[ENV_VERBOSE];
    if (rawVerbose !== undefined && rawVerbose.trim() !== "") {
        const verbose = parseBooleanFlag(rawVerbose);
        if (verbose === null) {
            throw new Error(`Invalid ${ENV_VERBOSE}: "${rawVerbose}" (expected true or false)`);
        }
        result.verbose = verbose;
    }

    return result;
}

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): DecoderConfig {
    return {
        maxIterations: 10,
        verbose      : false,
        flagPrefixes : [],
        rulesDirs    : [],
    };
}
