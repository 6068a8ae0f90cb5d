/**
 * @fileoverview Unit tests for the decoder configuration loader
 *
 * Tests cover:
 * - loadDecoderConfig function
 * - loadDecoderConfigWithFallback function
 * - applyEnvOverrides function
 * - Error handling for invalid files and values
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
    applyEnvOverrides,
    getDefaultConfig,
    loadDecoderConfig,
    loadDecoderConfigWithFallback,
    parseBooleanFlag,
    parsePositiveInteger,
} from "../config/loadConfig.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

describe("loadConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterEach(() => {
        vi.clearAllMocks();
    });

    describe("loadDecoderConfig", () => {
        // Scenario: Every key set
        it("should load and parse a complete config file", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`
maxIterations: 5
verbose: true
flagPrefixes: [DUCTF]
rulesDirs:
  - rules
  - /opt/unravel/rules
`);

            const config = loadDecoderConfig("/etc/unravel/unravel.yml");

            expect(config).toEqual({
                maxIterations: 5,
                verbose      : true,
                flagPrefixes : ["DUCTF"],
                rulesDirs    : ["/etc/unravel/rules", "/opt/unravel/rules"],
            });
        });

        // Scenario: Missing keys take defaults
        it("should fill in defaults for missing keys", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("maxIterations: 3\n");

            expect(loadDecoderConfig("/etc/unravel/unravel.yml")).toEqual({
                ...getDefaultConfig(),
                maxIterations: 3,
            });
        });

        it("should treat an empty file as all defaults", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("");

            expect(loadDecoderConfig("/etc/unravel/unravel.yml")).toEqual(getDefaultConfig());
        });

        it("should throw when the file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadDecoderConfig("/missing.yml")).toThrow("Config file not found: /missing.yml");
        });

        it("should throw when the document is not a mapping", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("- a\n- b\n");

            expect(() => loadDecoderConfig("/x.yml")).toThrow("Invalid config file format: expected a mapping");
        });

        it("should reject a non-positive iteration limit", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("maxIterations: 0\n");

            expect(() => loadDecoderConfig("/x.yml"))
                .toThrow("Invalid config: 'maxIterations' must be a positive integer");
        });

        it("should reject a quoted boolean", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("verbose: \"true\"\n");

            expect(() => loadDecoderConfig("/x.yml")).toThrow("Invalid config: 'verbose' must be a boolean");
        });

        it("should reject non-string flag prefixes", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("flagPrefixes: [1, 2]\n");

            expect(() => loadDecoderConfig("/x.yml"))
                .toThrow("Invalid config: 'flagPrefixes' must be a list of strings");
        });
    });

    describe("loadDecoderConfigWithFallback", () => {
        // Scenario: Fallback on missing file
        it("should return defaults and warn when loading fails", () => {
            mockExistsSync.mockReturnValue(false);
            const consoleSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

            const config = loadDecoderConfigWithFallback("/missing.yml");

            expect(config).toEqual(getDefaultConfig());
            expect(consoleSpy).toHaveBeenCalledWith(
                "Failed to load config from /missing.yml: Config file not found: /missing.yml"
            );

            consoleSpy.mockRestore();
        });

        it("should warn through an injected logger", () => {
            mockExistsSync.mockReturnValue(false);
            const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

            loadDecoderConfigWithFallback("/missing.yml", logger);

            expect(logger.warn).toHaveBeenCalledWith(
                "Failed to load config from /missing.yml: Config file not found: /missing.yml"
            );
        });

        it("should return the loaded config on success", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("verbose: true\n");

            expect(loadDecoderConfigWithFallback("/x.yml").verbose).toBe(true);
        });
    });

    describe("applyEnvOverrides", () => {
        it("should apply both variables", () => {
            const config = applyEnvOverrides(getDefaultConfig(), {
                UNRAVEL_MAX_ITERATIONS: "3",
                UNRAVEL_VERBOSE       : "yes",
            });

            expect(config.maxIterations).toBe(3);
            expect(config.verbose).toBe(true);
        });

        // Scenario: Unset and empty variables change nothing
        it("should ignore unset and empty variables", () => {
            const base = { ...getDefaultConfig(), maxIterations: 7, verbose: true };

            expect(applyEnvOverrides(base, {})).toEqual(base);
            expect(applyEnvOverrides(base, { UNRAVEL_MAX_ITERATIONS: "", UNRAVEL_VERBOSE: " " })).toEqual(base);
        });

        it("should not modify the input config", () => {
            const base = getDefaultConfig();

            applyEnvOverrides(base, { UNRAVEL_MAX_ITERATIONS: "4" });

            expect(base.maxIterations).toBe(10);
        });

        it("should reject unparseable values", () => {
            expect(() => applyEnvOverrides(getDefaultConfig(), { UNRAVEL_MAX_ITERATIONS: "abc" }))
                .toThrow("Invalid UNRAVEL_MAX_ITERATIONS: \"abc\" (expected a positive integer)");
            expect(() => applyEnvOverrides(getDefaultConfig(), { UNRAVEL_MAX_ITERATIONS: "0" }))
                .toThrow("Invalid UNRAVEL_MAX_ITERATIONS");
            expect(() => applyEnvOverrides(getDefaultConfig(), { UNRAVEL_VERBOSE: "maybe" }))
                .toThrow("Invalid UNRAVEL_VERBOSE: \"maybe\" (expected true or false)");
        });
    });

    describe("value parsers", () => {
        it("should parse positive integers only", () => {
            expect(parsePositiveInteger("12")).toBe(12);
            expect(parsePositiveInteger(" 8 ")).toBe(8);
            expect(parsePositiveInteger("0")).toBeNull();
            expect(parsePositiveInteger("-1")).toBeNull();
            expect(parsePositiveInteger("1.5")).toBeNull();
        });

        it("should parse boolean switches", () => {
            expect(parseBooleanFlag("TRUE")).toBe(true);
            expect(parseBooleanFlag("on")).toBe(true);
            expect(parseBooleanFlag("0")).toBe(false);
            expect(parseBooleanFlag("off")).toBe(false);
            expect(parseBooleanFlag("2")).toBeNull();
        });
    });
});
