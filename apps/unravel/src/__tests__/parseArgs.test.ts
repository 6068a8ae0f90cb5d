/**
 * @fileoverview Unit tests for command-line parsing
 *
 * @module __tests__/parseArgs
 */

import { describe, it, expect } from "vitest";
import { parseArgs } from "../args.js";

describe("parseArgs", () => {
    it("should default every switch to off", () => {
        expect(parseArgs([])).toEqual({
            input  : null,
            verbose: false,
            json   : false,
            analyze: false,
            help   : false,
        });
    });

    it("should parse all options", () => {
        expect(parseArgs(["--max-iterations", "5", "--verbose", "--json", "--analyze", "--config", "/tmp/u.yml", "SGVsbG8="]))
            .toEqual({
                input        : "SGVsbG8=",
                maxIterations: 5,
                verbose      : true,
                json         : true,
                analyze      : true,
                configPath   : "/tmp/u.yml",
                help         : false,
            });
    });

    // Scenario: Unquoted text with spaces
    it("should join positional words with spaces", () => {
        expect(parseArgs(["Uryyb", "Jbeyq"]).input).toBe("Uryyb Jbeyq");
    });

    // Scenario: Input that starts with a dash
    it("should stop option parsing at --", () => {
        expect(parseArgs(["--", "--verbose"]).input).toBe("--verbose");
        expect(parseArgs(["--", "--verbose"]).verbose).toBe(false);
    });

    it("should recognise help", () => {
        expect(parseArgs(["-h"]).help).toBe(true);
        expect(parseArgs(["--help"]).help).toBe(true);
    });

    it("should reject a missing or invalid iteration limit", () => {
        expect(() => parseArgs(["--max-iterations"])).toThrow("--max-iterations requires a positive integer");
        expect(() => parseArgs(["--max-iterations", "0"])).toThrow("--max-iterations requires a positive integer");
        expect(() => parseArgs(["--max-iterations", "abc"])).toThrow("--max-iterations requires a positive integer");
    });

    it("should reject a missing config path", () => {
        expect(() => parseArgs(["--config"])).toThrow("--config requires a path");
    });

    it("should reject unknown options", () => {
        expect(() => parseArgs(["--fast"])).toThrow("Unknown option: --fast");
    });
});
