/**
 * @fileoverview Unit tests for ValidatorLoader
 *
 * Tests cover:
 * - createValidatorFromYaml factory
 * - Rule definition type guard
 * - YAML rule loading from files and directories
 * - Invalid files and entries
 *
 * @module @unravel/engine/__tests__/ValidatorLoader
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
    ValidatorLoader,
    createValidatorFromYaml,
    isYamlValidatorDefinition,
    type YamlValidatorDefinition,
} from "../plugins/ValidatorLoader.js";
import { analyze } from "../analysis/TextAnalyzer.js";
import type { EngineLogger } from "../contracts/Logger.js";

/**
 * Create a mock logger for testing
 */
function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("createValidatorFromYaml", () => {
    // Scenario: Regex rule matches decoded text
    it("should match with a case-insensitive regex", () => {
        const def: YamlValidatorDefinition = {
            name  : "pem-block",
            match : { regex: "^-----begin [a-z ]+-----" },
            status: "COMPLETE",
        };

        const validator = createValidatorFromYaml(def);
        const result = validator.validate("x", analyze("-----BEGIN PUBLIC KEY-----"));

        expect(validator.id).toBe("yaml:pem-block");
        expect(result).toEqual({
            status     : "COMPLETE",
            reason     : "Matched rule pem-block",
            confidence : 1.0,
            validatorId: "yaml:pem-block",
        });
    });

    // Scenario: Contains rule with explicit confidence and reason
    it("should match with a case-insensitive substring", () => {
        const def: YamlValidatorDefinition = {
            name      : "jwt",
            match     : { contains: "eyJhbGci" },
            status    : "PARTIAL",
            confidence: 0.7,
            reason    : "JWT header found",
        };

        const result = createValidatorFromYaml(def).validate("x", analyze("token EYJHBGCI.rest"));

        expect(result).toEqual({
            status     : "PARTIAL",
            reason     : "JWT header found",
            confidence : 0.7,
            validatorId: "yaml:jwt",
        });
    });

    it("should return null when nothing matches", () => {
        const def: YamlValidatorDefinition = {
            name  : "pem-block",
            match : { contains: "-----BEGIN" },
            status: "COMPLETE",
        };

        expect(createValidatorFromYaml(def).validate("x", analyze("Hello World"))).toBeNull();
    });
});

describe("isYamlValidatorDefinition", () => {
    it("should accept a complete definition", () => {
        expect(isYamlValidatorDefinition({
            name      : "pem",
            match     : { contains: "-----BEGIN" },
            status    : "COMPLETE",
            confidence: 0.9,
        })).toBe(true);
    });

    it("should reject malformed definitions", () => {
        expect(isYamlValidatorDefinition(null)).toBe(false);
        expect(isYamlValidatorDefinition({ name: "a", match: { contains: "b" } })).toBe(false);
        expect(isYamlValidatorDefinition({ name: "a", match: { contains: "b" }, status: "DONE" })).toBe(false);
        expect(isYamlValidatorDefinition({ name: "a", match: {}, status: "COMPLETE" })).toBe(false);
        expect(isYamlValidatorDefinition({ name: "a", match: { regex: 5 }, status: "COMPLETE" })).toBe(false);
        expect(isYamlValidatorDefinition({ name: "a", match: { contains: "b" }, status: "COMPLETE", confidence: 2 }))
            .toBe(false);
    });
});

describe("ValidatorLoader", () => {
    let logger: EngineLogger;
    let loader: ValidatorLoader;
    let rulesDir: string;

    beforeEach(() => {
        logger = createMockLogger();
        loader = new ValidatorLoader({ logger });
        rulesDir = mkdtempSync(join(tmpdir(), "unravel-rules-"));
    });

    afterEach(() => {
        rmSync(rulesDir, { recursive: true, force: true });
    });

    describe("loadYamlFile", () => {
        // Scenario: File with a list of rules
        it("should load every rule in a list", () => {
            const filePath = join(rulesDir, "markers.yml");
            writeFileSync(filePath, `
- name: pem-block
  match:
    contains: "-----BEGIN"
  status: COMPLETE
  confidence: 0.9
- name: jwt
  match:
    regex: "^eyJ"
  status: PARTIAL
`);

            const validators = loader.loadYamlFile(filePath);

            expect(validators.map((validator) => validator.id)).toEqual(["yaml:pem-block", "yaml:jwt"]);
        });

        // Scenario: File with a single rule object
        it("should load a single rule", () => {
            const filePath = join(rulesDir, "single.yaml");
            writeFileSync(filePath, "name: one\nmatch:\n  contains: abc\nstatus: FAILED\n");

            expect(loader.loadYamlFile(filePath).map((validator) => validator.id)).toEqual(["yaml:one"]);
        });

        it("should skip invalid entries with a warning", () => {
            const filePath = join(rulesDir, "mixed.yml");
            writeFileSync(filePath, `
- name: good
  match:
    contains: abc
  status: COMPLETE
- name: no-status
  match:
    contains: abc
- name: bad-regex
  match:
    regex: "("
  status: COMPLETE
`);

            const validators = loader.loadYamlFile(filePath);

            expect(validators.map((validator) => validator.id)).toEqual(["yaml:good"]);
            expect(logger.warn).toHaveBeenCalledWith("Skipping invalid rule definition", { filePath });
            expect(logger.warn).toHaveBeenCalledWith("Skipping rule with invalid pattern", expect.objectContaining({
                filePath,
                name: "bad-regex",
            }));
        });

        it("should return nothing for an empty file", () => {
            const filePath = join(rulesDir, "empty.yml");
            writeFileSync(filePath, "");

            expect(loader.loadYamlFile(filePath)).toEqual([]);
        });
    });

    describe("loadFromDirectory", () => {
        // Scenario: Only YAML files are read, in name order
        it("should load YAML files sorted by name", () => {
            writeFileSync(join(rulesDir, "b.yml"), "name: second\nmatch:\n  contains: b\nstatus: COMPLETE\n");
            writeFileSync(join(rulesDir, "a.yaml"), "name: first\nmatch:\n  contains: a\nstatus: COMPLETE\n");
            writeFileSync(join(rulesDir, "notes.txt"), "name: ignored");

            const validators = loader.loadFromDirectory(rulesDir);

            expect(validators.map((validator) => validator.id)).toEqual(["yaml:first", "yaml:second"]);
            expect(logger.info).toHaveBeenCalledWith("Rules loaded from directory", {
                dirPath   : rulesDir,
                validators: 2,
            });
        });

        // Scenario: Unparseable file is skipped, the rest still load
        it("should log and skip files that fail to parse", () => {
            writeFileSync(join(rulesDir, "a.yml"), "name: [unclosed\n");
            writeFileSync(join(rulesDir, "b.yml"), "name: ok\nmatch:\n  contains: b\nstatus: COMPLETE\n");

            const validators = loader.loadFromDirectory(rulesDir);

            expect(validators.map((validator) => validator.id)).toEqual(["yaml:ok"]);
            expect(logger.error).toHaveBeenCalledWith("Failed to load rule file", expect.objectContaining({
                filePath: join(rulesDir, "a.yml"),
            }));
        });

        it("should warn about a missing directory", () => {
            const missing = join(rulesDir, "missing");

            expect(loader.loadFromDirectory(missing)).toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith("Rules directory does not exist", { dirPath: missing });
        });

        it("should warn when the path is a file", () => {
            const filePath = join(rulesDir, "a.yml");
            writeFileSync(filePath, "");

            expect(loader.loadFromDirectory(filePath)).toEqual([]);
            expect(logger.warn).toHaveBeenCalledWith("Rules path is not a directory", { dirPath: filePath });
        });
    });

    describe("loadFromDirectories", () => {
        it("should concatenate directories in order", () => {
            const systemDir = join(rulesDir, "system");
            const userDir = join(rulesDir, "user");
            mkdirSync(systemDir);
            mkdirSync(userDir);
            writeFileSync(join(userDir, "u.yml"), "name: user-rule\nmatch:\n  contains: u\nstatus: COMPLETE\n");
            writeFileSync(join(systemDir, "s.yml"), "name: system-rule\nmatch:\n  contains: s\nstatus: COMPLETE\n");

            const validators = loader.loadFromDirectories([systemDir, userDir]);

            expect(validators.map((validator) => validator.id)).toEqual(["yaml:system-rule", "yaml:user-rule"]);
        });
    });
});
