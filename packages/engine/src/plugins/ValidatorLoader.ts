/**
 * @fileoverview Validator Loader
 *
 * Loads validator rules from YAML files. A rule matches the decoded text
 * by regex or substring (both case-insensitive) and, on a match, returns a
 * fixed ValidationResult:
 *
 * ```yaml
 * - name: pem-block
 *   description: PEM armour
 *   match:
 *     contains: "-----BEGIN"
 *   status: COMPLETE
 *   confidence: 0.9
 *   reason: PEM block detected
 * ```
 *
 * @module @unravel/engine/plugins/ValidatorLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname } from "path";
import { parse as parseYaml } from "yaml";
import {
    createValidationResult,
    type ValidationStatus,
    type Validator,
} from "../contracts/Validation.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger, errorMessage } from "../contracts/Logger.js";

const VALIDATION_STATUSES: readonly ValidationStatus[] = ["COMPLETE", "PARTIAL", "FAILED"];

/**
 * YAML rule definition.
 */
export interface YamlValidatorDefinition {
    /** Unique name; the validator id becomes `yaml:<name>` */
    name: string;

    /** Human-readable description */
    description?: string;

    /** Match criteria (first criterion that hits wins) */
    match: {
        /** Regex pattern tested against the decoded text */
        regex?: string;

        /** Substring to look for (case-insensitive) */
        contains?: string;
    };

    /** Status to return on match */
    status: ValidationStatus;

    /** Confidence score (default 1.0) */
    confidence?: number;

    /** Reason to report (default: `Matched rule <name>`) */
    reason?: string;
}

/**
 * Validator loader configuration.
 */
export interface ValidatorLoaderConfig {
    /** Logger for rule loading */
    logger?: EngineLogger;
}

/**
 * Type guard for YAML rule definitions.
 */
export function isYamlValidatorDefinition(obj: unknown): obj is YamlValidatorDefinition {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }
    if (!("name" in obj) || typeof obj.name !== "string" || obj.name.length === 0) {
        return false;
    }
    if (!("match" in obj) || typeof obj.match !== "object" || obj.match === null) {
        return false;
    }
    if (!("status" in obj)) {
        return false;
    }
    const declared = obj.status;
    if (!VALIDATION_STATUSES.some((status) => status === declared)) {
        return false;
    }
    if ("confidence" in obj && obj.confidence !== undefined) {
        const confidence = obj.confidence;
        if (typeof confidence !== "number" || confidence < 0 || confidence > 1) {
            return false;
        }
    }

    const match = obj.match;
    const regex = "regex" in match ? match.regex : undefined;
    const contains = "contains" in match ? match.contains : undefined;

    return (
        (typeof regex === "string" || typeof contains === "string") &&
        (regex === undefined || typeof regex === "string") &&
        (contains === undefined || typeof contains === "string")
    );
}

/**
 * Create a Validator from a YAML definition.
 *
 * @param def - YAML rule definition
 * @returns Validator that matches based on the definition
 * @throws SyntaxError if the regex does not compile
 */
export function createValidatorFromYaml(def: YamlValidatorDefinition): Validator {
    const regexPattern = def.match.regex ? new RegExp(def.match.regex, "i") : null;
    const containsLower = def.match.contains?.toLowerCase();
    const confidence = def.confidence ?? 1.0;
    const reason = def.reason ?? `Matched rule ${def.name}`;

    return {
        id         : `yaml:${def.name}`,
        description: def.description,

        validate(_original, analysis) {
            // Check regex match
            if (regexPattern && regexPattern.test(analysis.text)) {
                return createValidationResult(def.status, reason, confidence, this.id);
            }

            // Check contains match
            if (containsLower && analysis.text.toLowerCase().includes(containsLower)) {
                return createValidationResult(def.status, reason, confidence, this.id);
            }

            return null;
        },
    };
}

/**
 * Validator Loader
 *
 * Loads validator rules from directories of YAML files.
 *
 * @example
 * ```typescript
 * const loader = new ValidatorLoader();
 * const customValidators = loader.loadFromDirectories(["./rules/system", "./rules/user"]);
 *
 * const engine = new DecoderEngine({ customValidators });
 * ```
 */
export class ValidatorLoader {
    private readonly logger: EngineLogger;

    constructor(config: ValidatorLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("ValidatorLoader");
    }

    /**
     * Load all rules from a directory (.yml / .yaml, sorted by file name).
     *
     * Files that fail to load are logged and skipped.
     *
     * @param dirPath - Path to rules directory
     */
    loadFromDirectory(dirPath: string): Validator[] {
        const validators: Validator[] = [];

        if (!existsSync(dirPath)) {
            this.logger.warn("Rules directory does not exist", { dirPath });
            return validators;
        }

        const stat = statSync(dirPath);
        if (!stat.isDirectory()) {
            this.logger.warn("Rules path is not a directory", { dirPath });
            return validators;
        }

        const files = readdirSync(dirPath).sort();

        for (const file of files) {
            const ext = extname(file).toLowerCase();
            if (ext !== ".yml" && ext !== ".yaml") {
                continue;
            }

            const filePath = join(dirPath, file);
            try {
                validators.push(...this.loadYamlFile(filePath));
            }
            catch (error) {
                this.logger.error("Failed to load rule file", {
                    filePath,
                    error: errorMessage(error),
                });
            }
        }

        this.logger.info("Rules loaded from directory", {
            dirPath,
            validators: validators.length,
        });

        return validators;
    }

    /**
     * Load rules from a YAML file holding one definition or a list.
     *
     * Invalid entries are logged and skipped.
     *
     * @throws Error if the file cannot be read or parsed
     */
    loadYamlFile(filePath: string): Validator[] {
        const validators: Validator[] = [];

        const content = readFileSync(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);

        if (!parsed) {
            return validators;
        }

        // Handle array of definitions
        const definitions: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

        for (const def of definitions) {
            if (!isYamlValidatorDefinition(def)) {
                this.logger.warn("Skipping invalid rule definition", { filePath });
                continue;
            }

            try {
                const validator = createValidatorFromYaml(def);
                validators.push(validator);
                this.logger.debug("Loaded YAML validator", { id: validator.id });
            }
            catch (error) {
                this.logger.warn("Skipping rule with invalid pattern", {
                    filePath,
                    name : def.name,
                    error: errorMessage(error),
                });
            }
        }

        return validators;
    }

    /**
     * Load rules from multiple directories, in order.
     */
    loadFromDirectories(dirPaths: readonly string[]): Validator[] {
        const validators: Validator[] = [];

        for (const dirPath of dirPaths) {
            validators.push(...this.loadFromDirectory(dirPath));
        }

        return validators;
    }
}
