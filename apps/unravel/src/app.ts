/**
 * @fileoverview Unravel application
 *
 * Wires configuration, validator rules and the engine together for one
 * command-line invocation. Output goes through an injected writer so the
 * whole flow runs in tests without a terminal.
 *
 * @module app
 */

import {
    DecoderEngine,
    ValidatorLoader,
    createConsoleLogger,
    createTextAnalyzer,
    exportSession,
    identifyLikelyEncoding,
    toDecodeResult,
    type EngineLogger,
} from "@unravel/engine";
import type { CliOptions } from "./args.js";
import type { DecoderConfig } from "./config/index.js";
import { formatAnalysis, formatResultSummary } from "./report/index.js";

/**
 * Where the application writes.
 */
export interface AppOutput {
    out(text: string): void;
    err(text: string): void;
}

/**
 * Exit codes.
 */
export const ExitCode = {
    SUCCESS   : 0,
    INCOMPLETE: 1,
    USAGE     : 2,
} as const;

/**
 * Merge command-line flags over the loaded configuration.
 */
export function resolveConfig(config: DecoderConfig, options: CliOptions): DecoderConfig {
    return {
        ...config,
        maxIterations: options.maxIterations ?? config.maxIterations,
        verbose      : options.verbose || config.verbose,
    };
}

/**
 * Run one invocation against already-read input.
 *
 * @param input - Text to analyze or decode
 * @param options - Parsed command line
 * @param config - Configuration after environment and flag overrides
 * @param output - Destination for reports
 * @param logger - Engine and loader logger (default: console)
 * @returns Process exit code
 */
export function runApp(
    input: string,
    options: CliOptions,
    config: DecoderConfig,
    output: AppOutput,
    logger: EngineLogger = createConsoleLogger()
): number {
    if (options.analyze) {
        const analysis = createTextAnalyzer({ flagPrefixes: config.flagPrefixes }).analyze(input);
        output.out(formatAnalysis(analysis, identifyLikelyEncoding(analysis)));
        return ExitCode.SUCCESS;
    }

    const customValidators = new ValidatorLoader({ logger }).loadFromDirectories(config.rulesDirs);

    const engine = new DecoderEngine({
        maxIterations: config.maxIterations,
        verbose      : config.verbose,
        flagPrefixes : config.flagPrefixes,
        customValidators,
        logger,
    });

    if (!options.json) {
        engine.eventBus.subscribe("decode:fallback", (event) => {
            output.err(`[FALLBACK] ${String(event.data?.decoder)} made progress`);
        });

        engine.eventBus.subscribe("decode:iteration", (event) => {
            const data = event.data ?? {};
            const confidence = typeof data.confidence === "number" ? data.confidence : 0;
            output.err(
                `[STEP ${String(data.iteration)}] ${String(data.decoder)} (${(confidence * 100).toFixed(0)}%)` +
                ` → ${String(data.status)}: ${String(data.reason)}`
            );
        });
    }

    const snapshot = engine.run(input);

    if (options.json) {
        output.out(JSON.stringify(exportSession(snapshot), null, 2));
    }
    else {
        output.out(formatResultSummary(toDecodeResult(snapshot), snapshot.maxIterations));
    }

    return snapshot.status === "COMPLETE" ? ExitCode.SUCCESS : ExitCode.INCOMPLETE;
}
