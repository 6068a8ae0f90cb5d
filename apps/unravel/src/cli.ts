#!/usr/bin/env tsx
/**
 * @fileoverview Unravel - Main Entry Point
 *
 * Settings are layered, later wins:
 * 1. config/unravel.yml (or --config)
 * 2. UNRAVEL_* environment variables (.env is loaded first)
 * 3. Command-line flags
 *
 * @module unravel
 */

// Load .env before reading any UNRAVEL_* variable
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { errorMessage, type EngineLogger } from "@unravel/engine";
import { USAGE, parseArgs, type CliOptions } from "./args.js";
import { ExitCode, resolveConfig, runApp } from "./app.js";
import { applyEnvOverrides, loadDecoderConfigWithFallback } from "./config/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DEFAULT_CONFIG_PATH = join(__dirname, "..", "config", "unravel.yml");

/**
 * Logger for the CLI. Everything goes to stderr so stdout carries only the
 * report; debug and info lines need --verbose.
 */
function createCliLogger(verbose: boolean): EngineLogger {
    const write = (level: string) => (message: string, data?: Record<string, unknown>) => {
        console.error(`[${level}] ${message}`, data ?? "");
    };
    const silent = () => undefined;

    return {
        debug: verbose ? write("DEBUG") : silent,
        info : verbose ? write("INFO") : silent,
        warn : write("WARN"),
        error: write("ERROR"),
    };
}

/**
 * Read all of standard input as UTF-8, without the trailing newline.
 */
async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf8").replace(/\r?\n$/, "");
}

/**
 * Main entry point
 */
async function main(): Promise<number> {
    let options: CliOptions;
    try {
        options = parseArgs(process.argv.slice(2));
    }
    catch (error) {
        console.error(`[ERROR] ${errorMessage(error)}\n`);
        console.error(USAGE);
        return ExitCode.USAGE;
    }

    if (options.help) {
        console.log(USAGE);
        return ExitCode.SUCCESS;
    }

    let input = options.input;
    if (input === null) {
        if (process.stdin.isTTY) {
            console.error(USAGE);
            return ExitCode.USAGE;
        }
        input = await readStdin();
    }

    const fileConfig = loadDecoderConfigWithFallback(options.configPath ?? DEFAULT_CONFIG_PATH);
    const config = resolveConfig(applyEnvOverrides(fileConfig), options);

    return runApp(input, options, config, {
        out: (text) => console.log(text),
        err: (text) => console.error(text),
    }, createCliLogger(config.verbose));
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error("[FATAL]", errorMessage(error));
        process.exitCode = ExitCode.USAGE;
    });
