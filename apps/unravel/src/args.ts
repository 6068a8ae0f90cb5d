/**
 * @fileoverview Command-line arguments
 *
 * @module args
 */

import { parsePositiveInteger } from "./config/index.js";

/**
 * Parsed command line.
 */
export interface CliOptions {
    /** Text to decode; null means read standard input */
    input: string | null;

    /** Overrides config and environment when set */
    maxIterations?: number;

    /** Set by --verbose; false leaves config and environment in charge */
    verbose: boolean;

    /** Print the session export as JSON */
    json: boolean;

    /** Print the analysis of the input instead of decoding it */
    analyze: boolean;

    /** Alternative config file */
    configPath?: string;

    help: boolean;
}

export const USAGE = `Usage: unravel [options] [text]

Decode text through layers of Base64, hex, ROT13 and percent-encoding.
Reads standard input when no text is given.

Options:
  --max-iterations <n>  Stop after n decoding steps (default 10)
  --verbose             Log each step
  --json                Print the full session as JSON
  --analyze             Show the text analysis instead of decoding
  --config <path>       Use another config file
  -h, --help            Show this help`;

/**
 * Parse argv (without the node and script entries).
 *
 * Words that are not options are joined with single spaces into the input.
 * A lone "--" ends option parsing.
 *
 * @throws Error on an unknown option or a missing / invalid option value
 *
 * @example
 * ```typescript
 * parseArgs(["--max-iterations", "5", "SGVsbG8="]);
 * // { input: "SGVsbG8=", maxIterations: 5, verbose: false, json: false, analyze: false, help: false }
 * ```
 */
export function parseArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = {
        input  : null,
        verbose: false,
        json   : false,
        analyze: false,
        help   : false,
    };
    const words: string[] = [];
    let optionsEnded = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (optionsEnded || !arg.startsWith("-") || arg === "-") {
            words.push(arg);
            continue;
        }

        switch (arg) {
            case "--":
                optionsEnded = true;
                break;
            case "--verbose":
                options.verbose = true;
                break;
            case "--json":
                options.json = true;
                break;
            case "--analyze":
                options.analyze = true;
                break;
            case "-h":
            case "--help":
                options.help = true;
                break;
            case "--max-iterations": {
                const value = argv[++i];
                const parsed = value === undefined ? null : parsePositiveInteger(value);
                if (parsed === null) {
                    throw new Error("--max-iterations requires a positive integer");
                }
                options.maxIterations = parsed;
                break;
            }
            case "--config": {
                const value = argv[++i];
                if (value === undefined) {
                    throw new Error("--config requires a path");
                }
                options.configPath = value;
                break;
            }
            default:
                throw new Error(`Unknown option: ${arg}`);
        }
    }

    if (words.length > 0) {
        options.input = words.join(" ");
    }

    return options;
}
