/**
 * @fileoverview Logger Contract
 *
 * Structured logger used across the engine. Callers inject their own
 * implementation; the default writes to the console with a level prefix.
 *
 * @module @unravel/engine/contracts/Logger
 */

/**
 * Logger interface for the engine and its loaders.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Create a console logger whose lines start with the given tag.
 *
 * @param tag - Optional component tag, e.g. "ValidatorLoader"
 */
export function createConsoleLogger(tag?: string): EngineLogger {
    const prefix = (level: string) => tag ? `[${level}] [${tag}]` : `[${level}]`;

    return {
        debug: (msg, data) => console.debug(`${prefix("DEBUG")} ${msg}`, data ?? ""),
        info : (msg, data) => console.info(`${prefix("INFO")} ${msg}`, data ?? ""),
        warn : (msg, data) => console.warn(`${prefix("WARN")} ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`${prefix("ERROR")} ${msg}`, data ?? ""),
    };
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
