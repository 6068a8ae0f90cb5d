/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadDecoderConfig,
    loadDecoderConfigWithFallback,
    applyEnvOverrides,
    getDefaultConfig,
    parsePositiveInteger,
    parseBooleanFlag,
    ENV_MAX_ITERATIONS,
    ENV_VERBOSE,
    type DecoderConfig,
} from "./loadConfig.js";
