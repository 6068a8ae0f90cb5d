/**
 * @fileoverview Analysis barrel exports
 *
 * @module @unravel/engine/analysis
 */

export {
    DEFAULT_FLAG_PREFIXES,
    analyze,
    buildFlagPatterns,
    calculateEntropy,
    calculatePrintableRatio,
    containsFlag,
    containsUrl,
    createTextAnalyzer,
    detectHashType,
    hasPadding,
    identifyCharset,
    isPrintableChar,
    type TextAnalyzer,
    type TextAnalyzerOptions,
} from "./TextAnalyzer.js";

export {
    identifyLikelyEncoding,
    type ConfidenceMap,
} from "./EncodingClassifier.js";
