/**
 * @fileoverview Report barrel exports
 *
 * @module report
 */

export {
    formatResultSummary,
    truncate,
    kRULE_WIDTH,
    kSUMMARY_PREVIEW_LENGTH,
} from "./formatSummary.js";
export { formatAnalysis, kANALYSIS_PREVIEW_LENGTH } from "./formatAnalysis.js";
