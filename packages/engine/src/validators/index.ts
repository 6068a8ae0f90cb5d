/**
 * @fileoverview Validators barrel exports
 *
 * @module @unravel/engine/validators
 */

export {
    carriesEncodingSignal,
    createDefaultValidators,
    defaultValidator,
    flagValidator,
    hashValidator,
    improvedReadabilityValidator,
    naturalLanguageValidator,
    noChangeValidator,
    stillEncodedValidator,
    urlValidator,
} from "./builtin.js";

export { ValidatorChain } from "./ValidatorChain.js";
