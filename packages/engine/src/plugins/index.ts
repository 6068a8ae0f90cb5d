/**
 * @fileoverview Validator loader barrel exports
 *
 * @module @unravel/engine/plugins
 */

export {
    ValidatorLoader,
    createValidatorFromYaml,
    isYamlValidatorDefinition,
    type YamlValidatorDefinition,
    type ValidatorLoaderConfig,
} from "./ValidatorLoader.js";
