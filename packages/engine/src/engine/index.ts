/**
 * @fileoverview Engine barrel exports
 *
 * @module @listcard/engine/engine
 */

export {
    CardEngine,
    type CardEngineConfig,
    type CardRunResult,
} from "./CardEngine.js";

export {
    assembleCard,
    validateTheme,
    type AssembleCardInput,
} from "./CardAssembler.js";
