/**
 * @fileoverview Classifier barrel exports
 *
 * @module @listcard/engine/classifier
 */

export {
    classifyField,
    renderField,
    resolveLink,
    joinUrl,
    isAbsoluteUrl,
    truncateUrl,
    formatValue,
} from "./FieldClassifier.js";

export { FieldClassifierRenderer } from "./FieldClassifierRenderer.js";
