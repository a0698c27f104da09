/**
 * @fileoverview Contract barrel exports
 *
 * All transport-agnostic interfaces and types that define
 * the listcard engine contract.
 *
 * @module @listcard/engine/contracts
 */

// Records
export type { JsonValue, ListRecord } from "./ListRecord.js";
export { isListRecord } from "./ListRecord.js";

// Classification rules
export type {
    ClassificationRules,
    ClassificationRulesInput,
    ItemLayout,
    LinkStyle,
} from "./ClassificationRules.js";
export {
    createClassificationRules,
    isItemLayout,
    isLinkStyle,
    DEFAULT_LINK_FIELDS,
    DEFAULT_STATUS_FIELDS,
    DEFAULT_STATUS_GLYPHS,
    DEFAULT_LINK_LABEL,
    DEFAULT_NULL_PLACEHOLDER,
} from "./ClassificationRules.js";

// Field classification
export type {
    FieldClassification,
    FieldKind,
    LinkField,
    StatusField,
    PlainField,
} from "./FieldClassification.js";

// Renderer contract
export type { Renderer, RenderFunction } from "./Renderer.js";
export { createRenderer, isRenderer } from "./Renderer.js";

// Card document
export type {
    CardDocument,
    CardOptions,
    CardTheme,
    RenderedItem,
} from "./CardDocument.js";
export {
    CARD_THEMES,
    DEFAULT_CARD_THEME,
    isCardTheme,
} from "./CardDocument.js";

// Delivery contract
export type { DeliveryAdapter, DeliveryOutcome } from "./DeliveryAdapter.js";
export { deliveryFailure } from "./DeliveryAdapter.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CardEventType,
    ItemEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Logger
export type { EngineLogger } from "./Logger.js";
export { silentLogger } from "./Logger.js";

// Errors
export type { ListcardErrorKind } from "./errors.js";
export {
    ListcardError,
    ConfigurationError,
    InputFormatError,
    RenderFault,
    DeliveryFault,
    isListcardError,
    errorMessage,
} from "./errors.js";
