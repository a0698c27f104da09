/**
 * @fileoverview listcard engine
 *
 * Transport-agnostic core that turns a list of JSON records into a card.
 *
 * The engine provides:
 * - Field classification (link, status, plain) with a fixed priority
 * - A pluggable renderer strategy with per-record fault isolation
 * - Card assembly under a validated theme
 * - Single-shot delivery through an adapter, with lifecycle events
 *
 * @module @listcard/engine
 * @example
 * ```typescript
 * import {
 *     CardEngine,
 *     createClassificationRules,
 *     type DeliveryAdapter,
 * } from "@listcard/engine";
 *
 * const engine = new CardEngine({ rules: createClassificationRules({ layout: "compact" }) });
 * const result = await engine.run(records, cardOptions, adapter);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Classifier exports
// ============================================================================

export * from "./classifier/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";

// ============================================================================
// Plugin exports
// ============================================================================

export * from "./plugins/index.js";
