/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @listcard/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
