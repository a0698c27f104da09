/**
 * @fileoverview Adapter exports
 *
 * @module adapters
 */

export * from "./feishu/index.js";
export { ConsoleDeliveryAdapter, type ConsoleDeliveryAdapterConfig } from "./console/ConsoleDeliveryAdapter.js";
