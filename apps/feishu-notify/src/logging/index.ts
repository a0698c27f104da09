/**
 * @fileoverview Logging exports
 *
 * @module logging
 */

export { createConsoleLogger, type ConsoleLoggerOptions } from "./createConsoleLogger.js";
