/**
 * @fileoverview Input exports
 *
 * @module input
 */

export { readRecords, parseRecords, type ReadRecordsOptions } from "./readRecords.js";
