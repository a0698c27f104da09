/**
 * @fileoverview CLI exports
 *
 * @module cli
 */

export {
    parseArgs,
    splitList,
    USAGE,
    DEFAULT_TITLE,
    DEFAULT_HEADER_TEXT,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_CLI_LINK_FIELDS,
    type CliOptions,
} from "./parseArgs.js";
