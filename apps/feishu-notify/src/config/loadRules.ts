/**
 * @fileoverview Rules Loader
 *
 * Loads classification rules (link fields, status fields, glyphs, labels)
 * from a YAML file and merges them with command-line overrides.
 *
 * @module config/loadRules
 */

import { readFileSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import {
    ConfigurationError,
    createClassificationRules,
    errorMessage,
    isListRecord,
    type ClassificationRules,
    type ClassificationRulesInput,
    type EngineLogger,
} from "@listcard/engine";
import { DEFAULT_CLI_LINK_FIELDS, type CliOptions } from "../cli/parseArgs.js";

/**
 * Rules as they may appear in the YAML file.
 */
export interface RulesFileContent {
    linkFields?: string[];
    statusFields?: string[];
    statusGlyphs?: Record<string, string>;
    linkBaseUrl?: string;
    linkLabel?: string;
    nullPlaceholder?: string;
}

const kSTRING_KEYS = ["linkBaseUrl", "linkLabel", "nullPlaceholder"] as const;
const kLIST_KEYS = ["linkFields", "statusFields"] as const;

/**
 * Path of the rules file shipped with the app.
 */
export function getDefaultRulesPath(): string {
    return join(dirname(fileURLToPath(import.meta.url)), "..", "..", "config", "rules.yml");
}

function readStringList(value: unknown, key: string, filePath: string): string[] {
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
        throw new ConfigurationError(`Invalid rules file ${filePath}: '${key}' must be a list of strings`, { key });
    }
    return value;
}

function readStringMap(value: unknown, key: string, filePath: string): Record<string, string> {
    if (!isListRecord(value)) {
        throw new ConfigurationError(`Invalid rules file ${filePath}: '${key}' must be a mapping`, { key });
    }

    const map: Record<string, string> = {};
    for (const [entryKey, entryValue] of Object.entries(value)) {
        if (typeof entryValue !== "string") {
            throw new ConfigurationError(
                `Invalid rules file ${filePath}: '${key}.${entryKey}' must be a string`,
                { key, entryKey }
            );
        }
        map[entryKey] = entryValue;
    }
    return map;
}

/**
 * Load rules from a YAML file.
 *
 * @param filePath - Path to the rules file
 * @returns Validated rules content
 * @throws ConfigurationError if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const rules = loadRulesFile("./config/rules.yml");
 * // { linkFields: ["url", "link", "href"], statusGlyphs: { success: "✅", ... } }
 * ```
 */
export function loadRulesFile(filePath: string): RulesFileContent {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`Rules file not found: ${filePath}`, { filePath });
    }

    let parsed: unknown;
    try {
        parsed = parseYaml(readFileSync(filePath, "utf-8"));
    }
    catch (error) {
        throw new ConfigurationError(`Invalid rules file ${filePath}: ${errorMessage(error)}`, { filePath }, { cause: error });
    }

    // An empty file means "no overrides"
    if (parsed === null || parsed === undefined) {
        return {};
    }

    if (!isListRecord(parsed)) {
        throw new ConfigurationError(`Invalid rules file ${filePath}: expected a mapping`, { filePath });
    }

    const content: RulesFileContent = {};

    for (const key of kLIST_KEYS) {
        if (parsed[key] !== undefined) {
            content[key] = readStringList(parsed[key], key, filePath);
        }
    }

    if (parsed.statusGlyphs !== undefined) {
        content.statusGlyphs = readStringMap(parsed.statusGlyphs, "statusGlyphs", filePath);
    }

    for (const key of kSTRING_KEYS) {
        const value = parsed[key];
        if (value !== undefined) {
            if (typeof value !== "string") {
                throw new ConfigurationError(`Invalid rules file ${filePath}: '${key}' must be a string`, { key });
            }
            content[key] = value;
        }
    }

    return content;
}

/**
 * Load rules with fallback to built-in defaults.
 *
 * @param filePath - Path to the rules file
 * @param logger - Receives a warning when the file cannot be used
 */
export function loadRulesFileWithFallback(filePath: string, logger: EngineLogger): RulesFileContent {
    try {
        return loadRulesFile(filePath);
    }
    catch (error) {
        logger.warn(`Failed to load rules from ${filePath}, using built-in defaults`, {
            error: errorMessage(error),
        });
        return {};
    }
}

/**
 * Merge rules file content with command-line options. Flags win; link
 * fields fall back to the CLI default when neither source names any.
 */
export function mergeRules(file: RulesFileContent, cli: CliOptions): ClassificationRules {
    const input: ClassificationRulesInput = {
        linkFields     : cli.linkFields ?? file.linkFields ?? DEFAULT_CLI_LINK_FIELDS,
        statusFields   : cli.statusFields ?? file.statusFields,
        statusGlyphs   : file.statusGlyphs,
        linkBaseUrl    : cli.linkBaseUrl ?? file.linkBaseUrl,
        linkLabel      : cli.linkLabel ?? file.linkLabel,
        nullPlaceholder: file.nullPlaceholder,
        layout         : cli.layout,
        linkStyle      : cli.linkStyle,
        showItemIndex  : cli.showItemIndex,
    };

    return createClassificationRules(input);
}

/**
 * Resolve the rules for a run.
 *
 * An explicit --config file must be valid; the bundled file falls back to
 * built-in defaults with a warning.
 *
 * @throws ConfigurationError if an explicit rules file is missing or invalid
 */
export function resolveRules(cli: CliOptions, logger: EngineLogger, defaultPath: string = getDefaultRulesPath()): ClassificationRules {
    const file = cli.configPath !== undefined
        ? loadRulesFile(cli.configPath)
        : loadRulesFileWithFallback(defaultPath, logger);

    return mergeRules(file, cli);
}
