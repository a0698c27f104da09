/**
 * @fileoverview Field Classifier
 *
 * Decides, for one key/value pair, whether it is a link, a status or a plain
 * value, and renders that decision as a lark-markdown line.
 *
 * Priority is fixed:
 * 1. Link   - key is a link field and the value resolves to an absolute URL
 * 2. Status - key is a status field and the lowercased value has a glyph
 * 3. Plain  - everything else
 *
 * @module @listcard/engine/classifier/FieldClassifier
 */

import type { ClassificationRules } from "../contracts/ClassificationRules.js";
import type { FieldClassification } from "../contracts/FieldClassification.js";
import type { JsonValue } from "../contracts/ListRecord.js";

/**
 * URLs of this length or longer are truncated when shown as link text.
 */
const kMAX_URL_LABEL_LENGTH = 30;

/**
 * Characters kept before the ellipsis of a truncated URL label.
 */
const kTRUNCATED_URL_PREFIX = 27;

/**
 * True for values that already carry an http(s) scheme.
 */
export function isAbsoluteUrl(value: string): boolean {
    return value.startsWith("http://") || value.startsWith("https://");
}

/**
 * Join a base URL and a relative path.
 *
 * The base gains a trailing slash if it lacks one; leading slashes of the
 * path are dropped, so the path always lands under the base.
 *
 * @example
 * ```typescript
 * joinUrl("https://ex.com/items/", "/42"); // "https://ex.com/items/42"
 * joinUrl("https://ex.com/items", "42");   // "https://ex.com/items/42"
 * ```
 */
export function joinUrl(baseUrl: string, path: string): string {
    const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    return base + path.replace(/^\/+/, "");
}

/**
 * Resolve a link-field value to an absolute URL.
 *
 * @param value - Raw field value
 * @param baseUrl - Optional base for relative values
 * @returns The absolute URL, or null if the value cannot be a link
 */
export function resolveLink(value: JsonValue | undefined, baseUrl?: string): string | null {
    const text = typeof value === "string" ? value.trim() : undefined;

    if (text !== undefined && isAbsoluteUrl(text)) {
        return text;
    }

    if (!baseUrl) {
        return null;
    }

    if (text !== undefined && text.length > 0) {
        return joinUrl(baseUrl, text);
    }

    if (typeof value === "number" && Number.isFinite(value)) {
        return joinUrl(baseUrl, String(value));
    }

    return null;
}

/**
 * Shorten a URL for use as link text.
 */
export function truncateUrl(url: string): string {
    if (url.length < kMAX_URL_LABEL_LENGTH) {
        return url;
    }
    return `${url.slice(0, kTRUNCATED_URL_PREFIX)}...`;
}

/**
 * Format a plain value for display.
 *
 * @param value - Raw field value
 * @param placeholder - Text used for null and missing values
 */
export function formatValue(value: JsonValue | undefined, placeholder: string): string {
    if (value === null || value === undefined) {
        return placeholder;
    }

    if (typeof value === "string") {
        return value;
    }

    if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
    }

    return JSON.stringify(value);
}

/**
 * Classify one field.
 *
 * @param key - Field name
 * @param value - Field value
 * @param rules - Classification rules
 * @returns Tagged classification
 */
export function classifyField(
    key: string,
    value: JsonValue | undefined,
    rules: ClassificationRules
): FieldClassification {
    if (rules.linkFields.has(key)) {
        const url = resolveLink(value, rules.linkBaseUrl);
        if (url !== null) {
            return { kind: "link", key, url };
        }
    }

    if (typeof value === "string" && rules.statusFields.has(key)) {
        const glyph = rules.statusGlyphs.get(value.trim().toLowerCase());
        if (glyph !== undefined) {
            return { kind: "status", key, value, glyph };
        }
    }

    return { kind: "plain", key, value };
}

/**
 * Render a classified field as one lark-markdown line.
 */
export function renderField(field: FieldClassification, rules: ClassificationRules): string {
    switch (field.kind) {
        case "link": {
            const label = rules.linkStyle === "url" ? truncateUrl(field.url) : rules.linkLabel;
            return `${field.key}: [${label}](${field.url})`;
        }
        case "status":
            return `${field.key}: ${field.glyph} ${field.value}`;
        case "plain":
            return `${field.key}: ${formatValue(field.value, rules.nullPlaceholder)}`;
        default: {
            const unreachable: never = field;
            throw new Error(`Unknown field kind: ${JSON.stringify(unreachable)}`);
        }
    }
}
