/**
 * Field Classification
 *
 * The decision the classifier makes for one key/value pair. Exactly one of
 * three kinds, checked in fixed priority order: link, then status, then plain.
 * This is pure data; rendering is a separate step.
 */

import type { JsonValue } from "./ListRecord.js";

/**
 * Field rendered as a markdown link.
 */
export interface LinkField {
    readonly kind: "link";
    readonly key: string;

    /** Absolute URL, already joined with the base URL if the value was relative */
    readonly url: string;
}

/**
 * Field rendered with a status glyph in front of its value.
 */
export interface StatusField {
    readonly kind: "status";
    readonly key: string;

    /** Original value, casing preserved */
    readonly value: string;
    readonly glyph: string;
}

/**
 * Field rendered as "key: value".
 */
export interface PlainField {
    readonly kind: "plain";
    readonly key: string;
    readonly value: JsonValue | undefined;
}

export type FieldClassification = LinkField | StatusField | PlainField;

export type FieldKind = FieldClassification["kind"];
