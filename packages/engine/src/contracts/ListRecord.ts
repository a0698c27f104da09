/**
 * ListRecord Contract
 *
 * A single input record: an ordered mapping from field name to a JSON value.
 * Field order is the order the renderer walks, so it must survive parsing
 * (JSON.parse preserves insertion order for non-integer keys).
 */

/**
 * Any value that can appear in parsed JSON.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

/**
 * One record of the input list.
 *
 * @example
 * ```typescript
 * const record: ListRecord = { name: "api", status: "success", url: "/builds/42" };
 * ```
 */
export type ListRecord = Readonly<Record<string, JsonValue | undefined>>;

/**
 * Type guard: true for plain JSON objects (not arrays, not null).
 *
 * @param value - Any parsed input element
 * @returns True if the value can be rendered as a record
 */
export function isListRecord(value: unknown): value is ListRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
