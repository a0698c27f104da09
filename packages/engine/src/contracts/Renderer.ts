/**
 * Renderer Contract
 *
 * A renderer turns one record into the lark-markdown text of one card item.
 * The field classifier is the default implementation; any other renderer
 * replaces it wholesale.
 *
 * Design principles:
 * - Pure: No side effects, no record mutation
 * - Independent: A record's output depends only on its own input, its index
 *   and the read-only sequence
 * - Fallible: Throwing is allowed; the engine isolates the fault to that item
 */

import type { ListRecord } from "./ListRecord.js";

/**
 * Function form of a renderer.
 *
 * @param record - The record to render (read-only)
 * @param index - Zero-based position of the record in the input
 * @param records - The full input sequence (read-only)
 * @returns Item text (lark markdown)
 */
export type RenderFunction = (
    record: ListRecord,
    index: number,
    records: readonly unknown[]
) => string;

/**
 * Renderer interface.
 *
 * @example
 * ```typescript
 * const nameOnly: Renderer = {
 *     id: "name-only",
 *     render(record, index) {
 *         return `${index + 1}. ${String(record.name ?? "")}`;
 *     },
 * };
 * ```
 */
export interface Renderer {
    /**
     * Unique identifier for this renderer.
     * Used in logs and events.
     */
    readonly id: string;

    /**
     * Optional description of the output this renderer produces.
     */
    readonly description?: string;

    /**
     * Render one record.
     */
    render(record: ListRecord, index: number, records: readonly unknown[]): string;
}

/**
 * Wrap a plain function as a Renderer.
 *
 * @param id - Renderer identifier
 * @param fn - Function producing the item text
 * @returns Frozen Renderer
 */
export function createRenderer(id: string, fn: RenderFunction): Renderer {
    return Object.freeze({
        id,
        render: fn,
    });
}

/**
 * Type guard to check if an object is a Renderer.
 *
 * @param obj - The object to check
 * @returns True if the object implements Renderer
 */
export function isRenderer(obj: unknown): obj is Renderer {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "render" in obj &&
        typeof obj.render === "function"
    );
}
