/**
 * Delivery Adapter Contract
 *
 * The boundary between the engine and whatever transport carries a card
 * (a webhook, stdout, a test double). Called exactly once per run with the
 * fully assembled document.
 *
 * Design principles:
 * - Single shot: The engine never retries
 * - Bounded: Adapters impose their own timeout and report it as a failure
 * - Reported, not thrown: Failures come back as a non-ok outcome
 */

import type { CardDocument } from "./CardDocument.js";

/**
 * Result of one delivery attempt.
 */
export interface DeliveryOutcome {
    /** True only for a confirmed delivery */
    readonly ok: boolean;

    /** Human-readable explanation when not ok */
    readonly diagnostic?: string;

    /** Transport status (HTTP status code, for example) */
    readonly status?: number;

    /** Optional response data from the transport */
    readonly data?: Record<string, unknown>;
}

/**
 * Delivery adapter interface.
 *
 * @example
 * ```typescript
 * const memoryAdapter: DeliveryAdapter = {
 *     id: "memory",
 *     async deliver(document) {
 *         sent.push(document);
 *         return { ok: true };
 *     },
 * };
 * ```
 */
export interface DeliveryAdapter {
    /**
     * Unique identifier for this adapter.
     */
    readonly id: string;

    /**
     * Optional description of the transport.
     */
    readonly description?: string;

    /**
     * Deliver the document.
     *
     * @param document - The assembled card (read-only)
     * @returns Outcome of the attempt
     */
    deliver(document: CardDocument): Promise<DeliveryOutcome>;
}

/**
 * Build a failed outcome.
 */
export function deliveryFailure(diagnostic: string, extra: Omit<DeliveryOutcome, "ok" | "diagnostic"> = {}): DeliveryOutcome {
    return Object.freeze({ ...extra, ok: false, diagnostic });
}

