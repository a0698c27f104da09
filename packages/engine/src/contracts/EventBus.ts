/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of a card run. Events let the CLI (or any embedder)
 * observe rendering and delivery without the engine knowing how they are
 * reported.
 *
 * Design decisions:
 * - Synchronous dispatch (a run is a single short pass)
 * - In-memory implementation, no external queue
 * - Ordering is preserved within a run
 *
 * @module @listcard/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Run trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Events emitted once per run.
 */
export type CardEventType =
    | "card:rendering"
    | "card:assembled"
    | "card:delivering"
    | "card:delivered"
    | "card:deliveryFailed";

/**
 * Events emitted once per record.
 */
export type ItemEventType =
    | "item:rendered"
    | "item:renderFailed";

/**
 * All known event types.
 */
export type EventType = CardEventType | ItemEventType;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("item:renderFailed", (event) => {
 *     console.error("Item failed:", event.data);
 * });
 *
 * bus.emit(createEvent("item:renderFailed", { index: 3, error: "TypeError" }, "run_abc"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*"/undefined for all)
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
