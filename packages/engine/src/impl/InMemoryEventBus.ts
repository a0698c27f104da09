/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus used by the card engine.
 *
 * @module @listcard/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { errorMessage } from "../contracts/errors.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A throwing handler is logged and does not stop the others
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("card:delivered", (event) => {
 *     console.log("Delivered:", event.data);
 * });
 *
 * bus.emit(createEvent("card:delivered", { items: 3 }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger?: EngineLogger;

    constructor(logger?: EngineLogger) {
        this.logger = logger;
    }

    /**
     * Emit an event to all subscribers.
     *
     * Specific handlers run first, then wildcard handlers.
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    /**
     * Subscribe to events of a specific type.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }

        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear ("*" or undefined clears everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                if (this.logger) {
                    this.logger.error("Event handler failed", {
                        type : event.type,
                        error: errorMessage(error),
                    });
                }
                else {
                    console.error(`EventBus handler error for ${event.type}:`, error);
                }
            }
        }
    }
}
