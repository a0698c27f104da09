/**
 * @fileoverview CardEngine
 *
 * The orchestration engine for a card run.
 *
 * Pipeline flow:
 * 1. Theme validated (configuration errors surface before any rendering)
 * 2. Every record rendered, faults isolated per record
 * 3. Document assembled
 * 4. Delivery adapter called exactly once, never retried
 *
 * Design principles:
 * - Transport-agnostic: knows nothing about Feishu or HTTP
 * - Pluggable: the renderer and the delivery adapter are strategies
 * - Observable: emits events at each stage
 * - Stateless between runs: no record, rule or document is retained
 *
 * @module @listcard/engine/engine/CardEngine
 */

import type { CardDocument, CardOptions, RenderedItem } from "../contracts/CardDocument.js";
import type { ClassificationRules } from "../contracts/ClassificationRules.js";
import { createClassificationRules } from "../contracts/ClassificationRules.js";
import type { DeliveryAdapter, DeliveryOutcome } from "../contracts/DeliveryAdapter.js";
import { deliveryFailure } from "../contracts/DeliveryAdapter.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { isListRecord } from "../contracts/ListRecord.js";
import type { Renderer } from "../contracts/Renderer.js";
import { RenderFault, errorMessage } from "../contracts/errors.js";
import { FieldClassifierRenderer } from "../classifier/FieldClassifierRenderer.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { assembleCard, validateTheme } from "./CardAssembler.js";

/**
 * Engine configuration options.
 */
export interface CardEngineConfig {
    /** Rules for the default renderer (ignored when a renderer is given) */
    readonly rules?: ClassificationRules;

    /** Custom renderer (default: FieldClassifierRenderer) */
    readonly renderer?: Renderer;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: EngineLogger;
}

/**
 * Result of a full run.
 */
export interface CardRunResult {
    /** True only when the adapter confirmed delivery */
    readonly ok: boolean;

    /** Trace ID shared by every event of the run */
    readonly traceId: string;

    /** The document that was handed to the adapter */
    readonly document: CardDocument;

    /** Adapter outcome */
    readonly outcome: DeliveryOutcome;

    /** Number of items replaced by a render-error placeholder */
    readonly renderFailures: number;
}

/**
 * Default console logger.
 */
const defaultLogger: EngineLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Generate a unique trace ID for a run.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `run_${timestamp}_${random}`;
}

/**
 * Name of a caught fault, used in the placeholder text.
 */
function faultKind(error: unknown): string {
    if (error instanceof Error) {
        return error.name;
    }
    return "UnknownError";
}

/**
 * Short description of a non-record input element.
 */
function describeType(value: unknown): string {
    if (value === null) {
        return "null";
    }
    return Array.isArray(value) ? "array" : typeof value;
}

/**
 * CardEngine - renders records, assembles the card and delivers it.
 *
 * @example
 * ```typescript
 * const engine = new CardEngine({
 *     rules: createClassificationRules({ layout: "compact" }),
 * });
 *
 * engine.eventBus.subscribe("item:renderFailed", (event) => {
 *     console.warn("Item failed:", event.data);
 * });
 *
 * const result = await engine.run(records, {
 *     title     : "Deploys",
 *     headerText: "**Today**",
 *     theme     : "green",
 *     wideLayout: true,
 * }, adapter);
 * ```
 */
export class CardEngine {
    private readonly renderer: Renderer;
    private readonly logger: EngineLogger;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: CardEngineConfig = {}) {
        const logger = config.logger ?? defaultLogger;

        this.renderer = config.renderer ?? new FieldClassifierRenderer(config.rules ?? createClassificationRules());
        this.eventBus = config.eventBus ?? new InMemoryEventBus(logger);
        this.logger   = this.createScopedLogger(logger, this.renderer.id);
    }

    /**
     * Identifier of the renderer in use.
     */
    get rendererId(): string {
        return this.renderer.id;
    }

    /**
     * Render every record, isolating faults per record.
     *
     * Always returns exactly one item per input element, in input order.
     *
     * @param records - Parsed input elements
     * @param traceId - Trace ID for emitted events
     */
    renderItems(records: readonly unknown[], traceId: string = generateTraceId()): RenderedItem[] {
        return records.map((record, index) => this.renderItem(record, index, records, traceId));
    }

    /**
     * Validate options, render records and assemble the document.
     *
     * @throws ConfigurationError if the theme is invalid (before rendering)
     */
    buildCard(records: readonly unknown[], options: CardOptions, traceId: string = generateTraceId()): CardDocument {
        validateTheme(options.theme);

        this.emit(createEvent("card:rendering", {
            records : records.length,
            renderer: this.renderer.id,
        }, traceId));

        const items = this.renderItems(records, traceId);
        const document = assembleCard({ ...options, items });

        const failures = items.filter(item => item.failed).length;
        this.emit(createEvent("card:assembled", {
            items : items.length,
            failed: failures,
            theme : document.theme,
        }, traceId));

        this.logger.debug("Card assembled", {
            traceId,
            items : items.length,
            failed: failures,
        });

        return document;
    }

    /**
     * Run the full pipeline: build the card, then deliver it once.
     *
     * A throwing adapter is reported as a failed outcome, not rethrown.
     *
     * @throws ConfigurationError if the theme is invalid (no delivery attempted)
     */
    async run(records: readonly unknown[], options: CardOptions, adapter: DeliveryAdapter): Promise<CardRunResult> {
        const traceId = generateTraceId();
        const document = this.buildCard(records, options, traceId);

        this.emit(createEvent("card:delivering", {
            adapterId: adapter.id,
            items    : document.items.length,
        }, traceId));

        const startTime = Date.now();
        let outcome: DeliveryOutcome;

        try {
            outcome = await adapter.deliver(document);
        }
        catch (error) {
            outcome = deliveryFailure(errorMessage(error));
        }

        const duration = Date.now() - startTime;

        if (outcome.ok) {
            this.emit(createEvent("card:delivered", {
                adapterId: adapter.id,
                status   : outcome.status,
                duration,
            }, traceId));

            this.logger.info("Card delivered", {
                traceId,
                adapterId: adapter.id,
                items    : document.items.length,
                duration,
            });
        }
        else {
            this.emit(createEvent("card:deliveryFailed", {
                adapterId : adapter.id,
                status    : outcome.status,
                diagnostic: outcome.diagnostic,
                duration,
            }, traceId));

            this.logger.error("Card delivery failed", {
                traceId,
                adapterId : adapter.id,
                status    : outcome.status,
                diagnostic: outcome.diagnostic,
            });
        }

        const result: CardRunResult = {
            ok            : outcome.ok,
            traceId,
            document,
            outcome,
            renderFailures: document.items.filter(item => item.failed).length,
        };

        return Object.freeze(result);
    }

    /**
     * Render one record. Never throws.
     */
    private renderItem(record: unknown, index: number, records: readonly unknown[], traceId: string): RenderedItem {
        try {
            if (!isListRecord(record)) {
                throw new RenderFault(`Record ${index} is not an object`, {
                    index,
                    type: describeType(record),
                });
            }

            const content: unknown = this.renderer.render(record, index, records);

            if (typeof content !== "string") {
                throw new RenderFault(`Renderer returned ${describeType(content)} instead of a string`, { index });
            }

            this.emit(createEvent("item:rendered", { index }, traceId));

            return Object.freeze({ index, content, failed: false });
        }
        catch (error) {
            const kind = faultKind(error);
            const message = errorMessage(error);

            this.emit(createEvent("item:renderFailed", {
                index,
                kind,
                error: message,
            }, traceId));

            this.logger.warn("Record render failed", {
                traceId,
                index,
                kind,
                error: message,
            });

            return Object.freeze({
                index,
                content: `render error: ${kind}`,
                failed : true,
                error  : `${kind}: ${message}`,
            });
        }
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }

    /**
     * Create a logger that prefixes every message with the engine scope.
     */
    private createScopedLogger(logger: EngineLogger, rendererId: string): EngineLogger {
        const scope = `[engine:${rendererId}]`;
        return {
            debug: (msg, data) => logger.debug(`${scope} ${msg}`, data),
            info : (msg, data) => logger.info(`${scope} ${msg}`, data),
            warn : (msg, data) => logger.warn(`${scope} ${msg}`, data),
            error: (msg, data) => logger.error(`${scope} ${msg}`, data),
        };
    }
}
