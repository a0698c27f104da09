/**
 * @fileoverview Feishu webhook delivery
 *
 * Posts the card envelope to a Feishu custom-bot webhook. One attempt per
 * call, bounded by a timeout. The bot API answers HTTP 200 even for
 * rejected messages, so success also requires `code: 0` in the body.
 *
 * @module adapters/feishu/FeishuWebhookAdapter
 */

import {
    DeliveryFault,
    deliveryFailure,
    errorMessage,
    isListRecord,
    silentLogger,
    type CardDocument,
    type DeliveryAdapter,
    type DeliveryOutcome,
    type EngineLogger,
    type ListRecord,
} from "@listcard/engine";
import { buildFeishuEnvelope } from "./feishuCard.js";

export type FetchFunction = typeof fetch;

export interface FeishuWebhookAdapterConfig {
    /** Incoming webhook URL */
    webhookUrl: string;

    /** Request timeout in milliseconds (default: 10000) */
    timeoutMs?: number;

    /** fetch implementation (default: global fetch) */
    fetch?: FetchFunction;

    /** Logger for request diagnostics */
    logger?: EngineLogger;
}

export const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

/**
 * Read the result code from a bot response body.
 * Older endpoints answer with `StatusCode` instead of `code`.
 */
function responseCode(body: ListRecord): number | undefined {
    const code = body.code ?? body.StatusCode;
    return typeof code === "number" ? code : undefined;
}

function responseMessage(body: ListRecord): string | undefined {
    const msg = body.msg ?? body.StatusMessage;
    return typeof msg === "string" ? msg : undefined;
}

function isTimeout(error: unknown): boolean {
    return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

/**
 * Delivery adapter for Feishu group webhooks.
 *
 * @example
 * ```typescript
 * const adapter = new FeishuWebhookAdapter({ webhookUrl: process.env.FEISHU_WEBHOOK_URL ?? "" });
 * const outcome = await adapter.deliver(document);
 * ```
 */
export class FeishuWebhookAdapter implements DeliveryAdapter {
    readonly id = "feishu-webhook";
    readonly description = "Posts interactive cards to a Feishu webhook";

    private readonly webhookUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchFn: FetchFunction;
    private readonly logger: EngineLogger;

    constructor(config: FeishuWebhookAdapterConfig) {
        this.webhookUrl = config.webhookUrl;
        this.timeoutMs  = config.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
        this.fetchFn    = config.fetch ?? ((input, init) => fetch(input, init));
        this.logger     = config.logger ?? silentLogger;
    }

    async deliver(document: CardDocument): Promise<DeliveryOutcome> {
        try {
            const outcome = await this.post(document);
            this.logger.debug("Webhook accepted card", { status: outcome.status });
            return outcome;
        }
        catch (error) {
            const status = error instanceof DeliveryFault ? error.details?.status : undefined;
            return deliveryFailure(errorMessage(error), typeof status === "number" ? { status } : {});
        }
    }

    /**
     * Send the envelope and interpret the reply.
     *
     * @throws DeliveryFault on network errors, timeouts, HTTP errors and rejected messages
     */
    private async post(document: CardDocument): Promise<DeliveryOutcome> {
        let response: Response;

        try {
            response = await this.fetchFn(this.webhookUrl, {
                method : "POST",
                headers: { "Content-Type": "application/json" },
                body   : JSON.stringify(buildFeishuEnvelope(document)),
                signal : AbortSignal.timeout(this.timeoutMs),
            });
        }
        catch (error) {
            if (isTimeout(error)) {
                throw new DeliveryFault(`Request timed out after ${this.timeoutMs}ms`, { timeoutMs: this.timeoutMs }, { cause: error });
            }
            throw new DeliveryFault(`Request failed: ${errorMessage(error)}`, undefined, { cause: error });
        }

        const status = response.status;
        const text = await response.text();

        if (!response.ok) {
            const snippet = text.slice(0, 200);
            throw new DeliveryFault(`HTTP ${status}${snippet ? `: ${snippet}` : ""}`, { status });
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        }
        catch (error) {
            throw new DeliveryFault(`Unparsable response body (HTTP ${status})`, { status }, { cause: error });
        }

        if (!isListRecord(body)) {
            throw new DeliveryFault(`Unexpected response body (HTTP ${status})`, { status });
        }

        const code = responseCode(body);
        if (code !== 0) {
            const msg = responseMessage(body) ?? "no message";
            throw new DeliveryFault(`Feishu rejected the card (code ${code ?? "missing"}): ${msg}`, { status, code });
        }

        return { ok: true, status, data: body };
    }
}
