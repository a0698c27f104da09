/**
 * @fileoverview Unit tests for FeishuWebhookAdapter
 *
 * Tests cover:
 * - Request shape (method, headers, JSON envelope, timeout signal)
 * - Success only for HTTP 2xx with code 0
 * - HTTP errors, unparsable bodies, rejected messages, network errors, timeouts
 *
 * @module feishu-notify/__tests__/FeishuWebhookAdapter
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { assembleCard } from "@listcard/engine";
import { FeishuWebhookAdapter, type FetchFunction } from "../adapters/feishu/FeishuWebhookAdapter.js";
import { buildFeishuEnvelope } from "../adapters/feishu/feishuCard.js";

const WEBHOOK_URL = "https://hooks.example.com/bot/v2/hook/test-token";

const document = assembleCard({
    title     : "Report",
    headerText: "**Data list report**",
    theme     : "blue",
    wideLayout: true,
    items     : [{ index: 0, content: "name: A", failed: false }],
});

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json" },
    });
}

function createAdapter(fetchMock: FetchFunction, timeoutMs?: number): FeishuWebhookAdapter {
    return new FeishuWebhookAdapter({ webhookUrl: WEBHOOK_URL, fetch: fetchMock, timeoutMs });
}

describe("FeishuWebhookAdapter", () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it("should have the expected id", () => {
        expect(createAdapter(vi.fn<FetchFunction>()).id).toBe("feishu-webhook");
    });

    // Scenario: Request shape
    it("should POST the envelope as JSON with a timeout signal", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ code: 0, msg: "success" }));

        await createAdapter(fetchMock).deliver(document);

        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe(WEBHOOK_URL);
        expect(init?.method).toBe("POST");
        expect(init?.headers).toEqual({ "Content-Type": "application/json" });
        expect(JSON.parse(String(init?.body))).toEqual(buildFeishuEnvelope(document));
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    // Scenario: Accepted message
    it("should report success for HTTP 200 with code 0", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ code: 0, msg: "success", data: {} }));

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome).toEqual({
            ok    : true,
            status: 200,
            data  : { code: 0, msg: "success", data: {} },
        });
    });

    it("should accept the StatusCode form of the reply", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ StatusCode: 0, StatusMessage: "success" }));

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome.ok).toBe(true);
    });

    // Scenario: Rejected message with HTTP 200
    it("should fail when the body carries a non-zero code", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ code: 19001, msg: "param invalid" }));

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome).toEqual({
            ok        : false,
            status    : 200,
            diagnostic: "Feishu rejected the card (code 19001): param invalid",
        });
    });

    it("should fail when the body has no code", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ msg: "hello" }));

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome.ok).toBe(false);
        expect(outcome.diagnostic).toBe("Feishu rejected the card (code missing): hello");
    });

    // Scenario: HTTP error status
    it("should fail on a non-2xx status", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => new Response("upstream down", { status: 502 }));

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome).toEqual({ ok: false, status: 502, diagnostic: "HTTP 502: upstream down" });
    });

    // Scenario: Unparsable body
    it("should fail on an unparsable body", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => new Response("<html></html>", { status: 200 }));

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome).toEqual({ ok: false, status: 200, diagnostic: "Unparsable response body (HTTP 200)" });
    });

    // Scenario: Network error
    it("should fail on a network error without a status", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => {
            throw new TypeError("fetch failed");
        });

        const outcome = await createAdapter(fetchMock).deliver(document);

        expect(outcome).toEqual({ ok: false, diagnostic: "Request failed: fetch failed" });
    });

    // Scenario: Timeout
    it("should report a timeout", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => {
            const error = new Error("The operation was aborted due to timeout");
            error.name = "TimeoutError";
            throw error;
        });

        const outcome = await createAdapter(fetchMock, 250).deliver(document);

        expect(outcome).toEqual({ ok: false, diagnostic: "Request timed out after 250ms" });
    });

    // Scenario: Default transport is the global fetch
    it("should use the global fetch when none is injected", async () => {
        const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ code: 0 }));
        vi.stubGlobal("fetch", fetchMock);

        const outcome = await new FeishuWebhookAdapter({ webhookUrl: WEBHOOK_URL }).deliver(document);

        expect(outcome.ok).toBe(true);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });
});
