/**
 * @fileoverview Unit tests for ConsoleDeliveryAdapter
 *
 * @module feishu-notify/__tests__/ConsoleDeliveryAdapter
 */

import { describe, it, expect } from "vitest";
import { assembleCard } from "@listcard/engine";
import { ConsoleDeliveryAdapter } from "../adapters/console/ConsoleDeliveryAdapter.js";
import { buildFeishuEnvelope } from "../adapters/feishu/feishuCard.js";

describe("ConsoleDeliveryAdapter", () => {
    it("should print the envelope and report success", async () => {
        const output: string[] = [];
        const adapter = new ConsoleDeliveryAdapter({ write: (text) => output.push(text) });
        const document = assembleCard({
            title     : "Dry run",
            headerText: "H",
            theme     : "grey",
            wideLayout: true,
            items     : [{ index: 0, content: "a: 1", failed: false }],
        });

        const outcome = await adapter.deliver(document);

        expect(adapter.id).toBe("console");
        expect(outcome).toEqual({ ok: true });
        expect(output).toHaveLength(1);
        expect(output[0].endsWith("\n")).toBe(true);
        expect(JSON.parse(output[0])).toEqual(buildFeishuEnvelope(document));
    });
});
