/**
 * @fileoverview Dry-run delivery
 *
 * Prints the webhook envelope instead of sending it.
 *
 * @module adapters/console/ConsoleDeliveryAdapter
 */

import type { CardDocument, DeliveryAdapter, DeliveryOutcome } from "@listcard/engine";
import { buildFeishuEnvelope } from "../feishu/feishuCard.js";

export interface ConsoleDeliveryAdapterConfig {
    /** Output sink (default: process.stdout) */
    write?: (text: string) => void;
}

export class ConsoleDeliveryAdapter implements DeliveryAdapter {
    readonly id = "console";
    readonly description = "Prints the card payload to stdout";

    private readonly write: (text: string) => void;

    constructor(config: ConsoleDeliveryAdapterConfig = {}) {
        this.write = config.write ?? ((text) => {
            process.stdout.write(text);
        });
    }

    async deliver(document: CardDocument): Promise<DeliveryOutcome> {
        this.write(`${JSON.stringify(buildFeishuEnvelope(document), null, 2)}\n`);
        return { ok: true };
    }
}
