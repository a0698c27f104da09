/**
 * @fileoverview Feishu interactive card format
 *
 * Maps a CardDocument onto the Feishu "interactive" message body.
 *
 * @module adapters/feishu/feishuCard
 */

import type { CardDocument, CardTheme } from "@listcard/engine";

export interface FeishuMarkdownDiv {
    tag: "div";
    text: {
        tag: "lark_md";
        content: string;
    };
}

export interface FeishuCard {
    config: {
        wide_screen_mode: boolean;
    };
    header: {
        template: CardTheme;
        title: {
            tag: "plain_text";
            content: string;
        };
    };
    elements: FeishuMarkdownDiv[];
}

export interface FeishuEnvelope {
    msg_type: "interactive";
    card: FeishuCard;
}

function markdownDiv(content: string): FeishuMarkdownDiv {
    return { tag: "div", text: { tag: "lark_md", content } };
}

/**
 * Build the card body: the header block followed by one div per item.
 */
export function toFeishuCard(document: CardDocument): FeishuCard {
    return {
        config: {
            wide_screen_mode: document.wideLayout,
        },
        header: {
            template: document.theme,
            title   : {
                tag    : "plain_text",
                content: document.title,
            },
        },
        elements: [
            markdownDiv(document.headerText),
            ...document.items.map(item => markdownDiv(item.content)),
        ],
    };
}

/**
 * Wrap the card in the webhook message envelope.
 */
export function buildFeishuEnvelope(document: CardDocument): FeishuEnvelope {
    return {
        msg_type: "interactive",
        card    : toFeishuCard(document),
    };
}
