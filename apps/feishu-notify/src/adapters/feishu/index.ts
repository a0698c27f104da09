/**
 * @fileoverview Feishu adapter exports
 *
 * @module adapters/feishu
 */

export {
    FeishuWebhookAdapter,
    DEFAULT_WEBHOOK_TIMEOUT_MS,
    type FeishuWebhookAdapterConfig,
    type FetchFunction,
} from "./FeishuWebhookAdapter.js";

export {
    toFeishuCard,
    buildFeishuEnvelope,
    type FeishuCard,
    type FeishuEnvelope,
    type FeishuMarkdownDiv,
} from "./feishuCard.js";
