/**
 * @fileoverview Webhook credential resolution
 *
 * @module config/webhook
 */

import { ConfigurationError } from "@listcard/engine";

export const WEBHOOK_ENV_VAR = "FEISHU_WEBHOOK_URL";

/**
 * Read the webhook URL from the environment.
 *
 * @param env - Environment variables (process.env after dotenv has run)
 * @returns The trimmed webhook URL
 * @throws ConfigurationError if the variable is missing, blank or not an http(s) URL
 */
export function resolveWebhookUrl(env: Readonly<Record<string, string | undefined>>): string {
    const raw = env[WEBHOOK_ENV_VAR]?.trim();

    if (!raw) {
        throw new ConfigurationError(`${WEBHOOK_ENV_VAR} is not set`);
    }

    let url: URL;
    try {
        url = new URL(raw);
    }
    catch (error) {
        throw new ConfigurationError(`${WEBHOOK_ENV_VAR} is not a valid URL`, undefined, { cause: error });
    }

    if (url.protocol !== "https:" && url.protocol !== "http:") {
        throw new ConfigurationError(`${WEBHOOK_ENV_VAR} must be an http(s) URL, got ${url.protocol}`);
    }

    return raw;
}
