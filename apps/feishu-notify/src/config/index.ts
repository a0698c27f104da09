/**
 * @fileoverview Configuration exports
 *
 * @module config
 */

export {
    loadRulesFile,
    loadRulesFileWithFallback,
    mergeRules,
    resolveRules,
    getDefaultRulesPath,
    type RulesFileContent,
} from "./loadRules.js";

export { resolveWebhookUrl, WEBHOOK_ENV_VAR } from "./webhook.js";
