/**
 * @fileoverview feishu-notify application
 *
 * Wires the CLI options, rules, renderer and delivery adapter into a
 * CardEngine run and maps the result to an exit code.
 *
 * Order of checks:
 * 1. Arguments and theme (ConfigurationError, exit 2)
 * 2. Rules file, renderer and webhook URL (ConfigurationError, exit 2)
 * 3. Input (InputFormatError, exit 3)
 * 4. Render and deliver once (delivery failure, exit 1)
 *
 * @module app
 */

import {
    CardEngine,
    ConfigurationError,
    InputFormatError,
    RendererLoader,
    errorMessage,
    validateTheme,
    type DeliveryAdapter,
    type EngineLogger,
    type Renderer,
} from "@listcard/engine";
import { parseArgs, USAGE, type CliOptions } from "./cli/index.js";
import { resolveRules, resolveWebhookUrl } from "./config/index.js";
import { readRecords } from "./input/index.js";
import { ConsoleDeliveryAdapter, FeishuWebhookAdapter, type FetchFunction } from "./adapters/index.js";
import { createConsoleLogger } from "./logging/index.js";

export const EXIT_CODES = {
    ok           : 0,
    delivery     : 1,
    configuration: 2,
    input        : 3,
} as const;

/**
 * Process-level dependencies, injected so runs can be tested in-process.
 */
export interface AppDeps {
    /** Environment variables */
    env: Readonly<Record<string, string | undefined>>;

    /** Standard input */
    stdin: AsyncIterable<string | Uint8Array>;

    /** Standard output sink (help text, dry-run payloads) */
    stdout: (text: string) => void;

    /** Logger (default: stderr logger honouring --verbose) */
    logger?: EngineLogger;

    /** fetch implementation for the webhook adapter */
    fetch?: FetchFunction;

    /** Bundled rules file location */
    defaultRulesPath?: string;
}

async function loadRenderer(options: CliOptions, logger: EngineLogger): Promise<Renderer | undefined> {
    if (options.rendererPath === undefined) {
        return undefined;
    }
    return new RendererLoader({ logger }).loadFromFile(options.rendererPath);
}

function createAdapter(options: CliOptions, deps: AppDeps, logger: EngineLogger): DeliveryAdapter {
    if (options.dryRun) {
        return new ConsoleDeliveryAdapter({ write: deps.stdout });
    }

    return new FeishuWebhookAdapter({
        webhookUrl: resolveWebhookUrl(deps.env),
        timeoutMs : options.timeoutMs,
        fetch     : deps.fetch,
        logger,
    });
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments without the node and script entries
 * @returns Process exit code
 */
export async function runApp(argv: readonly string[], deps: AppDeps): Promise<number> {
    let logger = deps.logger ?? createConsoleLogger();

    try {
        const options = parseArgs(argv);

        if (options.help) {
            deps.stdout(USAGE);
            return EXIT_CODES.ok;
        }

        logger = deps.logger ?? createConsoleLogger({ verbose: options.verbose });

        validateTheme(options.theme);

        const rules = resolveRules(options, logger, deps.defaultRulesPath);
        const renderer = await loadRenderer(options, logger);
        const adapter = createAdapter(options, deps, logger);

        const records = await readRecords({ file: options.file, stdin: deps.stdin });
        logger.debug("Input read", { records: records.length, source: options.file ?? "stdin" });

        const engine = new CardEngine({ rules, renderer, logger });
        const runLogger = logger;
        engine.eventBus.subscribe("*", (event) => {
            runLogger.debug(`Event ${event.type}`, { traceId: event.traceId, ...event.data });
        });

        const result = await engine.run(records, {
            title     : options.title,
            headerText: options.headerText,
            theme     : options.theme,
            wideLayout: options.wideLayout,
        }, adapter);

        if (result.renderFailures > 0) {
            logger.warn(`${result.renderFailures} of ${result.document.items.length} records could not be rendered`);
        }

        return result.ok ? EXIT_CODES.ok : EXIT_CODES.delivery;
    }
    catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error(`Configuration error: ${error.message}`, error.details);
            return EXIT_CODES.configuration;
        }
        if (error instanceof InputFormatError) {
            logger.error(`Input error: ${error.message}`, error.details);
            return EXIT_CODES.input;
        }
        logger.error(`Unexpected failure: ${errorMessage(error)}`);
        return EXIT_CODES.delivery;
    }
}
