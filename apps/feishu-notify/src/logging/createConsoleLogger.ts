/**
 * @fileoverview CLI logger
 *
 * Every level goes to stderr; stdout carries only dry-run payloads.
 *
 * @module logging/createConsoleLogger
 */

import type { EngineLogger } from "@listcard/engine";

export interface ConsoleLoggerOptions {
    /** Emit debug messages */
    verbose?: boolean;

    /** Line sink (default: console.error) */
    write?: (line: string, data?: Record<string, unknown>) => void;
}

/**
 * Create a `[LEVEL]`-prefixed logger.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ verbose: true });
 * logger.info("Card delivered", { items: 3 });
 * // stderr: [INFO] Card delivered { items: 3 }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): EngineLogger {
    const write = options.write ?? ((line, data) => {
        if (data === undefined) {
            console.error(line);
        }
        else {
            console.error(line, data);
        }
    });

    return {
        debug: (msg, data) => {
            if (options.verbose) {
                write(`[DEBUG] ${msg}`, data);
            }
        },
        info : (msg, data) => write(`[INFO] ${msg}`, data),
        warn : (msg, data) => write(`[WARN] ${msg}`, data),
        error: (msg, data) => write(`[ERROR] ${msg}`, data),
    };
}
