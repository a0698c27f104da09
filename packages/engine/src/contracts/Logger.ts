/**
 * Logger Contract
 *
 * Structured logger shape used by the engine, renderers and adapters.
 * Embedders pass their own implementation; the engine never writes to the
 * console directly except through its default logger.
 */

export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
