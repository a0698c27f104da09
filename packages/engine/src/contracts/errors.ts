/**
 * @fileoverview Error kinds
 *
 * Every failure the pipeline can report carries a stable `kind` so callers
 * can map it to a diagnostic and an exit status without string matching.
 *
 * @module @listcard/engine/contracts/errors
 */

/**
 * Discriminator shared by all listcard errors.
 */
export type ListcardErrorKind =
    | "ConfigurationError"
    | "InputFormatError"
    | "RenderFault"
    | "DeliveryFault";

/**
 * Base class for all errors raised by the engine and its adapters.
 */
export abstract class ListcardError extends Error {
    abstract readonly kind: ListcardErrorKind;

    /** Optional structured details for logging */
    readonly details?: Record<string, unknown>;

    constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.details = details;
    }
}

/**
 * Invalid theme, bad flag, bad rules file or missing webhook credential.
 * Fatal: raised before any record is rendered.
 */
export class ConfigurationError extends ListcardError {
    readonly kind = "ConfigurationError" as const;
    override readonly name = "ConfigurationError";
}

/**
 * Unreadable input file, unparsable JSON or a non-array top level.
 * Fatal: raised before delivery.
 */
export class InputFormatError extends ListcardError {
    readonly kind = "InputFormatError" as const;
    override readonly name = "InputFormatError";
}

/**
 * A single record could not be rendered.
 * Always recovered by the engine; never escapes a run.
 */
export class RenderFault extends ListcardError {
    readonly kind = "RenderFault" as const;
    override readonly name = "RenderFault";
}

/**
 * The webhook call failed: network error, timeout, HTTP error status or a
 * non-zero `code` in the response body.
 */
export class DeliveryFault extends ListcardError {
    readonly kind = "DeliveryFault" as const;
    override readonly name = "DeliveryFault";
}

/**
 * Type guard for listcard errors.
 *
 * @param error - Any caught value
 * @returns True if the value is a ListcardError
 */
export function isListcardError(error: unknown): error is ListcardError {
    return error instanceof ListcardError;
}

/**
 * Extract a printable message from any caught value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
