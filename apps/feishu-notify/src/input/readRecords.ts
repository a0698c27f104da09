/**
 * @fileoverview Input reading
 *
 * Reads a JSON document from a file or a stream and checks that its top
 * level is an array. Element shapes are not checked here; the engine turns
 * non-object elements into per-item render faults.
 *
 * @module input/readRecords
 */

import { existsSync, readFileSync } from "fs";
import { InputFormatError, errorMessage } from "@listcard/engine";

export interface ReadRecordsOptions {
    /** File to read; stdin is used when absent */
    readonly file?: string;

    /** Stream to read when no file is given */
    readonly stdin: AsyncIterable<string | Uint8Array>;
}

/**
 * Collect a stream into a UTF-8 string.
 */
async function readStream(stream: AsyncIterable<string | Uint8Array>): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString("utf-8");
}

function readFile(file: string): string {
    if (!existsSync(file)) {
        throw new InputFormatError(`Input file not found: ${file}`, { file });
    }

    try {
        return readFileSync(file, "utf-8");
    }
    catch (error) {
        throw new InputFormatError(`Cannot read input file ${file}: ${errorMessage(error)}`, { file }, { cause: error });
    }
}

/**
 * Parse JSON text and require a top-level array.
 *
 * @throws InputFormatError for unparsable text or a non-array value
 */
export function parseRecords(text: string, source: string): unknown[] {
    // Strip a UTF-8 byte order mark
    const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    }
    catch (error) {
        throw new InputFormatError(`Invalid JSON in ${source}: ${errorMessage(error)}`, { source }, { cause: error });
    }

    if (!Array.isArray(parsed)) {
        throw new InputFormatError("Input must be a JSON array", {
            source,
            type: parsed === null ? "null" : typeof parsed,
        });
    }

    return parsed;
}

/**
 * Read the input records.
 *
 * @example
 * ```typescript
 * const records = await readRecords({ file: "builds.json", stdin: process.stdin });
 * ```
 */
export async function readRecords(options: ReadRecordsOptions): Promise<unknown[]> {
    if (options.file !== undefined) {
        return parseRecords(readFile(options.file), options.file);
    }
    return parseRecords(await readStream(options.stdin), "stdin");
}
