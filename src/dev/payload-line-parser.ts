import { Transform, type TransformCallback, type TransformOptions } from "node:stream";
import { logger } from "../utils/logger.js";

const NS = "scanner:parser";

export type ScannedPayload = {
    /** as printed by the receiver, e.g. `C4:7C:8D:6A:12:34`, undefined when the line carries no address */
    address: string | undefined;
    /** service data, starting with the 16-bit service UUID (little-endian) */
    payload: Buffer;
};

const HEX_PAYLOAD_REGEX = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Parse a single line of the form `[<address> ]<hex payload>`.
 *
 * @returns undefined if the line is malformed
 */
export function parsePayloadLine(line: string): ScannedPayload | undefined {
    const parts = line.trim().split(/\s+/);

    if (parts.length === 1 && HEX_PAYLOAD_REGEX.test(parts[0])) {
        return { address: undefined, payload: Buffer.from(parts[0], "hex") };
    }

    if (parts.length === 2 && HEX_PAYLOAD_REGEX.test(parts[1])) {
        return { address: parts[0], payload: Buffer.from(parts[1], "hex") };
    }

    return undefined;
}

/**
 * Split the text coming from the receiver into lines, emits one `ScannedPayload` object per valid line.
 */
export class PayloadLineParser extends Transform {
    #buffer: string;

    public constructor(opts?: TransformOptions) {
        super({ ...opts, readableObjectMode: true });

        this.#buffer = "";
    }

    override _transform(chunk: Buffer | string, _encoding: BufferEncoding, cb: TransformCallback): void {
        const lines = (this.#buffer + chunk.toString()).split(/\r?\n/);

        // last element is an incomplete line, or empty if chunk ended with a newline
        this.#buffer = lines.pop() ?? "";

        for (const line of lines) {
            this.#pushLine(line);
        }

        cb();
    }

    override _flush(cb: TransformCallback): void {
        if (this.#buffer.length > 0) {
            this.#pushLine(this.#buffer);

            this.#buffer = "";
        }

        cb();
    }

    #pushLine(line: string): void {
        if (line.trim().length === 0) {
            return;
        }

        const scanned = parsePayloadLine(line);

        if (scanned === undefined) {
            logger.warning(`Dropping malformed line: ${line}`, NS);
            return;
        }

        logger.debug(() => `<<< LINE[${scanned.address ?? "?"} ${scanned.payload.toString("hex")}]`, NS);

        this.push(scanned);
    }
}
