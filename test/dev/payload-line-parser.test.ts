import { describe, expect, it } from "vitest";
import { parsePayloadLine, PayloadLineParser, type ScannedPayload } from "../../src/dev/payload-line-parser.js";

function collect(parser: PayloadLineParser): ScannedPayload[] {
    const scanned: ScannedPayload[] = [];

    parser.on("data", (data: ScannedPayload) => {
        scanned.push(data);
    });

    return scanned;
}

function flushEvents(): Promise<void> {
    return new Promise((resolve) => {
        setImmediate(resolve);
    });
}

describe("Payload line parser", () => {
    it("parses lines with and without address", () => {
        expect(parsePayloadLine("aafe2001")).toStrictEqual({ address: undefined, payload: Buffer.from([0xaa, 0xfe, 0x20, 0x01]) });
        expect(parsePayloadLine("  C4:7C:8D:00:00:01   AAFE2001 ")).toStrictEqual({
            address: "C4:7C:8D:00:00:01",
            payload: Buffer.from([0xaa, 0xfe, 0x20, 0x01]),
        });
    });

    it("rejects malformed lines", () => {
        expect(parsePayloadLine("")).toStrictEqual(undefined);
        expect(parsePayloadLine("aafe2")).toStrictEqual(undefined);
        expect(parsePayloadLine("zz")).toStrictEqual(undefined);
        expect(parsePayloadLine("C4:7C:8D:00:00:01 aafe 20")).toStrictEqual(undefined);
    });

    it("splits chunks into lines", async () => {
        const parser = new PayloadLineParser();
        const scanned = collect(parser);

        parser.write(Buffer.from("C4:7C:8D:00:00:01 aafe"));
        parser.write(Buffer.from("2001\r\nnot a payload\n\n9afe"));
        await flushEvents();

        expect(scanned).toStrictEqual([{ address: "C4:7C:8D:00:00:01", payload: Buffer.from([0xaa, 0xfe, 0x20, 0x01]) }]);

        parser.write(Buffer.from("12\n"));
        await flushEvents();

        expect(scanned).toStrictEqual([
            { address: "C4:7C:8D:00:00:01", payload: Buffer.from([0xaa, 0xfe, 0x20, 0x01]) },
            { address: undefined, payload: Buffer.from([0x9a, 0xfe, 0x12]) },
        ]);
    });

    it("flushes the last line without newline", async () => {
        const parser = new PayloadLineParser();
        const scanned = collect(parser);

        parser.write(Buffer.from("aafe10"));
        await flushEvents();

        expect(scanned).toStrictEqual([]);

        await new Promise<void>((resolve) => {
            parser.end(resolve);
        });
        await flushEvents();

        expect(scanned).toStrictEqual([{ address: undefined, payload: Buffer.from([0xaa, 0xfe, 0x10]) }]);
    });
});
