import { describe, expect, it } from "vitest";
import {
    BeaconError,
    createEddystoneHeader,
    createTelemetryHeader,
    EddystoneFrameType,
    getEddystoneFrameType,
    getTelemetryFrameType,
    isEddystonePayload,
    isTelemetryPayload,
    TelemetryFrameType,
} from "../../src/beacon/beacon.js";

describe("Beacon", () => {
    it("detects the Eddystone service UUID", () => {
        expect(isEddystonePayload(Buffer.from([0xaa, 0xfe, 0x00]))).toStrictEqual(true);
        expect(isEddystonePayload(Buffer.from([0xaa, 0xfe, 0x99, 0x01]))).toStrictEqual(true);
        expect(isEddystonePayload(Buffer.from([0xaa, 0xfe]))).toStrictEqual(false);
        expect(isEddystonePayload(Buffer.from([0xfe, 0xaa, 0x00]))).toStrictEqual(false);
        expect(isEddystonePayload(Buffer.alloc(0))).toStrictEqual(false);
        expect(isEddystonePayload(undefined)).toStrictEqual(false);
    });

    it("detects the Estimote service UUID", () => {
        expect(isTelemetryPayload(Buffer.from([0x9a, 0xfe, 0x12]))).toStrictEqual(true);
        expect(isTelemetryPayload(Buffer.from([0x9a, 0xfe]))).toStrictEqual(false);
        expect(isTelemetryPayload(Buffer.from([0xaa, 0xfe, 0x12]))).toStrictEqual(false);
        expect(isTelemetryPayload(undefined)).toStrictEqual(false);
    });

    it("gets known Eddystone frame types only", () => {
        expect(getEddystoneFrameType(Buffer.from([0xaa, 0xfe, 0x00]))).toStrictEqual(EddystoneFrameType.UID);
        expect(getEddystoneFrameType(Buffer.from([0xaa, 0xfe, 0x10]))).toStrictEqual(EddystoneFrameType.URL);
        expect(getEddystoneFrameType(Buffer.from([0xaa, 0xfe, 0x20]))).toStrictEqual(EddystoneFrameType.TLM);
        // EID, not supported
        expect(getEddystoneFrameType(Buffer.from([0xaa, 0xfe, 0x30]))).toStrictEqual(undefined);
        expect(getEddystoneFrameType(Buffer.from([0x9a, 0xfe, 0x00]))).toStrictEqual(undefined);
        expect(getEddystoneFrameType(Buffer.from([0x01, 0x02]))).toStrictEqual(undefined);
    });

    it("gets known Estimote frame types only", () => {
        expect(getTelemetryFrameType(Buffer.from([0x9a, 0xfe, 0x12]))).toStrictEqual(TelemetryFrameType.ESTIMOTE);
        // protocol v2 telemetry, not the frame type byte itself
        expect(getTelemetryFrameType(Buffer.from([0x9a, 0xfe, 0x22]))).toStrictEqual(undefined);
        expect(getTelemetryFrameType(Buffer.from([0xaa, 0xfe, 0x12]))).toStrictEqual(undefined);
    });

    it("creates headers", () => {
        expect(createEddystoneHeader(EddystoneFrameType.TLM)).toStrictEqual(Buffer.from([0xaa, 0xfe, 0x20]));
        expect(createTelemetryHeader(0x22)).toStrictEqual(Buffer.from([0x9a, 0xfe, 0x22]));
        expect(createTelemetryHeader(0x112)).toStrictEqual(Buffer.from([0x9a, 0xfe, 0x12]));
    });

    it("names its error", () => {
        const cause = new Error("inner");
        const error = new BeaconError("outer", { cause });

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toStrictEqual("BeaconError");
        expect(error.message).toStrictEqual("outer");
        expect(error.cause).toBe(cause);
    });
});
