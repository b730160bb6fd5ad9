import { describe, expect, it, vi } from "vitest";
import { BeaconError } from "../../src/beacon/beacon.js";
import type { Duration, Vector3 } from "../../src/beacon/estimote-telemetry.js";
import { TelemetryFrame } from "../../src/beacon-frames/telemetry-frame.js";

const IDENTIFIER = "0123456789abcdef";

function telemetryPayload(versionAndType: string, subframe: string, body: string): Buffer {
    return Buffer.from(`9afe${versionAndType}${IDENTIFIER}${subframe}${body}`, "hex");
}

const SUBFRAME_A_BODY = "7f7f7f" + "4c" + "05" + "59" + "00cd8b01";
const SUBFRAME_B_BODY = "40c000" + "04" + "2361" + "66" + "e0" + "2e" + "57";
const V2_SUBFRAME_A = telemetryPayload("22", "00", SUBFRAME_A_BODY);
const V2_SUBFRAME_B = telemetryPayload("22", "01", SUBFRAME_B_BODY);
const V1_SUBFRAME_B = telemetryPayload("12", "01", SUBFRAME_B_BODY);

function defined<T>(value: T | undefined): T {
    if (value === undefined) {
        throw new Error("Expected a value");
    }

    return value;
}

describe("Telemetry frame", () => {
    it("decodes subframe A on construction from bytes", () => {
        const onFieldChanged = vi.fn();
        const frame = new TelemetryFrame(V2_SUBFRAME_A, { onFieldChanged });

        expect(frame.kind).toStrictEqual("estimote-telemetry");
        expect(frame.isValid()).toStrictEqual(true);
        expect(frame.protocolVersion).toStrictEqual(2);
        expect(frame.shortIdentifier).toStrictEqual("0123456789ABCDEF");
        expect(frame.subframeType).toStrictEqual(0);
        expect(frame.acceleration).toStrictEqual({ x: 2, y: 2, z: 2 });
        expect(frame.isMoving).toStrictEqual(true);
        expect(frame.previousMotionStateDuration).toStrictEqual({ value: 12, unit: "minutes" });
        expect(frame.currentMotionStateDuration).toStrictEqual({ value: 5, unit: "seconds" });
        expect(frame.gpio).toStrictEqual([true, false, true, false]);
        expect(frame.firmwareError).toStrictEqual(false);
        expect(frame.clockError).toStrictEqual(true);
        expect(frame.errorMessage).toStrictEqual("Clock error");
        expect(frame.pressure).toStrictEqual(101325);
        expect(frame.magneticField).toStrictEqual(undefined);
        expect(frame.batteryVoltage).toStrictEqual(undefined);
        expect(onFieldChanged.mock.calls).toStrictEqual([
            ["protocolVersion"],
            ["shortIdentifier"],
            ["acceleration"],
            ["isMoving"],
            ["previousMotionStateDuration"],
            ["currentMotionStateDuration"],
            ["gpio"],
            ["clockError"],
            ["pressure"],
            ["errorMessage"],
        ]);
    });

    it("keeps the values of the other subframe on update", () => {
        const onFieldChanged = vi.fn();
        const frame = new TelemetryFrame(V2_SUBFRAME_A, { onFieldChanged });

        onFieldChanged.mockClear();

        const changes = frame.update(new TelemetryFrame(V2_SUBFRAME_B));

        expect(changes).toStrictEqual([
            "subframeType",
            "magneticField",
            "ambientLightLevel",
            "uptime",
            "temperature",
            "batteryVoltage",
            "batteryLevel",
        ]);
        expect(onFieldChanged).toHaveBeenCalledTimes(7);
        expect(frame.subframeType).toStrictEqual(1);
        expect(frame.magneticField).toStrictEqual({ x: 1, y: -1, z: 0 });
        expect(frame.ambientLightLevel).toStrictEqual(2.88);
        expect(frame.uptime).toStrictEqual({ value: 291, unit: "hours" });
        expect(frame.temperature).toStrictEqual(25.5625);
        expect(frame.batteryVoltage).toStrictEqual(3000);
        expect(frame.batteryLevel).toStrictEqual(87);
        // subframe A values are kept
        expect(frame.acceleration).toStrictEqual({ x: 2, y: 2, z: 2 });
        expect(frame.pressure).toStrictEqual(101325);
        expect(frame.errorMessage).toStrictEqual("Clock error");

        // same subframe again: nothing changed
        expect(frame.update(new TelemetryFrame(V2_SUBFRAME_B))).toStrictEqual([]);
        // back to A: only the discriminator changed
        expect(frame.update(new TelemetryFrame(V2_SUBFRAME_A))).toStrictEqual(["subframeType"]);
    });

    it("stops decoding after an unsupported protocol version", () => {
        const frame = new TelemetryFrame(V2_SUBFRAME_A);
        const changes = frame.setPayload(telemetryPayload("32", "01", SUBFRAME_B_BODY));

        expect(frame.isValid()).toStrictEqual(true);
        expect(changes).toStrictEqual(["protocolVersion"]);
        expect(frame.protocolVersion).toStrictEqual(3);
        expect(frame.shortIdentifier).toStrictEqual("0123456789ABCDEF");
        expect(frame.subframeType).toStrictEqual(0);
        expect(frame.magneticField).toStrictEqual(undefined);

        frame.isMoving = false;

        expect(frame.payload).toStrictEqual(undefined);
    });

    it("ignores payloads of another frame type", () => {
        const frame = new TelemetryFrame(V2_SUBFRAME_A);

        expect(frame.setPayload(telemetryPayload("21", "01", SUBFRAME_B_BODY))).toStrictEqual([]);
        expect(frame.isValid()).toStrictEqual(false);
        expect(frame.protocolVersion).toStrictEqual(2);
        expect(frame.subframeType).toStrictEqual(0);
    });

    it("encodes on construction from fields", () => {
        const onFieldChanged = vi.fn();
        const frame = new TelemetryFrame(
            {
                protocolVersion: 1,
                shortIdentifier: "0123456789ABCDEF",
                subframeType: 1,
                magneticField: { x: 1, y: -1, z: 0 },
                ambientLightLevel: 2.88,
                uptime: { value: 291, unit: "hours" },
                temperature: 25.5625,
                batteryVoltage: 3000,
                batteryLevel: 87,
            },
            { onFieldChanged },
        );

        expect(frame.payload).toStrictEqual(V1_SUBFRAME_B);
        expect(frame.isValid()).toStrictEqual(true);
        expect(onFieldChanged).toHaveBeenCalledTimes(0);
        expect(new TelemetryFrame({}).payload).toStrictEqual(undefined);
    });

    it("re-encodes on set", () => {
        const onFieldChanged = vi.fn();
        const frame = new TelemetryFrame(V2_SUBFRAME_A, { onFieldChanged });

        onFieldChanged.mockClear();

        frame.acceleration = { x: 2, y: 2, z: 2 };

        expect(onFieldChanged).toHaveBeenCalledTimes(0);

        frame.isMoving = false;
        frame.pressure = undefined;

        expect(frame.payload).toStrictEqual(telemetryPayload("22", "00", "7f7f7f" + "4c" + "05" + "58" + "ffffffff"));
        expect(onFieldChanged.mock.calls).toStrictEqual([["isMoving"], ["pressure"]]);

        frame.shortIdentifier = "FEDCBA9876543210";

        expect(frame.payload?.toString("hex", 3, 11)).toStrictEqual("fedcba9876543210");

        frame.shortIdentifier = "not hex";

        expect(frame.payload).toStrictEqual(undefined);
    });

    it("notifies the error message derived from the error flags", () => {
        const onFieldChanged = vi.fn();
        const frame = new TelemetryFrame(V2_SUBFRAME_A, { onFieldChanged });

        onFieldChanged.mockClear();

        frame.firmwareError = true;

        expect(frame.errorMessage).toStrictEqual("Firmware & clock error");
        expect(onFieldChanged.mock.calls).toStrictEqual([["firmwareError"], ["errorMessage"]]);
        expect(frame.payload?.[17]).toStrictEqual(0x5d);

        frame.clockError = false;
        frame.firmwareError = false;

        expect(frame.errorMessage).toStrictEqual(undefined);
        expect(onFieldChanged.mock.calls).toStrictEqual([
            ["firmwareError"],
            ["errorMessage"],
            ["clockError"],
            ["errorMessage"],
            ["firmwareError"],
            ["errorMessage"],
        ]);
    });

    it("rejects invalid subframe types", () => {
        const frame = new TelemetryFrame(V2_SUBFRAME_A);

        expect(() => {
            frame.subframeType = 2;
        }).toThrow(BeaconError);
        expect(() => new TelemetryFrame({ subframeType: 3 })).toThrow("Invalid telemetry subframe type 3, expected 0 (A) or 1 (B)");

        frame.subframeType = 1;

        expect(frame.payload?.[11]).toStrictEqual(0x01);
    });

    it("does not hand out the stored objects", () => {
        const onFieldChanged = vi.fn();
        const frame = new TelemetryFrame(V2_SUBFRAME_A, { onFieldChanged });

        onFieldChanged.mockClear();

        const acceleration = defined(frame.acceleration);

        acceleration.x = 0;

        expect(frame.acceleration).toStrictEqual({ x: 2, y: 2, z: 2 });
        expect(onFieldChanged).toHaveBeenCalledTimes(0);

        frame.acceleration = acceleration;

        expect(frame.acceleration).toStrictEqual({ x: 0, y: 2, z: 2 });
        expect(frame.payload?.toString("hex", 12, 15)).toStrictEqual("007f7f");
        expect(onFieldChanged.mock.calls).toStrictEqual([["acceleration"]]);

        defined(frame.currentMotionStateDuration).value = 60;

        expect(frame.currentMotionStateDuration).toStrictEqual({ value: 5, unit: "seconds" });
    });

    it("does not keep the objects given to setters", () => {
        const frame = new TelemetryFrame(V2_SUBFRAME_A);
        const duration: Duration = { value: 3, unit: "hours" };

        frame.previousMotionStateDuration = duration;
        duration.value = 4;

        expect(frame.previousMotionStateDuration).toStrictEqual({ value: 3, unit: "hours" });
        expect(frame.payload?.[15]).toStrictEqual(0x83);

        frame.previousMotionStateDuration = duration;

        expect(frame.previousMotionStateDuration).toStrictEqual({ value: 4, unit: "hours" });
        expect(frame.payload?.[15]).toStrictEqual(0x84);
    });

    it("does not keep the objects given on construction", () => {
        const magneticField: Vector3 = { x: 1, y: -1, z: 0 };
        const uptime: Duration = { value: 291, unit: "hours" };
        const frame = new TelemetryFrame({
            protocolVersion: 1,
            shortIdentifier: "0123456789ABCDEF",
            subframeType: 1,
            magneticField,
            ambientLightLevel: 2.88,
            uptime,
            temperature: 25.5625,
            batteryVoltage: 3000,
            batteryLevel: 87,
        });

        magneticField.x = -1;
        uptime.unit = "days";

        expect(frame.magneticField).toStrictEqual({ x: 1, y: -1, z: 0 });
        expect(frame.uptime).toStrictEqual({ value: 291, unit: "hours" });
        expect(frame.payload).toStrictEqual(V1_SUBFRAME_B);
    });

    it("saturates a motion state duration too long for its unit", () => {
        const frame = new TelemetryFrame(V2_SUBFRAME_A);

        frame.previousMotionStateDuration = { value: 64, unit: "seconds" };

        expect(frame.payload?.[15]).toStrictEqual(0x3f);
        expect(new TelemetryFrame(defined(frame.payload)).previousMotionStateDuration).toStrictEqual({ value: 63, unit: "seconds" });
    });
});
