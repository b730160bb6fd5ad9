import { describe, expect, it, vi } from "vitest";
import { TelemetryFrame } from "../../src/beacon-frames/telemetry-frame.js";
import { BeaconTracker, describeFrame, summarizeFrame } from "../../src/dev/beacon-tracker.js";

const ADDRESS = "C4:7C:8D:00:00:01";
// protocol v1, the version the dispatcher routes to telemetry frames
const TELEMETRY_A = Buffer.from("9afe120123456789abcdef007f7f7f4c055902000000", "hex");
const TELEMETRY_B = Buffer.from("9afe120123456789abcdef0140c00004236166e02e57", "hex");
const TELEMETRY_V2_A = Buffer.from("9afe220123456789abcdef007f7f7f4c055900cd8b01", "hex");
const UID_PAYLOAD = Buffer.from("aafe00ee00112233445566778899aabbccddeeff0000", "hex");

describe("Beacon tracker", () => {
    it("tracks one frame per address and kind", () => {
        const onNewFrame = vi.fn();
        const onFrameChanged = vi.fn();
        const tracker = new BeaconTracker({ onNewFrame, onFrameChanged });

        const first = tracker.track({ address: ADDRESS, payload: TELEMETRY_A });
        const second = tracker.track({ address: ADDRESS, payload: TELEMETRY_B });

        expect(second).toBe(first);
        expect(tracker.size).toStrictEqual(1);
        expect(onNewFrame).toHaveBeenCalledTimes(1);
        expect(first?.kind).toStrictEqual("estimote-telemetry");
        expect(onNewFrame).toHaveBeenCalledWith(ADDRESS, first);
        expect(onFrameChanged).toHaveBeenCalledTimes(1);
        expect(onFrameChanged.mock.calls[0][2]).toStrictEqual([
            "subframeType",
            "magneticField",
            "ambientLightLevel",
            "uptime",
            "temperature",
            "batteryVoltage",
            "batteryLevel",
        ]);

        // same payload again
        tracker.track({ address: ADDRESS, payload: TELEMETRY_B });

        expect(onFrameChanged).toHaveBeenCalledTimes(1);

        tracker.track({ address: ADDRESS, payload: UID_PAYLOAD });
        tracker.track({ address: "C4:7C:8D:00:00:02", payload: TELEMETRY_A });

        expect(tracker.size).toStrictEqual(3);
        expect(tracker.get(ADDRESS, "eddystone-uid")?.kind).toStrictEqual("eddystone-uid");
        expect(tracker.get("C4:7C:8D:00:00:02", "eddystone-uid")).toStrictEqual(undefined);
        expect(onNewFrame).toHaveBeenCalledTimes(3);

        tracker.clear();

        expect(tracker.size).toStrictEqual(0);
    });

    it("tracks telemetry frames of other protocol versions as unknown", () => {
        const onFrameChanged = vi.fn();
        const tracker = new BeaconTracker({ onFrameChanged });

        expect(tracker.track({ address: ADDRESS, payload: TELEMETRY_V2_A })?.kind).toStrictEqual("unknown");
        expect(tracker.track({ address: ADDRESS, payload: TELEMETRY_V2_A })?.kind).toStrictEqual("unknown");
        expect(tracker.get(ADDRESS, "estimote-telemetry")).toStrictEqual(undefined);
        expect(tracker.size).toStrictEqual(1);
        expect(onFrameChanged).toHaveBeenCalledTimes(0);
    });

    it("ignores payloads of unknown families", () => {
        const onNewFrame = vi.fn();
        const tracker = new BeaconTracker({ onNewFrame });

        expect(tracker.track({ address: ADDRESS, payload: Buffer.from([0x01, 0x02, 0x03]) })).toStrictEqual(undefined);
        expect(tracker.size).toStrictEqual(0);
        expect(onNewFrame).toHaveBeenCalledTimes(0);
    });

    it("summarizes frames", () => {
        const telemetry = new TelemetryFrame(TELEMETRY_A);

        expect(summarizeFrame(telemetry)).toStrictEqual({
            protocolVersion: "1",
            shortIdentifier: "0123456789ABCDEF",
            subframeType: "0",
            acceleration: "{2; 2; 2}",
            isMoving: "true",
            previousMotionStateDuration: "12 minutes",
            currentMotionStateDuration: "5 seconds",
            gpio: "[true, false, true, false]",
            errorMessage: "Clock error",
        });

        const uid = new BeaconTracker().track({ address: undefined, payload: UID_PAYLOAD });

        expect(uid === undefined ? undefined : describeFrame(uid)).toStrictEqual(
            "eddystone-uid rangingData=-18 namespaceId=00112233445566778899 instanceId=aabbccddeeff",
        );
    });
});
