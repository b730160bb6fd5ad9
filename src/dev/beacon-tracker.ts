import { EstimoteTelemetrySubframe, formatDuration, formatVector3 } from "../beacon/estimote-telemetry.js";
import { type BeaconFrame, type BeaconFrameField, createBeaconFrame } from "../beacon-frames/dispatcher.js";
import { logger } from "../utils/logger.js";
import type { ScannedPayload } from "./payload-line-parser.js";

const NS = "scanner:tracker";

export type BeaconTrackerCallbacks = {
    onNewFrame: (address: string | undefined, frame: BeaconFrame) => void;
    onFrameChanged: (address: string | undefined, frame: BeaconFrame, changes: BeaconFrameField[]) => void;
};

function formatValue(value: unknown): string {
    if (Buffer.isBuffer(value)) {
        return value.toString("hex");
    }

    if (Array.isArray(value)) {
        return `[${value.map(formatValue).join(", ")}]`;
    }

    if (typeof value === "object" && value !== null) {
        return `{${Object.entries(value)
            .map(([key, v]) => `${key}: ${formatValue(v)}`)
            .join(", ")}}`;
    }

    return String(value);
}

/**
 * Human-readable values of the fields the frame currently holds, in payload order. Fields without a value are left out.
 */
export function summarizeFrame(frame: BeaconFrame): Record<string, string> {
    const summary: Record<string, unknown> = {};

    switch (frame.kind) {
        case "eddystone-uid": {
            summary.rangingData = frame.rangingData;
            summary.namespaceId = frame.namespaceId;
            summary.instanceId = frame.instanceId;
            break;
        }
        case "eddystone-url": {
            summary.rangingData = frame.rangingData;
            summary.url = frame.url;
            break;
        }
        case "eddystone-tlm": {
            summary.version = frame.version;
            summary.batteryVoltage = frame.batteryVoltage;
            summary.temperature = frame.temperature;
            summary.advertisementCount = frame.advertisementCount;
            summary.timeSincePowerUp = frame.timeSincePowerUp;
            break;
        }
        case "estimote-telemetry": {
            summary.protocolVersion = frame.protocolVersion;
            summary.shortIdentifier = frame.shortIdentifier;
            summary.subframeType = frame.subframeType;

            if (frame.subframeType === EstimoteTelemetrySubframe.A) {
                summary.acceleration = frame.acceleration && formatVector3(frame.acceleration);
                summary.isMoving = frame.isMoving;
                summary.previousMotionStateDuration = frame.previousMotionStateDuration && formatDuration(frame.previousMotionStateDuration);
                summary.currentMotionStateDuration = frame.currentMotionStateDuration && formatDuration(frame.currentMotionStateDuration);
                summary.gpio = frame.gpio;
                summary.pressure = frame.pressure;
            } else {
                summary.magneticField = frame.magneticField && formatVector3(frame.magneticField);
                summary.ambientLightLevel = frame.ambientLightLevel;
                summary.uptime = frame.uptime && formatDuration(frame.uptime);
                summary.temperature = frame.temperature;
                summary.batteryVoltage = frame.batteryVoltage;
                summary.batteryLevel = frame.batteryLevel;
            }

            summary.errorMessage = frame.errorMessage;
            break;
        }
        case "unknown": {
            summary.payload = frame.payload;
            break;
        }
    }

    return Object.fromEntries(
        Object.entries(summary)
            .filter(([, value]) => value !== undefined)
            .map(([key, value]) => [key, formatValue(value)]),
    );
}

/** `kind key=value key=value` */
export function describeFrame(frame: BeaconFrame): string {
    const fields = Object.entries(summarizeFrame(frame)).map(([key, value]) => `${key}=${value}`);

    return [frame.kind, ...fields].join(" ");
}

/**
 * Keeps the latest frame per address and frame kind.
 * Payloads received for an already known beacon are fed to the existing frame, so only actual changes are reported.
 */
export class BeaconTracker {
    readonly #frames: Map<string, BeaconFrame>;
    readonly #callbacks: Partial<BeaconTrackerCallbacks>;

    constructor(callbacks: Partial<BeaconTrackerCallbacks> = {}) {
        this.#frames = new Map();
        this.#callbacks = callbacks;
    }

    get size(): number {
        return this.#frames.size;
    }

    public get(address: string | undefined, kind: BeaconFrame["kind"]): BeaconFrame | undefined {
        return this.#frames.get(this.#key(address, kind));
    }

    /**
     * @returns the tracked frame for this payload, undefined if no beacon family recognizes it
     */
    public track(scanned: ScannedPayload): BeaconFrame | undefined {
        const frame = createBeaconFrame(scanned.payload);

        if (frame === undefined) {
            logger.debug(() => `Ignoring payload from ${scanned.address}: ${scanned.payload.toString("hex")}`, NS);
            return undefined;
        }

        const key = this.#key(scanned.address, frame.kind);
        const existing = this.#frames.get(key);

        if (existing === undefined) {
            this.#frames.set(key, frame);
            logger.info(() => `New ${describeFrame(frame)} from ${scanned.address}`, NS);
            this.#callbacks.onNewFrame?.(scanned.address, frame);

            return frame;
        }

        const changes = existing.update(frame);

        if (changes.length > 0) {
            logger.info(() => `Changed ${changes.join(",")} for ${describeFrame(existing)} from ${scanned.address}`, NS);
            this.#callbacks.onFrameChanged?.(scanned.address, existing, changes);
        }

        return existing;
    }

    public clear(): void {
        this.#frames.clear();
    }

    #key(address: string | undefined, kind: BeaconFrame["kind"]): string {
        return `${address ?? "?"}/${kind}`;
    }
}
