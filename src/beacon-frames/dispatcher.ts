import {
    BeaconConsts,
    EddystoneFrameType,
    getEddystoneFrameType,
    getTelemetryFrameType,
    isEddystonePayload,
    isTelemetryPayload,
    TelemetryFrameType,
} from "../beacon/beacon.js";
import { logger } from "../utils/logger.js";
import type { BeaconFrameCallbacks, BeaconFrameKind } from "./frame-base.js";
import { TelemetryFrame, type TelemetryFrameField } from "./telemetry-frame.js";
import { TlmEddystoneFrame, type TLMFrameField } from "./tlm-frame.js";
import { UidEddystoneFrame, type UIDFrameField } from "./uid-frame.js";
import { UnknownBeaconFrame } from "./unknown-frame.js";
import { UrlEddystoneFrame, type URLFrameField } from "./url-frame.js";

const NS = "dispatcher";

export type BeaconFrame = UidEddystoneFrame | UrlEddystoneFrame | TlmEddystoneFrame | TelemetryFrame | UnknownBeaconFrame;

/** Union of the field names any frame variant can notify */
export type BeaconFrameField = UIDFrameField | URLFrameField | TLMFrameField | TelemetryFrameField;

/**
 * @returns undefined if the payload is not an Eddystone payload, "unknown" for frame types not supported
 */
export function classifyEddystonePayload(payload: Buffer | undefined): BeaconFrameKind | undefined {
    if (!isEddystonePayload(payload)) {
        return undefined;
    }

    switch (getEddystoneFrameType(payload)) {
        case EddystoneFrameType.UID: {
            return "eddystone-uid";
        }
        case EddystoneFrameType.URL: {
            return "eddystone-url";
        }
        case EddystoneFrameType.TLM: {
            return "eddystone-tlm";
        }
    }

    return "unknown";
}

/**
 * @returns undefined if the payload is not an Estimote payload, "unknown" for frame types not supported
 */
export function classifyTelemetryPayload(payload: Buffer | undefined): BeaconFrameKind | undefined {
    if (!isTelemetryPayload(payload)) {
        return undefined;
    }

    return getTelemetryFrameType(payload) === TelemetryFrameType.ESTIMOTE ? "estimote-telemetry" : "unknown";
}

/**
 * Try every family in turn.
 */
export function classifyBeaconPayload(payload: Buffer | undefined): BeaconFrameKind | undefined {
    return classifyEddystonePayload(payload) ?? classifyTelemetryPayload(payload);
}

function createFrame(
    kind: BeaconFrameKind | undefined,
    payload: Buffer,
    callbacks: Partial<BeaconFrameCallbacks<BeaconFrameField>>,
): BeaconFrame | undefined {
    switch (kind) {
        case "eddystone-uid": {
            return new UidEddystoneFrame(payload, callbacks);
        }
        case "eddystone-url": {
            return new UrlEddystoneFrame(payload, callbacks);
        }
        case "eddystone-tlm": {
            return new TlmEddystoneFrame(payload, callbacks);
        }
        case "estimote-telemetry": {
            return new TelemetryFrame(payload, callbacks);
        }
        case "unknown": {
            logger.debug(() => `Unknown frame type ${payload[BeaconConsts.FRAME_TYPE_OFFSET]} payload=${payload.toString("hex")}`, NS);

            return new UnknownBeaconFrame(payload, callbacks);
        }
        case undefined: {
            return undefined;
        }
    }
}

/**
 * Construct the Eddystone frame matching the payload, fields are decoded immediately.
 *
 * @returns undefined if the payload is not an Eddystone payload
 */
export function createEddystoneBeaconFrame(
    payload: Buffer,
    callbacks: Partial<BeaconFrameCallbacks<BeaconFrameField>> = {},
): BeaconFrame | undefined {
    return createFrame(classifyEddystonePayload(payload), payload, callbacks);
}

/**
 * Construct the Estimote frame matching the payload, fields are decoded immediately.
 *
 * @returns undefined if the payload is not an Estimote payload
 */
export function createTelemetryBeaconFrame(
    payload: Buffer,
    callbacks: Partial<BeaconFrameCallbacks<BeaconFrameField>> = {},
): BeaconFrame | undefined {
    return createFrame(classifyTelemetryPayload(payload), payload, callbacks);
}

/**
 * Construct the frame matching the payload from any supported family.
 * Callbacks receive the field names of the resulting variant, starting with the initial decode.
 *
 * @returns undefined if no family recognizes the payload
 */
export function createBeaconFrame(payload: Buffer, callbacks: Partial<BeaconFrameCallbacks<BeaconFrameField>> = {}): BeaconFrame | undefined {
    const frame = createFrame(classifyBeaconPayload(payload), payload, callbacks);

    if (frame === undefined) {
        logger.debug(() => `No beacon family matches payload=${payload.toString("hex")}`, NS);
    }

    return frame;
}
