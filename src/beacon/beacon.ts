/**
 * const enum with sole purpose of avoiding "magic numbers" in code for well-known values
 */
export const enum BeaconConsts {
    /**
     * Number of bytes of the header shared by all frame types of a family:
     * - 2 bytes service UUID (little-endian), e.g. `0xaa 0xfe` for Eddystone
     * - 1 byte frame type
     */
    HEADER_SIZE = 3,
    /** Offset of the frame type in the header */
    FRAME_TYPE_OFFSET = 2,

    //---- Eddystone service UUID 0xfeaa
    EDDYSTONE_MAGIC_0 = 0xaa,
    EDDYSTONE_MAGIC_1 = 0xfe,

    //---- Estimote service UUID 0xfe9a
    TELEMETRY_MAGIC_0 = 0x9a,
    TELEMETRY_MAGIC_1 = 0xfe,
}

export const enum EddystoneFrameType {
    UID = 0x00,
    URL = 0x10,
    TLM = 0x20,
}

export const enum TelemetryFrameType {
    ESTIMOTE = 0x12,
}

/**
 * Thrown when a frame cannot be assembled because the caller supplied values no frame can hold.
 * Malformed payloads received over the air never throw, they simply fail `isValid()`.
 */
export class BeaconError extends Error {
    public constructor(message: string, options?: ErrorOptions) {
        super(message, options);

        this.name = "BeaconError";
    }
}

/**
 * Check the header of the payload for the Eddystone service UUID.
 * Does not analyze the frame type nor the rest of the contents.
 */
export function isEddystonePayload(payload: Buffer | undefined): payload is Buffer {
    return (
        payload !== undefined &&
        payload.byteLength >= BeaconConsts.HEADER_SIZE &&
        payload[0] === BeaconConsts.EDDYSTONE_MAGIC_0 &&
        payload[1] === BeaconConsts.EDDYSTONE_MAGIC_1
    );
}

/**
 * Check the header of the payload for the Estimote service UUID.
 * Does not analyze the frame type nor the rest of the contents.
 */
export function isTelemetryPayload(payload: Buffer | undefined): payload is Buffer {
    return (
        payload !== undefined &&
        payload.byteLength >= BeaconConsts.HEADER_SIZE &&
        payload[0] === BeaconConsts.TELEMETRY_MAGIC_0 &&
        payload[1] === BeaconConsts.TELEMETRY_MAGIC_1
    );
}

/**
 * @returns The Eddystone frame type, undefined if not Eddystone or not a frame type known to this library
 */
export function getEddystoneFrameType(payload: Buffer | undefined): EddystoneFrameType | undefined {
    if (!isEddystonePayload(payload)) {
        return undefined;
    }

    const frameType = payload[BeaconConsts.FRAME_TYPE_OFFSET];

    switch (frameType) {
        case EddystoneFrameType.UID:
        case EddystoneFrameType.URL:
        case EddystoneFrameType.TLM: {
            return frameType;
        }
    }

    return undefined;
}

/**
 * @returns The Estimote frame type, undefined if not Estimote or not a frame type known to this library
 */
export function getTelemetryFrameType(payload: Buffer | undefined): TelemetryFrameType | undefined {
    if (!isTelemetryPayload(payload)) {
        return undefined;
    }

    const frameType = payload[BeaconConsts.FRAME_TYPE_OFFSET];

    return frameType === TelemetryFrameType.ESTIMOTE ? frameType : undefined;
}

/** `0xaa 0xfe <type>` */
export function createEddystoneHeader(frameType: EddystoneFrameType): Buffer {
    return Buffer.from([BeaconConsts.EDDYSTONE_MAGIC_0, BeaconConsts.EDDYSTONE_MAGIC_1, frameType]);
}

/** `0x9a 0xfe <type>` */
export function createTelemetryHeader(frameType: number): Buffer {
    return Buffer.from([BeaconConsts.TELEMETRY_MAGIC_0, BeaconConsts.TELEMETRY_MAGIC_1, frameType & 0xff]);
}
