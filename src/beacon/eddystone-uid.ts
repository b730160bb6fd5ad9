import { signedByte } from "../utils/bits.js";
import { BeaconConsts, createEddystoneHeader, EddystoneFrameType, getEddystoneFrameType } from "./beacon.js";

/**
 * Eddystone-UID
 * https://github.com/google/eddystone/tree/master/eddystone-uid
 */
export const enum EddystoneUIDConsts {
    NAMESPACE_ID_SIZE = 10,
    INSTANCE_ID_SIZE = 6,
    /** ranging data + namespace + instance */
    BODY_SIZE = 17,
    /** reserved for future use, must be 0x00, sometimes omitted in practice */
    RFU_SIZE = 2,

    RANGING_DATA_OFFSET = BeaconConsts.HEADER_SIZE,
    NAMESPACE_ID_OFFSET = BeaconConsts.HEADER_SIZE + 1,
    INSTANCE_ID_OFFSET = BeaconConsts.HEADER_SIZE + 11,
}

export type EddystoneUIDFields = {
    /**
     * Tx power level at 0 m, in dBm. int8_t
     * Range -100 to +20 dBm, resolution 1 dBm.
     */
    rangingData: number;
    /** 10 bytes, ensures uniqueness across Eddystone implementers */
    namespaceId: Buffer;
    /** 6 bytes, assigned freely within a namespace */
    instanceId: Buffer;
};

/**
 * Header, plus 17 bytes, plus optional 2 RFU bytes.
 */
export function isValidEddystoneUIDFrame(payload: Buffer | undefined): payload is Buffer {
    if (getEddystoneFrameType(payload) !== EddystoneFrameType.UID || payload === undefined) {
        return false;
    }

    const length = payload.byteLength;

    return (
        length === BeaconConsts.HEADER_SIZE + EddystoneUIDConsts.BODY_SIZE ||
        length === BeaconConsts.HEADER_SIZE + EddystoneUIDConsts.BODY_SIZE + EddystoneUIDConsts.RFU_SIZE
    );
}

/**
 * Expects a payload that passed `isValidEddystoneUIDFrame`.
 * Returned ids are copies, not views into `payload`.
 */
export function decodeEddystoneUIDFrame(payload: Buffer): EddystoneUIDFields {
    return {
        rangingData: signedByte(payload[EddystoneUIDConsts.RANGING_DATA_OFFSET]),
        namespaceId: Buffer.from(
            payload.subarray(EddystoneUIDConsts.NAMESPACE_ID_OFFSET, EddystoneUIDConsts.NAMESPACE_ID_OFFSET + EddystoneUIDConsts.NAMESPACE_ID_SIZE),
        ),
        instanceId: Buffer.from(
            payload.subarray(EddystoneUIDConsts.INSTANCE_ID_OFFSET, EddystoneUIDConsts.INSTANCE_ID_OFFSET + EddystoneUIDConsts.INSTANCE_ID_SIZE),
        ),
    };
}

/**
 * @returns undefined if either id is missing or not of its exact size
 */
export function encodeEddystoneUIDFrame(fields: Partial<EddystoneUIDFields>): Buffer | undefined {
    const { rangingData = 0, namespaceId, instanceId } = fields;

    if (
        namespaceId === undefined ||
        namespaceId.byteLength !== EddystoneUIDConsts.NAMESPACE_ID_SIZE ||
        instanceId === undefined ||
        instanceId.byteLength !== EddystoneUIDConsts.INSTANCE_ID_SIZE
    ) {
        return undefined;
    }

    const payload = Buffer.alloc(BeaconConsts.HEADER_SIZE + EddystoneUIDConsts.BODY_SIZE + EddystoneUIDConsts.RFU_SIZE);
    let offset = createEddystoneHeader(EddystoneFrameType.UID).copy(payload, 0);

    offset = payload.writeUInt8(rangingData & 0xff, offset);
    offset += namespaceId.copy(payload, offset);
    offset += instanceId.copy(payload, offset);
    // RFU left zeroed by alloc

    return payload;
}

/** Namespace ID as unsigned 80-bit integer, most-significant byte first */
export function namespaceIdToBigInt(namespaceId: Buffer): bigint {
    let value = 0n;

    for (const byte of namespaceId) {
        value = (value << 8n) | BigInt(byte);
    }

    return value;
}

/** Instance ID as unsigned 48-bit integer, most-significant byte first */
export function instanceIdToNumber(instanceId: Buffer): number {
    return instanceId.readUIntBE(0, EddystoneUIDConsts.INSTANCE_ID_SIZE);
}
