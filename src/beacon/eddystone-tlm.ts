import { logger } from "../utils/logger.js";
import { BeaconConsts, createEddystoneHeader, EddystoneFrameType, getEddystoneFrameType } from "./beacon.js";

const NS = "eddystone-tlm";

/**
 * Eddystone-TLM, unencrypted only
 * https://github.com/google/eddystone/blob/master/eddystone-tlm/tlm-plain.md
 */
export const enum EddystoneTLMConsts {
    VERSION_OFFSET = BeaconConsts.HEADER_SIZE,
    VBATT_OFFSET = BeaconConsts.HEADER_SIZE + 1,
    TEMP_OFFSET = BeaconConsts.HEADER_SIZE + 3,
    ADV_CNT_OFFSET = BeaconConsts.HEADER_SIZE + 5,
    SEC_CNT_OFFSET = BeaconConsts.HEADER_SIZE + 9,
    /** version + vbatt + temp + adv_cnt + sec_cnt */
    BODY_SIZE = 13,

    VERSION_PLAIN = 0x00,
    /** battery voltage not supported (e.g. USB powered) */
    VBATT_UNSUPPORTED = 0,
    /** 8.8 fixed point -128°C, means "not supported" */
    TEMP_UNSUPPORTED = 0x8000,
}

export type EddystoneTLMTelemetry = {
    /** mV, undefined when not supported by the beacon */
    batteryVoltage: number | undefined;
    /** °C, undefined when not supported by the beacon */
    temperature: number | undefined;
    /** PDUs sent since power-up or reboot. uint32_t */
    advertisementCount: number;
    /** seconds since power-up or reboot, 0.1 s resolution */
    timeSincePowerUp: number;
};

export type EddystoneTLMFields = EddystoneTLMTelemetry & {
    /** 0x00 for plain TLM, anything else is not decoded further */
    version: number;
};

export type EddystoneTLMDecoded = {
    version: number;
    /** absent for versions other than plain TLM */
    telemetry?: EddystoneTLMTelemetry;
};

export function isValidEddystoneTLMFrame(payload: Buffer | undefined): payload is Buffer {
    return (
        getEddystoneFrameType(payload) === EddystoneFrameType.TLM &&
        payload !== undefined &&
        payload.byteLength === BeaconConsts.HEADER_SIZE + EddystoneTLMConsts.BODY_SIZE
    );
}

/**
 * Expects a payload that passed `isValidEddystoneTLMFrame`.
 * Only `version` is returned for versions other than plain TLM.
 */
export function decodeEddystoneTLMFrame(payload: Buffer): EddystoneTLMDecoded {
    const version = payload.readUInt8(EddystoneTLMConsts.VERSION_OFFSET);

    if (version !== EddystoneTLMConsts.VERSION_PLAIN) {
        logger.debug(() => `Unsupported TLM version ${version}`, NS);

        return { version };
    }

    const vbatt = payload.readUInt16BE(EddystoneTLMConsts.VBATT_OFFSET);
    const rawTemperature = payload.readUInt16BE(EddystoneTLMConsts.TEMP_OFFSET);

    return {
        version,
        telemetry: {
            batteryVoltage: vbatt === EddystoneTLMConsts.VBATT_UNSUPPORTED ? undefined : vbatt,
            temperature:
                rawTemperature === EddystoneTLMConsts.TEMP_UNSUPPORTED ? undefined : payload.readInt16BE(EddystoneTLMConsts.TEMP_OFFSET) / 256,
            advertisementCount: payload.readUInt32BE(EddystoneTLMConsts.ADV_CNT_OFFSET),
            timeSincePowerUp: payload.readUInt32BE(EddystoneTLMConsts.SEC_CNT_OFFSET) / 10,
        },
    };
}

/**
 * @returns undefined for versions other than plain TLM
 */
export function encodeEddystoneTLMFrame(fields: Partial<EddystoneTLMFields>): Buffer | undefined {
    const { version = EddystoneTLMConsts.VERSION_PLAIN, batteryVoltage, temperature, advertisementCount = 0, timeSincePowerUp = 0 } = fields;

    if (version !== EddystoneTLMConsts.VERSION_PLAIN) {
        logger.debug(() => `Cannot encode TLM version ${version}`, NS);

        return undefined;
    }

    const payload = Buffer.alloc(BeaconConsts.HEADER_SIZE + EddystoneTLMConsts.BODY_SIZE);
    let offset = createEddystoneHeader(EddystoneFrameType.TLM).copy(payload, 0);

    offset = payload.writeUInt8(version, offset);
    offset = payload.writeUInt16BE(
        batteryVoltage === undefined ? EddystoneTLMConsts.VBATT_UNSUPPORTED : Math.min(Math.max(Math.round(batteryVoltage), 0), 0xffff),
        offset,
    );
    offset = payload.writeUInt16BE(
        temperature === undefined ? EddystoneTLMConsts.TEMP_UNSUPPORTED : Math.round(temperature * 256) & 0xffff,
        offset,
    );
    offset = payload.writeUInt32BE(advertisementCount >>> 0, offset);
    payload.writeUInt32BE(Math.round(timeSincePowerUp * 10) >>> 0, offset);

    return payload;
}
