import { bits, leUint32, signedByte, signedN, unsignedN } from "../utils/bits.js";
import { logger } from "../utils/logger.js";
import { BeaconConsts, createTelemetryHeader, isTelemetryPayload } from "./beacon.js";

const NS = "estimote-telemetry";

/**
 * Estimote Telemetry packet, two alternating subframes "A" and "B".
 *
 * Offsets are absolute in the payload (service UUID included), i.e. 2 more than in Estimote's own documentation
 * where byte 0 is the frame type/protocol version byte.
 */
export const enum EstimoteTelemetryConsts {
    BODY_SIZE = 19,

    //---- byte 2
    FRAME_TYPE_MASK = 0x0f,
    /** lower nibble of byte 2 for telemetry frames */
    FRAME_TYPE_TELEMETRY = 0x02,
    PROTOCOL_VERSION_MASK = 0xf0,
    /** this parser only understands up to this version */
    PROTOCOL_VERSION_MAX = 2,

    IDENTIFIER_OFFSET = 3,
    IDENTIFIER_SIZE = 8,
    SUBFRAME_OFFSET = 11,
    SUBFRAME_MASK = 0x03,

    //---- subframe A
    ACCELERATION_OFFSET = 12,
    PREVIOUS_MOTION_OFFSET = 15,
    CURRENT_MOTION_OFFSET = 16,
    MOTION_OFFSET = 17,
    MOTION_STATE_MASK = 0x03,
    V2_FIRMWARE_ERROR = 0x04,
    V2_CLOCK_ERROR = 0x08,
    GPIO_SHIFT = 4,
    V1_ERRORS_OFFSET = 18,
    PRESSURE_OFFSET = 18,

    //---- subframe B
    MAGNETIC_FIELD_OFFSET = 12,
    AMBIENT_LIGHT_OFFSET = 15,
    UPTIME_OFFSET = 16,
    UPTIME_HIGH_MASK = 0x0f,
    UPTIME_UNIT_MASK = 0x30,
    TEMPERATURE_LOW_MASK = 0xc0,
    TEMPERATURE_MIDDLE_OFFSET = 18,
    TEMPERATURE_HIGH_OFFSET = 19,
    TEMPERATURE_HIGH_MASK = 0x03,
    TEMPERATURE_RAW_MIN = -2048,
    TEMPERATURE_RAW_MAX = 2047,
    BATTERY_VOLTAGE_LOW_MASK = 0xfc,
    BATTERY_VOLTAGE_HIGH_OFFSET = 20,
    /** v0 error codes, v1+ battery level */
    BATTERY_LEVEL_OFFSET = 21,

    //---- error codes (v0 in subframe B, v1 in subframe A)
    FIRMWARE_ERROR = 0x01,
    CLOCK_ERROR = 0x02,

    //---- number + unit
    DURATION_NUMBER_MASK = 0x3f,
    DURATION_UNIT_MASK = 0xc0,
    DURATION_WEEKS_OFFSET = 32,

    //---- "not measured yet" sentinels
    BATTERY_VOLTAGE_UNMEASURED = 0x3fff,
    BATTERY_LEVEL_UNMEASURED = 0xff,
    PRESSURE_UNMEASURED = 0xffffffff,
}

export const enum EstimoteTelemetrySubframe {
    A = 0,
    B = 1,
}

export type DurationUnit = "seconds" | "minutes" | "hours" | "days" | "weeks";

export type Duration = {
    value: number;
    unit: DurationUnit;
};

export type Vector3 = {
    x: number;
    y: number;
    z: number;
};

/** GPIO pins 0 to 3, true = "high" */
export type GPIOState = readonly [boolean, boolean, boolean, boolean];

export type EstimoteTelemetryErrors = {
    firmwareError: boolean;
    /** likely the internal clock is out of sync in beacons without Real-Time Clock */
    clockError: boolean;
};

export type EstimoteTelemetrySubframeA = {
    /** g-units */
    acceleration: Vector3;
    isMoving: boolean;
    /** how long the beacon was in the previous motion state */
    previousMotionStateDuration: Duration;
    /** how long the beacon has been in the current motion state */
    currentMotionStateDuration: Duration;
    gpio: GPIOState;
    /** protocol v1 & v2 */
    errors?: EstimoteTelemetryErrors;
    /** protocol v2, Pa, not normalized to sea level */
    pressure?: number | undefined;
};

export type EstimoteTelemetrySubframeB = {
    /** normalized [-1, 1], 0 when not calibrated */
    magneticField: Vector3;
    /** lux */
    ambientLightLevel: number;
    uptime: Duration;
    /** °C */
    temperature: number;
    /** mV, undefined when not measured yet */
    batteryVoltage: number | undefined;
    /** protocol v0 */
    errors?: EstimoteTelemetryErrors;
    /** protocol v1+, %, undefined when not measured yet */
    batteryLevel?: number | undefined;
};

/**
 * Result of decoding; parts are absent when not applicable to the protocol version / subframe type.
 */
export type EstimoteTelemetryDecoded = {
    protocolVersion: number;
    /** hex of the first half of the beacon identifier */
    shortIdentifier?: string;
    subframeType?: number;
    subframeA?: EstimoteTelemetrySubframeA;
    subframeB?: EstimoteTelemetrySubframeB;
};

export type EstimoteTelemetryFields = {
    protocolVersion: number;
    shortIdentifier: string | undefined;
    subframeType: number;
    acceleration: Vector3 | undefined;
    isMoving: boolean;
    previousMotionStateDuration: Duration | undefined;
    currentMotionStateDuration: Duration | undefined;
    gpio: GPIOState | undefined;
    firmwareError: boolean;
    clockError: boolean;
    pressure: number | undefined;
    magneticField: Vector3 | undefined;
    ambientLightLevel: number | undefined;
    uptime: Duration | undefined;
    temperature: number | undefined;
    batteryVoltage: number | undefined;
    batteryLevel: number | undefined;
};

const UPTIME_UNITS: readonly DurationUnit[] = ["seconds", "minutes", "hours", "days"];

/**
 * Header, valid telemetry frame type nibble, exact length.
 * Any protocol version passes, decoding stops on versions it does not understand.
 */
export function isValidEstimoteTelemetryFrame(payload: Buffer | undefined): payload is Buffer {
    return (
        isTelemetryPayload(payload) &&
        bits(payload[BeaconConsts.FRAME_TYPE_OFFSET], EstimoteTelemetryConsts.FRAME_TYPE_MASK) === EstimoteTelemetryConsts.FRAME_TYPE_TELEMETRY &&
        payload.byteLength === BeaconConsts.HEADER_SIZE + EstimoteTelemetryConsts.BODY_SIZE
    );
}

/**
 * Motion state duration: lower 6 bits are a number, upper 2 bits the unit.
 * Unit 3 means days if number < 32, else (number - 32) weeks.
 */
export function decodeMotionStateDuration(byte: number): Duration {
    const number = bits(byte, EstimoteTelemetryConsts.DURATION_NUMBER_MASK);
    const unitCode = bits(byte, EstimoteTelemetryConsts.DURATION_UNIT_MASK) >> 6;

    switch (unitCode) {
        case 0: {
            return { value: number, unit: "seconds" };
        }
        case 1: {
            return { value: number, unit: "minutes" };
        }
        case 2: {
            return { value: number, unit: "hours" };
        }
    }

    if (number < EstimoteTelemetryConsts.DURATION_WEEKS_OFFSET) {
        return { value: number, unit: "days" };
    }

    return { value: number - EstimoteTelemetryConsts.DURATION_WEEKS_OFFSET, unit: "weeks" };
}

function clampDurationNumber(value: number, min: number, max: number): number {
    return Math.min(Math.max(Math.round(value), min), max);
}

/**
 * Values that do not fit their unit saturate at the largest representable number.
 */
export function encodeMotionStateDuration(duration: Duration): number {
    switch (duration.unit) {
        case "seconds": {
            return clampDurationNumber(duration.value, 0, EstimoteTelemetryConsts.DURATION_NUMBER_MASK);
        }
        case "minutes": {
            return (1 << 6) | clampDurationNumber(duration.value, 0, EstimoteTelemetryConsts.DURATION_NUMBER_MASK);
        }
        case "hours": {
            return (2 << 6) | clampDurationNumber(duration.value, 0, EstimoteTelemetryConsts.DURATION_NUMBER_MASK);
        }
        case "days": {
            return (3 << 6) | clampDurationNumber(duration.value, 0, EstimoteTelemetryConsts.DURATION_WEEKS_OFFSET - 1);
        }
        case "weeks": {
            return (
                (3 << 6) |
                clampDurationNumber(
                    duration.value + EstimoteTelemetryConsts.DURATION_WEEKS_OFFSET,
                    EstimoteTelemetryConsts.DURATION_WEEKS_OFFSET,
                    EstimoteTelemetryConsts.DURATION_NUMBER_MASK,
                )
            );
        }
    }
}

/**
 * pow(2, upper nibble) * lower nibble * 0.72 = lux
 */
export function decodeAmbientLight(byte: number): number {
    return 2 ** (byte >> 4) * bits(byte, 0x0f) * 0.72;
}

/**
 * Smallest exponent able to hold the value, several encodings may decode to the same level.
 */
export function encodeAmbientLight(lux: number): number {
    const raw = lux / 0.72;

    for (let exponent = 0; exponent <= 0x0f; exponent++) {
        const mantissa = Math.round(raw / 2 ** exponent);

        if (mantissa <= 0x0f) {
            return (exponent << 4) | Math.max(mantissa, 0);
        }
    }

    return 0xff;
}

function decodeVector3(payload: Buffer, offset: number, divisor: number): Vector3 {
    return {
        x: (signedByte(payload[offset]) * 2) / divisor,
        y: (signedByte(payload[offset + 1]) * 2) / divisor,
        z: (signedByte(payload[offset + 2]) * 2) / divisor,
    };
}

function encodeVector3(payload: Buffer, offset: number, vector: Vector3 | undefined, divisor: number): number {
    for (const value of vector === undefined ? [0, 0, 0] : [vector.x, vector.y, vector.z]) {
        offset = payload.writeInt8(Math.min(Math.max(Math.round((value * divisor) / 2), -128), 127), offset);
    }

    return offset;
}

function decodeErrors(byte: number, firmwareMask: number, clockMask: number): EstimoteTelemetryErrors {
    return {
        firmwareError: bits(byte, firmwareMask) !== 0,
        clockError: bits(byte, clockMask) !== 0,
    };
}

function decodeSubframeA(payload: Buffer, protocolVersion: number): EstimoteTelemetrySubframeA {
    const motion = payload[EstimoteTelemetryConsts.MOTION_OFFSET];
    const gpio = motion >> EstimoteTelemetryConsts.GPIO_SHIFT;
    const subframe: EstimoteTelemetrySubframeA = {
        acceleration: decodeVector3(payload, EstimoteTelemetryConsts.ACCELERATION_OFFSET, 127),
        // 0b00 when not moving, 0b01 when moving
        isMoving: bits(motion, EstimoteTelemetryConsts.MOTION_STATE_MASK) === 1,
        previousMotionStateDuration: decodeMotionStateDuration(payload[EstimoteTelemetryConsts.PREVIOUS_MOTION_OFFSET]),
        currentMotionStateDuration: decodeMotionStateDuration(payload[EstimoteTelemetryConsts.CURRENT_MOTION_OFFSET]),
        gpio: [bits(gpio, 0x01) !== 0, bits(gpio, 0x02) !== 0, bits(gpio, 0x04) !== 0, bits(gpio, 0x08) !== 0],
    };

    if (protocolVersion === 2) {
        subframe.errors = decodeErrors(motion, EstimoteTelemetryConsts.V2_FIRMWARE_ERROR, EstimoteTelemetryConsts.V2_CLOCK_ERROR);
        const pressure = leUint32(payload, EstimoteTelemetryConsts.PRESSURE_OFFSET);
        subframe.pressure = pressure === EstimoteTelemetryConsts.PRESSURE_UNMEASURED ? undefined : pressure / 256;
    } else if (protocolVersion === 1) {
        subframe.errors = decodeErrors(
            payload[EstimoteTelemetryConsts.V1_ERRORS_OFFSET],
            EstimoteTelemetryConsts.FIRMWARE_ERROR,
            EstimoteTelemetryConsts.CLOCK_ERROR,
        );
    }
    // v0: error codes are in subframe B

    return subframe;
}

function decodeSubframeB(payload: Buffer, protocolVersion: number): EstimoteTelemetrySubframeB {
    const uptimeHigh = payload[EstimoteTelemetryConsts.UPTIME_OFFSET + 1];
    const temperatureHigh = payload[EstimoteTelemetryConsts.TEMPERATURE_HIGH_OFFSET];
    const rawTemperature =
        (bits(temperatureHigh, EstimoteTelemetryConsts.TEMPERATURE_HIGH_MASK) << 10) |
        (payload[EstimoteTelemetryConsts.TEMPERATURE_MIDDLE_OFFSET] << 2) |
        (bits(uptimeHigh, EstimoteTelemetryConsts.TEMPERATURE_LOW_MASK) >> 6);
    const rawBatteryVoltage =
        (payload[EstimoteTelemetryConsts.BATTERY_VOLTAGE_HIGH_OFFSET] << 6) |
        (bits(temperatureHigh, EstimoteTelemetryConsts.BATTERY_VOLTAGE_LOW_MASK) >> 2);
    const subframe: EstimoteTelemetrySubframeB = {
        magneticField: decodeVector3(payload, EstimoteTelemetryConsts.MAGNETIC_FIELD_OFFSET, 128),
        ambientLightLevel: decodeAmbientLight(payload[EstimoteTelemetryConsts.AMBIENT_LIGHT_OFFSET]),
        uptime: {
            value: (bits(uptimeHigh, EstimoteTelemetryConsts.UPTIME_HIGH_MASK) << 8) | payload[EstimoteTelemetryConsts.UPTIME_OFFSET],
            unit: UPTIME_UNITS[bits(uptimeHigh, EstimoteTelemetryConsts.UPTIME_UNIT_MASK) >> 4],
        },
        temperature: signedN(rawTemperature, 12) / 16,
        batteryVoltage: rawBatteryVoltage === EstimoteTelemetryConsts.BATTERY_VOLTAGE_UNMEASURED ? undefined : rawBatteryVoltage,
    };
    const lastByte = payload[EstimoteTelemetryConsts.BATTERY_LEVEL_OFFSET];

    if (protocolVersion === 0) {
        subframe.errors = decodeErrors(lastByte, EstimoteTelemetryConsts.FIRMWARE_ERROR, EstimoteTelemetryConsts.CLOCK_ERROR);
    } else {
        subframe.batteryLevel = lastByte === EstimoteTelemetryConsts.BATTERY_LEVEL_UNMEASURED ? undefined : lastByte;
    }

    return subframe;
}

/**
 * Expects a payload that passed `isValidEstimoteTelemetryFrame`.
 */
export function decodeEstimoteTelemetryFrame(payload: Buffer): EstimoteTelemetryDecoded {
    const protocolVersion = bits(payload[BeaconConsts.FRAME_TYPE_OFFSET], EstimoteTelemetryConsts.PROTOCOL_VERSION_MASK) >> 4;

    if (protocolVersion > EstimoteTelemetryConsts.PROTOCOL_VERSION_MAX) {
        logger.debug(() => `Unsupported telemetry protocol version ${protocolVersion}`, NS);

        return { protocolVersion };
    }

    const shortIdentifier = payload
        .subarray(EstimoteTelemetryConsts.IDENTIFIER_OFFSET, EstimoteTelemetryConsts.IDENTIFIER_OFFSET + EstimoteTelemetryConsts.IDENTIFIER_SIZE)
        .toString("hex")
        .toUpperCase();
    const subframeType = bits(payload[EstimoteTelemetryConsts.SUBFRAME_OFFSET], EstimoteTelemetryConsts.SUBFRAME_MASK);

    switch (subframeType) {
        case EstimoteTelemetrySubframe.A: {
            return { protocolVersion, shortIdentifier, subframeType, subframeA: decodeSubframeA(payload, protocolVersion) };
        }
        case EstimoteTelemetrySubframe.B: {
            return { protocolVersion, shortIdentifier, subframeType, subframeB: decodeSubframeB(payload, protocolVersion) };
        }
    }

    logger.debug(() => `Unsupported telemetry subframe type ${subframeType}`, NS);

    return { protocolVersion, shortIdentifier, subframeType };
}

function encodeSubframeA(payload: Buffer, fields: EstimoteTelemetryFields): void {
    encodeVector3(payload, EstimoteTelemetryConsts.ACCELERATION_OFFSET, fields.acceleration, 127);
    payload.writeUInt8(
        fields.previousMotionStateDuration === undefined ? 0 : encodeMotionStateDuration(fields.previousMotionStateDuration),
        EstimoteTelemetryConsts.PREVIOUS_MOTION_OFFSET,
    );
    payload.writeUInt8(
        fields.currentMotionStateDuration === undefined ? 0 : encodeMotionStateDuration(fields.currentMotionStateDuration),
        EstimoteTelemetryConsts.CURRENT_MOTION_OFFSET,
    );

    let motion = fields.isMoving ? 1 : 0;

    if (fields.gpio !== undefined) {
        for (let pin = 0; pin < fields.gpio.length; pin++) {
            if (fields.gpio[pin]) {
                motion |= 1 << (EstimoteTelemetryConsts.GPIO_SHIFT + pin);
            }
        }
    }

    if (fields.protocolVersion === 2) {
        motion |= fields.firmwareError ? EstimoteTelemetryConsts.V2_FIRMWARE_ERROR : 0;
        motion |= fields.clockError ? EstimoteTelemetryConsts.V2_CLOCK_ERROR : 0;

        payload.writeUInt32LE(
            fields.pressure === undefined
                ? EstimoteTelemetryConsts.PRESSURE_UNMEASURED
                : Math.min(Math.max(Math.round(fields.pressure * 256), 0), EstimoteTelemetryConsts.PRESSURE_UNMEASURED - 1),
            EstimoteTelemetryConsts.PRESSURE_OFFSET,
        );
    } else if (fields.protocolVersion === 1) {
        payload.writeUInt8(
            (fields.firmwareError ? EstimoteTelemetryConsts.FIRMWARE_ERROR : 0) | (fields.clockError ? EstimoteTelemetryConsts.CLOCK_ERROR : 0),
            EstimoteTelemetryConsts.V1_ERRORS_OFFSET,
        );
    }

    payload.writeUInt8(motion, EstimoteTelemetryConsts.MOTION_OFFSET);
}

function encodeSubframeB(payload: Buffer, fields: EstimoteTelemetryFields): void {
    encodeVector3(payload, EstimoteTelemetryConsts.MAGNETIC_FIELD_OFFSET, fields.magneticField, 128);
    payload.writeUInt8(
        fields.ambientLightLevel === undefined ? 0 : encodeAmbientLight(fields.ambientLightLevel),
        EstimoteTelemetryConsts.AMBIENT_LIGHT_OFFSET,
    );

    const uptimeValue = fields.uptime === undefined ? 0 : Math.min(fields.uptime.value, 0x0fff);
    const uptimeUnit = fields.uptime === undefined ? 0 : Math.max(UPTIME_UNITS.indexOf(fields.uptime.unit), 0);
    // 12-bit two's complement, 1/16 °C
    const temperature16 = Math.round((fields.temperature ?? 0) * 16);
    const rawTemperature = unsignedN(
        Math.min(Math.max(temperature16, EstimoteTelemetryConsts.TEMPERATURE_RAW_MIN), EstimoteTelemetryConsts.TEMPERATURE_RAW_MAX),
        12,
    );
    const rawBatteryVoltage =
        fields.batteryVoltage === undefined
            ? EstimoteTelemetryConsts.BATTERY_VOLTAGE_UNMEASURED
            : Math.min(Math.max(Math.round(fields.batteryVoltage), 0), EstimoteTelemetryConsts.BATTERY_VOLTAGE_UNMEASURED);

    payload.writeUInt8(uptimeValue & 0xff, EstimoteTelemetryConsts.UPTIME_OFFSET);
    payload.writeUInt8(
        ((uptimeValue >> 8) & EstimoteTelemetryConsts.UPTIME_HIGH_MASK) | (uptimeUnit << 4) | ((rawTemperature & 0x03) << 6),
        EstimoteTelemetryConsts.UPTIME_OFFSET + 1,
    );
    payload.writeUInt8((rawTemperature >> 2) & 0xff, EstimoteTelemetryConsts.TEMPERATURE_MIDDLE_OFFSET);
    payload.writeUInt8(((rawTemperature >> 10) & 0x03) | ((rawBatteryVoltage & 0x3f) << 2), EstimoteTelemetryConsts.TEMPERATURE_HIGH_OFFSET);
    payload.writeUInt8((rawBatteryVoltage >> 6) & 0xff, EstimoteTelemetryConsts.BATTERY_VOLTAGE_HIGH_OFFSET);

    if (fields.protocolVersion === 0) {
        payload.writeUInt8(
            (fields.firmwareError ? EstimoteTelemetryConsts.FIRMWARE_ERROR : 0) | (fields.clockError ? EstimoteTelemetryConsts.CLOCK_ERROR : 0),
            EstimoteTelemetryConsts.BATTERY_LEVEL_OFFSET,
        );
    } else {
        payload.writeUInt8(
            fields.batteryLevel === undefined
                ? EstimoteTelemetryConsts.BATTERY_LEVEL_UNMEASURED
                : Math.min(Math.max(Math.round(fields.batteryLevel), 0), EstimoteTelemetryConsts.BATTERY_LEVEL_UNMEASURED - 1),
            EstimoteTelemetryConsts.BATTERY_LEVEL_OFFSET,
        );
    }
}

/**
 * Rebuild the whole payload for the current protocol version and subframe type.
 * Fields belonging to the other subframe are not part of the output.
 *
 * @returns undefined if the identifier is not 8 bytes of hex or the protocol version is not supported
 */
export function encodeEstimoteTelemetryFrame(fields: EstimoteTelemetryFields): Buffer | undefined {
    if (fields.protocolVersion < 0 || fields.protocolVersion > EstimoteTelemetryConsts.PROTOCOL_VERSION_MAX) {
        logger.debug(() => `Cannot encode telemetry protocol version ${fields.protocolVersion}`, NS);
        return undefined;
    }

    if (fields.shortIdentifier === undefined || !/^[0-9a-fA-F]{16}$/.test(fields.shortIdentifier)) {
        logger.debug(() => `Cannot encode telemetry identifier ${fields.shortIdentifier}`, NS);
        return undefined;
    }

    const payload = Buffer.alloc(BeaconConsts.HEADER_SIZE + EstimoteTelemetryConsts.BODY_SIZE);

    createTelemetryHeader((fields.protocolVersion << 4) | EstimoteTelemetryConsts.FRAME_TYPE_TELEMETRY).copy(payload, 0);
    Buffer.from(fields.shortIdentifier, "hex").copy(payload, EstimoteTelemetryConsts.IDENTIFIER_OFFSET);
    payload.writeUInt8(bits(fields.subframeType, EstimoteTelemetryConsts.SUBFRAME_MASK), EstimoteTelemetryConsts.SUBFRAME_OFFSET);

    if (fields.subframeType === EstimoteTelemetrySubframe.A) {
        encodeSubframeA(payload, fields);
    } else if (fields.subframeType === EstimoteTelemetrySubframe.B) {
        encodeSubframeB(payload, fields);
    }

    return payload;
}

/** `{x; y; z}` */
export function formatVector3(vector: Vector3): string {
    return `{${vector.x}; ${vector.y}; ${vector.z}}`;
}

/** `12 minutes` */
export function formatDuration(duration: Duration): string {
    return `${duration.value} ${duration.unit}`;
}

export function getTelemetryErrorMessage(errors: EstimoteTelemetryErrors): string | undefined {
    if (errors.firmwareError && errors.clockError) {
        return "Firmware & clock error";
    }

    if (errors.firmwareError) {
        return "Firmware error";
    }

    if (errors.clockError) {
        return "Clock error";
    }

    return undefined;
}
