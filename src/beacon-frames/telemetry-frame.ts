import { BeaconError } from "../beacon/beacon.js";
import {
    decodeEstimoteTelemetryFrame,
    type Duration,
    encodeEstimoteTelemetryFrame,
    type EstimoteTelemetryErrors,
    type EstimoteTelemetryFields,
    EstimoteTelemetrySubframe,
    type EstimoteTelemetrySubframeA,
    type EstimoteTelemetrySubframeB,
    type GPIOState,
    getTelemetryErrorMessage,
    isValidEstimoteTelemetryFrame,
    type Vector3,
} from "../beacon/estimote-telemetry.js";
import { BeaconFrameBase, type BeaconFrameCallbacks, type BeaconFrameFieldName } from "./frame-base.js";

type TelemetryFrameDerived = "errorMessage";

export type TelemetryFrameField = BeaconFrameFieldName<EstimoteTelemetryFields, TelemetryFrameDerived>;

const TELEMETRY_DERIVED: readonly TelemetryFrameDerived[] = ["errorMessage"];

// object fields are copied on the way in and out, callers never hold the stored instance

function copyVector3(vector: Vector3 | undefined): Vector3 | undefined {
    return vector === undefined ? undefined : { x: vector.x, y: vector.y, z: vector.z };
}

function copyDuration(duration: Duration | undefined): Duration | undefined {
    return duration === undefined ? undefined : { value: duration.value, unit: duration.unit };
}

function copyGPIO(gpio: GPIOState | undefined): GPIOState | undefined {
    return gpio === undefined ? undefined : [gpio[0], gpio[1], gpio[2], gpio[3]];
}

/**
 * An Estimote Telemetry frame.
 *
 * Beacons alternate between subframe A and subframe B, with the same identifier.
 * Updating a frame with the other subframe keeps the values last received for the subframe not present.
 */
export class TelemetryFrame extends BeaconFrameBase<EstimoteTelemetryFields, TelemetryFrameDerived> {
    public readonly kind = "estimote-telemetry";

    constructor(source: Buffer | Partial<EstimoteTelemetryFields>, callbacks?: Partial<BeaconFrameCallbacks<TelemetryFrameField>>) {
        super(
            {
                protocolVersion: 0,
                shortIdentifier: undefined,
                subframeType: EstimoteTelemetrySubframe.A,
                acceleration: undefined,
                isMoving: false,
                previousMotionStateDuration: undefined,
                currentMotionStateDuration: undefined,
                gpio: undefined,
                firmwareError: false,
                clockError: false,
                pressure: undefined,
                magneticField: undefined,
                ambientLightLevel: undefined,
                uptime: undefined,
                temperature: undefined,
                batteryVoltage: undefined,
                batteryLevel: undefined,
            },
            callbacks,
        );

        if (Buffer.isBuffer(source)) {
            this.initPayload(source);
            this.parsePayload();
        } else {
            if (source.subframeType !== undefined) {
                assertSubframeType(source.subframeType);
            }

            Object.assign(this.fields, source);

            this.fields.acceleration = copyVector3(this.fields.acceleration);
            this.fields.previousMotionStateDuration = copyDuration(this.fields.previousMotionStateDuration);
            this.fields.currentMotionStateDuration = copyDuration(this.fields.currentMotionStateDuration);
            this.fields.gpio = copyGPIO(this.fields.gpio);
            this.fields.magneticField = copyVector3(this.fields.magneticField);
            this.fields.uptime = copyDuration(this.fields.uptime);
            this.encodePayload();
        }
    }

    // #region Getters/Setters

    /** 0 to 2 are understood, decoding stops after this for newer versions */
    get protocolVersion(): number {
        return this.fields.protocolVersion;
    }

    set protocolVersion(value: number) {
        this.setField("protocolVersion", value);
    }

    /** Upper-case hex of the first half of the beacon identifier */
    get shortIdentifier(): string | undefined {
        return this.fields.shortIdentifier;
    }

    set shortIdentifier(value: string | undefined) {
        this.setField("shortIdentifier", value);
    }

    /** `EstimoteTelemetrySubframe` */
    get subframeType(): number {
        return this.fields.subframeType;
    }

    set subframeType(value: number) {
        assertSubframeType(value);
        this.setField("subframeType", value);
    }

    /** g-units */
    get acceleration(): Vector3 | undefined {
        return copyVector3(this.fields.acceleration);
    }

    set acceleration(value: Vector3 | undefined) {
        this.setField("acceleration", copyVector3(value));
    }

    get isMoving(): boolean {
        return this.fields.isMoving;
    }

    set isMoving(value: boolean) {
        this.setField("isMoving", value);
    }

    get previousMotionStateDuration(): Duration | undefined {
        return copyDuration(this.fields.previousMotionStateDuration);
    }

    set previousMotionStateDuration(value: Duration | undefined) {
        this.setField("previousMotionStateDuration", copyDuration(value));
    }

    get currentMotionStateDuration(): Duration | undefined {
        return copyDuration(this.fields.currentMotionStateDuration);
    }

    set currentMotionStateDuration(value: Duration | undefined) {
        this.setField("currentMotionStateDuration", copyDuration(value));
    }

    get gpio(): GPIOState | undefined {
        return copyGPIO(this.fields.gpio);
    }

    set gpio(value: GPIOState | undefined) {
        this.setField("gpio", copyGPIO(value));
    }

    get firmwareError(): boolean {
        return this.fields.firmwareError;
    }

    set firmwareError(value: boolean) {
        this.setField("firmwareError", value);
    }

    get clockError(): boolean {
        return this.fields.clockError;
    }

    set clockError(value: boolean) {
        this.setField("clockError", value);
    }

    /** Pa, protocol v2 only */
    get pressure(): number | undefined {
        return this.fields.pressure;
    }

    set pressure(value: number | undefined) {
        this.setField("pressure", value);
    }

    get magneticField(): Vector3 | undefined {
        return copyVector3(this.fields.magneticField);
    }

    set magneticField(value: Vector3 | undefined) {
        this.setField("magneticField", copyVector3(value));
    }

    /** lux */
    get ambientLightLevel(): number | undefined {
        return this.fields.ambientLightLevel;
    }

    set ambientLightLevel(value: number | undefined) {
        this.setField("ambientLightLevel", value);
    }

    get uptime(): Duration | undefined {
        return copyDuration(this.fields.uptime);
    }

    set uptime(value: Duration | undefined) {
        this.setField("uptime", copyDuration(value));
    }

    /** °C */
    get temperature(): number | undefined {
        return this.fields.temperature;
    }

    set temperature(value: number | undefined) {
        this.setField("temperature", value);
    }

    /** mV */
    get batteryVoltage(): number | undefined {
        return this.fields.batteryVoltage;
    }

    set batteryVoltage(value: number | undefined) {
        this.setField("batteryVoltage", value);
    }

    /** %, protocol v1+ */
    get batteryLevel(): number | undefined {
        return this.fields.batteryLevel;
    }

    set batteryLevel(value: number | undefined) {
        this.setField("batteryLevel", value);
    }

    get errorMessage(): string | undefined {
        return getTelemetryErrorMessage(this.fields);
    }

    // #endregion

    public override isValid(): boolean {
        return super.isValid() && isValidEstimoteTelemetryFrame(this.payload);
    }

    protected override get derivedNames(): readonly TelemetryFrameDerived[] {
        return TELEMETRY_DERIVED;
    }

    protected override derivedValue(_name: TelemetryFrameDerived): unknown {
        return this.errorMessage;
    }

    protected decodeFields(payload: Buffer, changes: TelemetryFrameField[]): void {
        const decoded = decodeEstimoteTelemetryFrame(payload);

        this.decodeField("protocolVersion", decoded.protocolVersion, changes);

        if (decoded.shortIdentifier === undefined || decoded.subframeType === undefined) {
            return;
        }

        this.decodeField("shortIdentifier", decoded.shortIdentifier, changes);
        this.decodeField("subframeType", decoded.subframeType, changes);

        if (decoded.subframeA !== undefined) {
            this.#decodeSubframeA(decoded.subframeA, changes);
        } else if (decoded.subframeB !== undefined) {
            this.#decodeSubframeB(decoded.subframeB, changes);
        }
    }

    protected encodeFields(): Buffer | undefined {
        return encodeEstimoteTelemetryFrame(this.fields);
    }

    #decodeSubframeA(subframe: EstimoteTelemetrySubframeA, changes: TelemetryFrameField[]): void {
        this.decodeField("acceleration", subframe.acceleration, changes);
        this.decodeField("isMoving", subframe.isMoving, changes);
        this.decodeField("previousMotionStateDuration", subframe.previousMotionStateDuration, changes);
        this.decodeField("currentMotionStateDuration", subframe.currentMotionStateDuration, changes);
        this.decodeField("gpio", subframe.gpio, changes);
        this.#decodeErrors(subframe.errors, changes);

        if ("pressure" in subframe) {
            this.decodeField("pressure", subframe.pressure, changes);
        }
    }

    #decodeSubframeB(subframe: EstimoteTelemetrySubframeB, changes: TelemetryFrameField[]): void {
        this.decodeField("magneticField", subframe.magneticField, changes);
        this.decodeField("ambientLightLevel", subframe.ambientLightLevel, changes);
        this.decodeField("uptime", subframe.uptime, changes);
        this.decodeField("temperature", subframe.temperature, changes);
        this.decodeField("batteryVoltage", subframe.batteryVoltage, changes);
        this.#decodeErrors(subframe.errors, changes);

        if ("batteryLevel" in subframe) {
            this.decodeField("batteryLevel", subframe.batteryLevel, changes);
        }
    }

    #decodeErrors(errors: EstimoteTelemetryErrors | undefined, changes: TelemetryFrameField[]): void {
        if (errors !== undefined) {
            this.decodeField("firmwareError", errors.firmwareError, changes);
            this.decodeField("clockError", errors.clockError, changes);
        }
    }
}

function assertSubframeType(subframeType: number): void {
    if (subframeType !== EstimoteTelemetrySubframe.A && subframeType !== EstimoteTelemetrySubframe.B) {
        throw new BeaconError(`Invalid telemetry subframe type ${subframeType}, expected 0 (A) or 1 (B)`);
    }
}
