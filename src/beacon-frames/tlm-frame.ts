import { decodeEddystoneTLMFrame, type EddystoneTLMFields, encodeEddystoneTLMFrame, isValidEddystoneTLMFrame } from "../beacon/eddystone-tlm.js";
import { BeaconFrameBase, type BeaconFrameCallbacks, type BeaconFrameFieldName } from "./frame-base.js";

export type TLMFrameField = BeaconFrameFieldName<EddystoneTLMFields>;

/**
 * An unencrypted Eddystone-TLM frame. Encrypted frames (version != 0) only expose their version.
 */
export class TlmEddystoneFrame extends BeaconFrameBase<EddystoneTLMFields> {
    public readonly kind = "eddystone-tlm";

    constructor(source: Buffer | Partial<EddystoneTLMFields>, callbacks?: Partial<BeaconFrameCallbacks<TLMFrameField>>) {
        super(
            {
                version: 0,
                batteryVoltage: undefined,
                temperature: undefined,
                advertisementCount: 0,
                timeSincePowerUp: 0,
            },
            callbacks,
        );

        if (Buffer.isBuffer(source)) {
            this.initPayload(source);
            this.parsePayload();
        } else {
            Object.assign(this.fields, source);
            this.encodePayload();
        }
    }

    get version(): number {
        return this.fields.version;
    }

    set version(value: number) {
        this.setField("version", value);
    }

    /** mV, undefined when not supported by the beacon */
    get batteryVoltage(): number | undefined {
        return this.fields.batteryVoltage;
    }

    set batteryVoltage(value: number | undefined) {
        this.setField("batteryVoltage", value);
    }

    /** °C, 1/256 resolution, undefined when not supported by the beacon */
    get temperature(): number | undefined {
        return this.fields.temperature;
    }

    set temperature(value: number | undefined) {
        this.setField("temperature", value);
    }

    get advertisementCount(): number {
        return this.fields.advertisementCount;
    }

    set advertisementCount(value: number) {
        this.setField("advertisementCount", value);
    }

    /** seconds, 0.1 s resolution */
    get timeSincePowerUp(): number {
        return this.fields.timeSincePowerUp;
    }

    set timeSincePowerUp(value: number) {
        this.setField("timeSincePowerUp", value);
    }

    public override isValid(): boolean {
        return super.isValid() && isValidEddystoneTLMFrame(this.payload);
    }

    protected decodeFields(payload: Buffer, changes: TLMFrameField[]): void {
        const decoded = decodeEddystoneTLMFrame(payload);

        this.decodeField("version", decoded.version, changes);

        if (decoded.telemetry !== undefined) {
            this.decodeField("batteryVoltage", decoded.telemetry.batteryVoltage, changes);
            this.decodeField("temperature", decoded.telemetry.temperature, changes);
            this.decodeField("advertisementCount", decoded.telemetry.advertisementCount, changes);
            this.decodeField("timeSincePowerUp", decoded.telemetry.timeSincePowerUp, changes);
        }
    }

    protected encodeFields(): Buffer | undefined {
        return encodeEddystoneTLMFrame(this.fields);
    }
}
