import { BeaconError } from "../beacon/beacon.js";
import {
    decodeEddystoneUIDFrame,
    EddystoneUIDConsts,
    type EddystoneUIDFields,
    encodeEddystoneUIDFrame,
    instanceIdToNumber,
    isValidEddystoneUIDFrame,
    namespaceIdToBigInt,
} from "../beacon/eddystone-uid.js";
import { logger } from "../utils/logger.js";
import { BeaconFrameBase, type BeaconFrameCallbacks, type BeaconFrameFieldName } from "./frame-base.js";

const NS = "uid-frame";

type UIDFrameState = {
    rangingData: number;
    namespaceId: Buffer | undefined;
    instanceId: Buffer | undefined;
};

type UIDFrameDerived = "namespaceIdAsNumber" | "instanceIdAsNumber";

export type UIDFrameField = BeaconFrameFieldName<UIDFrameState, UIDFrameDerived>;

const UID_DERIVED: readonly UIDFrameDerived[] = ["namespaceIdAsNumber", "instanceIdAsNumber"];

function assertRangingData(rangingData: number): void {
    if (!Number.isInteger(rangingData) || rangingData < -128 || rangingData > 127) {
        throw new BeaconError(`Invalid ranging data ${rangingData}, expected int8`);
    }
}

/**
 * An Eddystone-UID frame.
 *
 * Created from received bytes, fields are decoded immediately.
 * Created from fields, ids must have their exact size, payload is encoded immediately.
 */
export class UidEddystoneFrame extends BeaconFrameBase<UIDFrameState, UIDFrameDerived> {
    public readonly kind = "eddystone-uid";

    constructor(source: Buffer | EddystoneUIDFields, callbacks?: Partial<BeaconFrameCallbacks<UIDFrameField>>) {
        super({ rangingData: 0, namespaceId: undefined, instanceId: undefined }, callbacks);

        if (Buffer.isBuffer(source)) {
            this.initPayload(source);
            this.parsePayload();
        } else {
            assertRangingData(source.rangingData);

            if (
                source.namespaceId.byteLength !== EddystoneUIDConsts.NAMESPACE_ID_SIZE ||
                source.instanceId.byteLength !== EddystoneUIDConsts.INSTANCE_ID_SIZE
            ) {
                throw new BeaconError(
                    `Invalid UID ids length namespace=${source.namespaceId.byteLength} instance=${source.instanceId.byteLength}, expected 10 & 6`,
                );
            }

            this.fields.rangingData = source.rangingData;
            this.fields.namespaceId = Buffer.from(source.namespaceId);
            this.fields.instanceId = Buffer.from(source.instanceId);
            this.encodePayload();
        }
    }

    // #region Getters/Setters

    /**
     * Tx power level at 0 m, in dBm. int8_t
     * Note that this differs from other beacon formats that calibrate at 1 m.
     */
    get rangingData(): number {
        return this.fields.rangingData;
    }

    set rangingData(value: number) {
        assertRangingData(value);
        this.setField("rangingData", value);
    }

    /** 10-byte namespace */
    get namespaceId(): Buffer | undefined {
        return this.fields.namespaceId === undefined ? undefined : Buffer.from(this.fields.namespaceId);
    }

    /**
     * Any length is accepted, the payload becomes undefined until the id has its exact size again.
     */
    set namespaceId(value: Buffer | undefined) {
        this.setField("namespaceId", value === undefined ? undefined : Buffer.from(value));
    }

    /** Namespace ID as unsigned 80-bit integer, most-significant byte first */
    get namespaceIdAsNumber(): bigint | undefined {
        return this.fields.namespaceId === undefined ? undefined : namespaceIdToBigInt(this.fields.namespaceId);
    }

    /** 6-byte instance within the namespace */
    get instanceId(): Buffer | undefined {
        return this.fields.instanceId === undefined ? undefined : Buffer.from(this.fields.instanceId);
    }

    /**
     * Any length is accepted, the payload becomes undefined until the id has its exact size again.
     */
    set instanceId(value: Buffer | undefined) {
        this.setField("instanceId", value === undefined ? undefined : Buffer.from(value));
    }

    /** Instance ID as unsigned 48-bit integer, most-significant byte first */
    get instanceIdAsNumber(): number | undefined {
        return this.fields.instanceId === undefined || this.fields.instanceId.byteLength !== EddystoneUIDConsts.INSTANCE_ID_SIZE
            ? undefined
            : instanceIdToNumber(this.fields.instanceId);
    }

    // #endregion

    /**
     * 2 bytes ID + 1 byte frame type, 1 byte ranging data, 10 bytes namespace, 6 bytes instance,
     * 2 bytes RFU (required by the Eddystone format, sometimes omitted in practice)
     */
    public override isValid(): boolean {
        return super.isValid() && isValidEddystoneUIDFrame(this.payload);
    }

    protected override get derivedNames(): readonly UIDFrameDerived[] {
        return UID_DERIVED;
    }

    protected override derivedValue(name: UIDFrameDerived): unknown {
        return name === "namespaceIdAsNumber" ? this.namespaceIdAsNumber : this.instanceIdAsNumber;
    }

    protected decodeFields(payload: Buffer, changes: UIDFrameField[]): void {
        const decoded = decodeEddystoneUIDFrame(payload);

        this.decodeField("rangingData", decoded.rangingData, changes);
        this.decodeField("namespaceId", decoded.namespaceId, changes);
        this.decodeField("instanceId", decoded.instanceId, changes);
    }

    protected encodeFields(): Buffer | undefined {
        const payload = encodeEddystoneUIDFrame(this.fields);

        if (payload === undefined) {
            const { namespaceId, instanceId } = this.fields;

            logger.debug(() => `Cannot encode UID frame namespaceId=${namespaceId?.toString("hex")} instanceId=${instanceId?.toString("hex")}`, NS);
        }

        return payload;
    }
}
