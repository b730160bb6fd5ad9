import { BeaconError } from "../beacon/beacon.js";
import {
    compressEddystoneURL,
    decodeEddystoneURLFrame,
    type EddystoneURLFields,
    encodeEddystoneURLFrame,
    isValidEddystoneURLFrame,
} from "../beacon/eddystone-url.js";
import { BeaconFrameBase, type BeaconFrameCallbacks, type BeaconFrameFieldName } from "./frame-base.js";

type URLFrameState = {
    rangingData: number;
    url: string | undefined;
};

export type URLFrameField = BeaconFrameFieldName<URLFrameState>;

/**
 * An Eddystone-URL frame.
 */
export class UrlEddystoneFrame extends BeaconFrameBase<URLFrameState> {
    public readonly kind = "eddystone-url";

    constructor(source: Buffer | EddystoneURLFields, callbacks?: Partial<BeaconFrameCallbacks<URLFrameField>>) {
        super({ rangingData: 0, url: undefined }, callbacks);

        if (Buffer.isBuffer(source)) {
            this.initPayload(source);
            this.parsePayload();
        } else {
            if (compressEddystoneURL(source.url) === undefined) {
                throw new BeaconError(`URL cannot be represented in an Eddystone-URL frame: ${source.url}`);
            }

            this.fields.rangingData = source.rangingData;
            this.fields.url = source.url;
            this.encodePayload();
        }
    }

    /** Tx power level at 0 m, in dBm. int8_t */
    get rangingData(): number {
        return this.fields.rangingData;
    }

    set rangingData(value: number) {
        if (!Number.isInteger(value) || value < -128 || value > 127) {
            throw new BeaconError(`Invalid ranging data ${value}, expected int8`);
        }

        this.setField("rangingData", value);
    }

    get url(): string | undefined {
        return this.fields.url;
    }

    /**
     * Payload becomes undefined if the URL cannot be compressed into a frame.
     */
    set url(value: string | undefined) {
        this.setField("url", value);
    }

    public override isValid(): boolean {
        return super.isValid() && isValidEddystoneURLFrame(this.payload);
    }

    protected decodeFields(payload: Buffer, changes: URLFrameField[]): void {
        const decoded = decodeEddystoneURLFrame(payload);

        this.decodeField("rangingData", decoded.rangingData, changes);
        this.decodeField("url", decoded.url, changes);
    }

    protected encodeFields(): Buffer | undefined {
        return encodeEddystoneURLFrame(this.fields);
    }
}
