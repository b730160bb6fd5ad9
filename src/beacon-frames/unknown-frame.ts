import { BeaconFrameBase, type BeaconFrameCallbacks } from "./frame-base.js";

/**
 * Payload with a known service UUID but a frame type not supported by this library.
 * Only the raw payload is kept, nothing is decoded.
 */
export class UnknownBeaconFrame extends BeaconFrameBase<Record<never, never>> {
    public readonly kind = "unknown";

    constructor(payload: Buffer, callbacks?: Partial<BeaconFrameCallbacks<never>>) {
        super({}, callbacks);

        this.initPayload(payload);
    }

    protected decodeFields(_payload: Buffer, _changes: never[]): void {}

    protected encodeFields(): Buffer | undefined {
        return this.payload;
    }
}
