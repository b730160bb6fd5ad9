import { BeaconConsts } from "../beacon/beacon.js";

export type BeaconFrameKind = "eddystone-uid" | "eddystone-url" | "eddystone-tlm" | "estimote-telemetry" | "unknown";

export type BeaconFrameCallbacks<N extends string = string> = {
    /**
     * Called synchronously once per field whose value actually changed, in payload order,
     * after a setter ran or after (re-)decoding a payload.
     */
    onFieldChanged: (field: N) => void;
};

/**
 * Byte-wise for buffers, member-wise for arrays and plain objects.
 */
export function fieldValuesEqual(a: unknown, b: unknown): boolean {
    if (a === b) {
        return true;
    }

    if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) {
        return a.equals(b);
    }

    if (Array.isArray(a) && Array.isArray(b)) {
        return a.length === b.length && a.every((value, index) => fieldValuesEqual(value, b[index]));
    }

    if (typeof a === "object" && typeof b === "object" && a !== null && b !== null) {
        const aEntries = Object.entries(a);
        const bEntries = new Map(Object.entries(b));

        return aEntries.length === bEntries.size && aEntries.every(([key, value]) => bEntries.has(key) && fieldValuesEqual(value, bEntries.get(key)));
    }

    return false;
}

/**
 * Owns the raw payload and the typed fields derived from it.
 *
 * - decoding writes the fields storage directly, never through setters
 * - setters re-encode the payload directly, never by decoding
 *
 * @template F Field storage
 * @template D Names of read-only values computed from fields (also notified when they change)
 */
export abstract class BeaconFrameBase<F extends object = object, D extends string = never> {
    public abstract readonly kind: BeaconFrameKind;

    #payload: Buffer | undefined;
    protected readonly fields: F;
    readonly #callbacks: Partial<BeaconFrameCallbacks<BeaconFrameFieldName<F, D>>>;

    protected constructor(fields: F, callbacks: Partial<BeaconFrameCallbacks<BeaconFrameFieldName<F, D>>> = {}) {
        this.fields = fields;
        this.#callbacks = callbacks;
        this.#payload = undefined;
    }

    /**
     * Copy of the raw payload, undefined if the fields currently cannot be encoded.
     */
    get payload(): Buffer | undefined {
        return this.#payload === undefined ? undefined : Buffer.from(this.#payload);
    }

    /**
     * Check if the contents of this frame are generally valid.
     * Base only checks presence of a full header, variants add magic/type/length checks.
     */
    public isValid(): boolean {
        return this.#payload !== undefined && this.#payload.byteLength >= BeaconConsts.HEADER_SIZE;
    }

    /**
     * Replace the raw payload and decode it.
     * Fields keep their values if the new payload is not valid for this variant.
     *
     * @returns Names of the fields that changed, in the order they were notified
     */
    public setPayload(payload: Buffer): BeaconFrameFieldName<F, D>[] {
        this.#payload = Buffer.from(payload);

        return this.parsePayload();
    }

    /**
     * Update the information stored in this frame with the payload from the other frame.
     * Only fields whose value differs are notified, which would not be possible by replacing the frame object.
     *
     * @returns Names of the fields that changed, in the order they were notified
     */
    public update(otherFrame: { readonly payload: Buffer | undefined }): BeaconFrameFieldName<F, D>[] {
        // getter already returns a copy
        this.#payload = otherFrame.payload;

        return this.parsePayload();
    }

    /**
     * Parse the current payload into the fields. No-op if the frame is not valid.
     */
    public parsePayload(): BeaconFrameFieldName<F, D>[] {
        const payload = this.#payload;

        if (payload === undefined || !this.isValid()) {
            return [];
        }

        return this.#track((changes) => this.decodeFields(payload, changes));
    }

    /**
     * Store a freshly encoded payload. Does not decode.
     */
    protected encodePayload(): void {
        this.#payload = this.encodeFields();
    }

    /**
     * Replace the raw payload without decoding, used when constructing from received bytes before parsing.
     */
    protected initPayload(payload: Buffer): void {
        this.#payload = Buffer.from(payload);
    }

    /**
     * Setter body: no-op when equal, else store, re-encode and notify.
     */
    protected setField<K extends keyof F & string>(key: K, value: F[K]): void {
        if (fieldValuesEqual(this.fields[key], value)) {
            return;
        }

        this.#track((changes) => {
            this.fields[key] = value;
            changes.push(key);
            this.encodePayload();
        });
    }

    /**
     * Decode body: store without encoding, records the change if any.
     */
    protected decodeField<K extends keyof F & string>(key: K, value: F[K], changes: BeaconFrameFieldName<F, D>[]): void {
        if (fieldValuesEqual(this.fields[key], value)) {
            return;
        }

        this.fields[key] = value;
        changes.push(key);
    }

    /** Names of the values computed from fields, in notification order */
    protected get derivedNames(): readonly D[] {
        return [];
    }

    /* v8 ignore next 3 -- @preserve */
    protected derivedValue(_name: D): unknown {
        return undefined;
    }

    protected abstract decodeFields(payload: Buffer, changes: BeaconFrameFieldName<F, D>[]): void;

    protected abstract encodeFields(): Buffer | undefined;

    /**
     * Run a mutation, then notify every changed field followed by every changed derived value.
     */
    #track(mutation: (changes: BeaconFrameFieldName<F, D>[]) => void): BeaconFrameFieldName<F, D>[] {
        const derivedNames = this.derivedNames;
        const derivedBefore = derivedNames.map((name) => this.derivedValue(name));
        const changes: BeaconFrameFieldName<F, D>[] = [];

        mutation(changes);

        for (let i = 0; i < derivedNames.length; i++) {
            if (!fieldValuesEqual(derivedBefore[i], this.derivedValue(derivedNames[i]))) {
                changes.push(derivedNames[i]);
            }
        }

        if (this.#callbacks.onFieldChanged) {
            for (const change of changes) {
                this.#callbacks.onFieldChanged(change);
            }
        }

        return changes;
    }
}

export type BeaconFrameFieldName<F extends object, D extends string = never> = (keyof F & string) | D;
