/**
 * Masks a byte. Result is NOT shifted, caller is responsible for it.
 */
export function bits(byteValue: number, mask: number): number {
    return byteValue & mask;
}

/**
 * Reinterpret an unsigned 8-bit value as two's complement.
 */
export function signedByte(byteValue: number): number {
    return signedN(byteValue & 0xff, 8);
}

/**
 * Two's complement interpretation of an unsigned value occupying `bitWidth` bits.
 * e.g. `signedN(0xfff, 12) === -1`
 */
export function signedN(rawValue: number, bitWidth: number): number {
    const range = 2 ** bitWidth;
    const value = rawValue % range;

    return value >= range / 2 ? value - range : value;
}

/**
 * Inverse of `signedN`: two's complement representation of `value` on `bitWidth` bits.
 */
export function unsignedN(value: number, bitWidth: number): number {
    const range = 2 ** bitWidth;

    return ((value % range) + range) % range;
}

export function leUint32(bytes: Buffer, offset = 0): number {
    return bytes.readUInt32LE(offset);
}

export function leUint48(bytes: Buffer, offset = 0): number {
    return bytes.readUIntLE(offset, 6);
}

export function leUint64(bytes: Buffer, offset = 0): bigint {
    return bytes.readBigUInt64LE(offset);
}
