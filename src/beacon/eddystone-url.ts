import { signedByte } from "../utils/bits.js";
import { logger } from "../utils/logger.js";
import { BeaconConsts, createEddystoneHeader, EddystoneFrameType, getEddystoneFrameType } from "./beacon.js";

const NS = "eddystone-url";

/**
 * Eddystone-URL
 * https://github.com/google/eddystone/tree/master/eddystone-url
 */
export const enum EddystoneURLConsts {
    TX_POWER_OFFSET = BeaconConsts.HEADER_SIZE,
    SCHEME_OFFSET = BeaconConsts.HEADER_SIZE + 1,
    URL_OFFSET = BeaconConsts.HEADER_SIZE + 2,
    URL_MIN_SIZE = 1,
    URL_MAX_SIZE = 17,

    /** first printable, non-space, US-ASCII char */
    CHAR_MIN = 0x21,
    CHAR_MAX = 0x7e,
}

/** index = scheme prefix byte */
export const EDDYSTONE_URL_SCHEMES = ["http://www.", "https://www.", "http://", "https://"] as const;

/** index = expansion code */
export const EDDYSTONE_URL_EXPANSIONS = [
    ".com/",
    ".org/",
    ".edu/",
    ".net/",
    ".info/",
    ".biz/",
    ".gov/",
    ".com",
    ".org",
    ".edu",
    ".net",
    ".info",
    ".biz",
    ".gov",
] as const;

export type EddystoneURLFields = {
    /** Tx power level at 0 m, in dBm. int8_t */
    rangingData: number;
    /** fully expanded URL */
    url: string;
};

export function isValidEddystoneURLFrame(payload: Buffer | undefined): payload is Buffer {
    if (getEddystoneFrameType(payload) !== EddystoneFrameType.URL || payload === undefined) {
        return false;
    }

    const length = payload.byteLength;

    return (
        length >= EddystoneURLConsts.URL_OFFSET + EddystoneURLConsts.URL_MIN_SIZE &&
        length <= EddystoneURLConsts.URL_OFFSET + EddystoneURLConsts.URL_MAX_SIZE &&
        payload[EddystoneURLConsts.SCHEME_OFFSET] < EDDYSTONE_URL_SCHEMES.length
    );
}

/**
 * Expects a payload that passed `isValidEddystoneURLFrame`.
 * Reserved bytes (0x0e-0x20, 0x7f-0xff) are skipped.
 */
export function decodeEddystoneURLFrame(payload: Buffer): EddystoneURLFields {
    let url: string = EDDYSTONE_URL_SCHEMES[payload[EddystoneURLConsts.SCHEME_OFFSET]];

    for (let i = EddystoneURLConsts.URL_OFFSET; i < payload.byteLength; i++) {
        const byte = payload[i];

        if (byte < EDDYSTONE_URL_EXPANSIONS.length) {
            url += EDDYSTONE_URL_EXPANSIONS[byte];
        } else if (byte >= EddystoneURLConsts.CHAR_MIN && byte <= EddystoneURLConsts.CHAR_MAX) {
            url += String.fromCharCode(byte);
        } else {
            logger.debug(() => `Skipping reserved URL byte ${byte}`, NS);
        }
    }

    return {
        rangingData: signedByte(payload[EddystoneURLConsts.TX_POWER_OFFSET]),
        url,
    };
}

/**
 * Compress a URL: longest matching scheme prefix, then greedily the longest expansion at each position.
 * @returns [scheme, encoded bytes], undefined if the URL cannot be represented
 */
export function compressEddystoneURL(url: string): [scheme: number, encoded: Buffer] | undefined {
    let scheme = -1;

    for (let i = 0; i < EDDYSTONE_URL_SCHEMES.length; i++) {
        if (url.startsWith(EDDYSTONE_URL_SCHEMES[i]) && (scheme === -1 || EDDYSTONE_URL_SCHEMES[i].length > EDDYSTONE_URL_SCHEMES[scheme].length)) {
            scheme = i;
        }
    }

    if (scheme === -1) {
        return undefined;
    }

    const bytes: number[] = [];
    let position = EDDYSTONE_URL_SCHEMES[scheme].length;

    while (position < url.length) {
        let code = -1;

        for (let i = 0; i < EDDYSTONE_URL_EXPANSIONS.length; i++) {
            const expansion = EDDYSTONE_URL_EXPANSIONS[i];

            if (url.startsWith(expansion, position) && (code === -1 || expansion.length > EDDYSTONE_URL_EXPANSIONS[code].length)) {
                code = i;
            }
        }

        if (code !== -1) {
            bytes.push(code);
            position += EDDYSTONE_URL_EXPANSIONS[code].length;
            continue;
        }

        const charCode = url.charCodeAt(position);

        if (charCode < EddystoneURLConsts.CHAR_MIN || charCode > EddystoneURLConsts.CHAR_MAX) {
            return undefined;
        }

        bytes.push(charCode);
        position += 1;
    }

    if (bytes.length < EddystoneURLConsts.URL_MIN_SIZE || bytes.length > EddystoneURLConsts.URL_MAX_SIZE) {
        return undefined;
    }

    return [scheme, Buffer.from(bytes)];
}

/**
 * @returns undefined if the URL cannot be represented (unknown scheme, invalid char, too long)
 */
export function encodeEddystoneURLFrame(fields: Partial<EddystoneURLFields>): Buffer | undefined {
    const { rangingData = 0, url } = fields;

    if (url === undefined) {
        return undefined;
    }

    const compressed = compressEddystoneURL(url);

    if (compressed === undefined) {
        logger.debug(() => `Cannot compress URL ${url}`, NS);
        return undefined;
    }

    const [scheme, encoded] = compressed;
    const payload = Buffer.alloc(EddystoneURLConsts.URL_OFFSET + encoded.byteLength);
    let offset = createEddystoneHeader(EddystoneFrameType.URL).copy(payload, 0);

    offset = payload.writeUInt8(rangingData & 0xff, offset);
    offset = payload.writeUInt8(scheme, offset);
    encoded.copy(payload, offset);

    return payload;
}
