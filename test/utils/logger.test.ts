import { afterEach, describe, expect, it, vi } from "vitest";
import { UidEddystoneFrame } from "../../src/beacon-frames/uid-frame.js";
import { type Logger, logger, setLogger, silentLogger } from "../../src/utils/logger.js";

describe("Logger", () => {
    const defaultLogger = logger;

    afterEach(() => {
        setLogger(defaultLogger);
    });

    it("routes library output to the configured logger", () => {
        const debug = vi.fn();
        const custom: Logger = { ...silentLogger, debug };

        setLogger(custom);

        const frame = new UidEddystoneFrame(Buffer.from("aafe00ee00112233445566778899aabbccddeeff0000", "hex"));

        frame.instanceId = Buffer.alloc(2);

        expect(debug).toHaveBeenCalledTimes(1);
        expect(debug.mock.calls[0][0]()).toStrictEqual("Cannot encode UID frame namespaceId=00112233445566778899 instanceId=0000");
        expect(debug.mock.calls[0][1]).toStrictEqual("uid-frame");
    });

    it("does not evaluate debug messages when silenced", () => {
        const message = vi.fn(() => "never");

        setLogger(silentLogger);
        logger.debug(message, "test");

        expect(message).toHaveBeenCalledTimes(0);
    });
});
