import { SerialPort } from "serialport";
import { logger } from "../utils/logger.js";
import { BeaconTracker, type BeaconTrackerCallbacks } from "./beacon-tracker.js";
import { PayloadLineParser, type ScannedPayload } from "./payload-line-parser.js";

const NS = "minimal-scanner";

/**
 * Example:
 * ```ts
 * {
 *     path: '/dev/ttyACM0',
 *     baudRate: 115200,
 *     rtscts: false,
 * }
 * ```
 */
export type PortOptions = {
    path: string;
    baudRate?: number;
    rtscts?: boolean;
};

/**
 * Minimal scanner reading advertisement payloads, one per line, from a BLE receiver on a serial port,
 * and logging every new beacon and every changed field to the console.
 */
export class MinimalScanner {
    public readonly parser: PayloadLineParser;
    public readonly tracker: BeaconTracker;
    private readonly portOptions: PortOptions;
    private serialPort?: SerialPort;
    /** True when serial is currently closing */
    private closing: boolean;

    constructor(portOptions: PortOptions, callbacks?: Partial<BeaconTrackerCallbacks>) {
        this.portOptions = portOptions;
        this.parser = new PayloadLineParser();
        this.tracker = new BeaconTracker(callbacks);
        this.closing = false;

        this.parser.on("data", this.onPayload.bind(this));
    }

    /**
     * Check if port is open, and not closing.
     */
    get portOpen(): boolean {
        if (this.closing) {
            return false;
        }

        return this.serialPort ? this.serialPort.isOpen : false;
    }

    public async start(): Promise<void> {
        await this.closePort(); // will do nothing if nothing's open

        const serialOpts = {
            path: this.portOptions.path,
            baudRate: typeof this.portOptions.baudRate === "number" ? this.portOptions.baudRate : 115200,
            rtscts: typeof this.portOptions.rtscts === "boolean" ? this.portOptions.rtscts : false,
            autoOpen: false,
        };

        logger.debug(() => `Opening serial port with [path=${serialOpts.path} baudRate=${serialOpts.baudRate} rtscts=${serialOpts.rtscts}]`, NS);

        const serialPort = new SerialPort(serialOpts);
        this.serialPort = serialPort;
        this.closing = false;

        serialPort.pipe(this.parser);

        try {
            await new Promise<void>((resolve, reject): void => {
                serialPort.open((err) => (err ? reject(err) : resolve()));
            });

            logger.info("Serial port opened", NS);

            serialPort.once("close", this.onPortClose.bind(this));
            serialPort.on("error", this.onPortError.bind(this));
        } catch (error) {
            await this.stop();

            throw error;
        }
    }

    public async stop(): Promise<void> {
        this.closing = true;

        await this.closePort();
        this.tracker.clear();
    }

    public async closePort(): Promise<void> {
        const serialPort = this.serialPort;

        if (serialPort === undefined) {
            return;
        }

        if (serialPort.isOpen) {
            try {
                await new Promise<void>((resolve, reject): void => {
                    serialPort.close((err) => (err ? reject(err) : resolve()));
                });
            } catch (err) {
                logger.error(`Failed to close serial port ${err}.`, NS);
            }
        }

        serialPort.unpipe(this.parser);
        serialPort.removeAllListeners();

        this.serialPort = undefined;
    }

    /**
     * Handle port closing
     * @param error An Error when the port was closed unexpectedly (e.g. unplugged)
     */
    private onPortClose(error: Error | null): void {
        if (error) {
            logger.error("Port closed unexpectedly.", NS);
        } else {
            logger.info("Port closed.", NS);
        }
    }

    private onPortError(error: Error): void {
        logger.error(`Port ${error}`, NS);
    }

    private onPayload(scanned: ScannedPayload): void {
        this.tracker.track(scanned);
    }
}
