import { fileURLToPath } from "node:url";
import { createBeaconFrame } from "../beacon-frames/dispatcher.js";
import { describeFrame } from "./beacon-tracker.js";
import rawConf from "./conf.json" with { type: "json" };
import { MinimalScanner, type PortOptions } from "./minimal-scanner.js";
import { parsePayloadLine } from "./payload-line-parser.js";

type Conf = {
    port: PortOptions;
};

function argToBool(arg: string): boolean {
    arg = arg.toLowerCase();

    return arg === "1" || arg === "true" || arg === "yes" || arg === "on";
}

function parseConf(raw: unknown): Conf {
    if (typeof raw !== "object" || raw === null || !("port" in raw) || typeof raw.port !== "object" || raw.port === null) {
        throw new Error("Invalid conf.json, expected a 'port' object");
    }

    const port = raw.port;

    if (!("path" in port) || typeof port.path !== "string") {
        throw new Error("Invalid conf.json, expected 'port.path' string");
    }

    return {
        port: {
            path: port.path,
            baudRate: "baudRate" in port && typeof port.baudRate === "number" ? port.baudRate : undefined,
            rtscts: "rtscts" in port && typeof port.rtscts === "boolean" ? port.rtscts : undefined,
        },
    };
}

function printHelp(shouldThrow: boolean): void {
    console.log("\nDecode:");
    console.log("    dev:cli decode <hex_payload> [hex_payload...]");

    console.log("\nScan:");
    console.log("    dev:cli scan");

    console.log("\n- Payloads are the service data as hex, starting with the service UUID (e.g. aafe00...), optionally preceded by an address");
    console.log("- Scan expects the receiver to print one '[<address> ]<hex_payload>' line per advertisement");
    console.log("- Boolean 'yes' can take any of the following forms (any other will be considered no/false): 1, true, yes, on");
    console.log("- Following ENV vars will override 'conf.json': SCANNER_PATH, SCANNER_BAUDRATE, SCANNER_RTSCTS");

    if (shouldThrow) {
        throw new Error("Invalid parameters");
    }
}

function decode(lines: string[]): void {
    for (const line of lines) {
        const scanned = parsePayloadLine(line);

        if (scanned === undefined) {
            console.log(`${line}: not a hex payload`);
            continue;
        }

        const frame = createBeaconFrame(scanned.payload);

        if (frame === undefined) {
            console.log(`${line}: no beacon family matches`);
            continue;
        }

        console.log(`${line}: ${describeFrame(frame)}${frame.isValid() ? "" : " (invalid)"}`);
    }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const conf = parseConf(rawConf);

    if (process.env.SCANNER_PATH) {
        conf.port.path = process.env.SCANNER_PATH;
    }

    if (process.env.SCANNER_BAUDRATE) {
        conf.port.baudRate = Number.parseInt(process.env.SCANNER_BAUDRATE, 10);
    }

    if (process.env.SCANNER_RTSCTS) {
        conf.port.rtscts = argToBool(process.env.SCANNER_RTSCTS);
    }

    const mode = process.argv[2];

    switch (mode) {
        case "help": {
            console.log("Conf:", JSON.stringify(conf));
            printHelp(false);
            break;
        }
        case "decode": {
            if (process.argv.length <= 3) {
                printHelp(true);
            }

            decode(process.argv.slice(3));
            break;
        }
        case "scan": {
            console.log("Starting 'scan' mode with conf:", JSON.stringify(conf));

            const scanner = new MinimalScanner(conf.port);

            const onStop = async (): Promise<void> => {
                await scanner.stop();
            };

            process.on("SIGINT", onStop);
            process.on("SIGTERM", onStop);

            await scanner.start();
            break;
        }
        default: {
            printHelp(true);
        }
    }
}
