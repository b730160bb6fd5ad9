export * from "./beacon/beacon.js";
export * from "./beacon/eddystone-tlm.js";
export * from "./beacon/eddystone-uid.js";
export * from "./beacon/eddystone-url.js";
export * from "./beacon/estimote-telemetry.js";
export * from "./beacon-frames/dispatcher.js";
export * from "./beacon-frames/frame-base.js";
export * from "./beacon-frames/telemetry-frame.js";
export * from "./beacon-frames/tlm-frame.js";
export * from "./beacon-frames/uid-frame.js";
export * from "./beacon-frames/unknown-frame.js";
export * from "./beacon-frames/url-frame.js";
export * from "./utils/bits.js";
export { type Logger, logger, setLogger, silentLogger } from "./utils/logger.js";
