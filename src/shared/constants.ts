/** Patch servers answer on 6015. */
export const DEFAULT_PORT = 6015;
export const DEFAULT_LISTEN = `0.0.0.0:${DEFAULT_PORT}`;
export const DEFAULT_UPSTREAM = `64.37.188.7:${DEFAULT_PORT}`;

export const DEFAULT_TEXT_LOG = "patch_traffic.log";
export const DEFAULT_BINARY_LOG = "patch_traffic.bin";
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Bytes of each frame rendered into the text log. */
export const TEXT_PREFIX_BYTES = 256;
/** Bytes of each frame shown in live console output. */
export const CONSOLE_PREFIX_BYTES = 32;
