import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  LISTEN_FAILURE: 3,
  CAPTURE_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** Bind failure on the listening socket. Reported once at startup. */
export class ListenError extends Error {
  constructor(
    message: string,
    readonly code?: string
  ) {
    super(message);
    this.name = "ListenError";
  }
}

export class UpstreamDialError extends Error {
  constructor(
    message: string,
    readonly code?: string
  ) {
    super(message);
    this.name = "UpstreamDialError";
  }
}

/** A capture sink write failed; every later record is dropped. */
export class CaptureWriteError extends Error {
  constructor(
    message: string,
    readonly sink: string,
    readonly cause?: unknown
  ) {
    super(message);
    this.name = "CaptureWriteError";
  }
}

export class CaptureClosedError extends Error {
  constructor() {
    super("Capture log is closed");
    this.name = "CaptureClosedError";
  }
}

export class CaptureFormatError extends Error {
  constructor(
    message: string,
    readonly offset: number
  ) {
    super(`${message} at offset ${offset}`);
    this.name = "CaptureFormatError";
  }
}

export class InvalidHexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidHexError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}
