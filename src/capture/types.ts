import type { DecodeResult } from "../protocol/envelope.js";

export type Direction = "client->server" | "server->client";

export const DIRECTIONS: readonly Direction[] = ["client->server", "server->client"];

/** Fixed-width tags used in log headers and binary records. */
export const DIRECTION_TAGS = {
  "client->server": "CLIENT->SERVER",
  "server->client": "SERVER->CLIENT",
} as const satisfies Record<Direction, string>;

export type DirectionTag = (typeof DIRECTION_TAGS)[Direction];

export function directionFromTag(tag: string): Direction | undefined {
  return DIRECTIONS.find((d) => DIRECTION_TAGS[d] === tag);
}

/** One chunk as delivered by a single socket read. */
export interface Frame {
  readonly connectionId: string;
  readonly direction: Direction;
  /** Starts at 0 for each connection and direction. */
  readonly sequence: number;
  /** Wall clock, epoch milliseconds. */
  readonly timestamp: number;
  /** process.hrtime.bigint() at capture; only meaningful relative to other frames. */
  readonly monotonicNs: bigint;
  readonly data: Buffer;
}

export interface CaptureEntry {
  readonly frame: Frame;
  readonly envelope: DecodeResult;
}

export interface CaptureSink {
  readonly name: string;
  write(entry: CaptureEntry): Promise<void>;
  close(): Promise<void>;
}

export function createFrame(
  connectionId: string,
  direction: Direction,
  sequence: number,
  data: Buffer
): Frame {
  return Object.freeze({
    connectionId,
    direction,
    sequence,
    timestamp: Date.now(),
    monotonicNs: process.hrtime.bigint(),
    data,
  });
}
