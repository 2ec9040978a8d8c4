import type { Direction, Frame } from "../capture/types.js";
import type { DecodeResult } from "../protocol/envelope.js";

export type SessionOutcome =
  | "closed"
  | "error"
  | "idle-timeout"
  | "capture-halted"
  | "dial-failed"
  | "aborted";

export type PerDirection<T> = Record<Direction, T>;

export interface SessionSummary {
  id: string;
  outcome: SessionOutcome;
  remote: string;
  upstream: string;
  bytes: PerDirection<number>;
  frames: PerDirection<number>;
  startedAt: number;
  endedAt: number;
  error?: string;
}

export type RelayEvent =
  | { type: "session_start"; sessionId: string; remote: string }
  | { type: "upstream_connected"; sessionId: string; upstream: string }
  | { type: "frame"; sessionId: string; frame: Frame; envelope: DecodeResult }
  | { type: "session_end"; sessionId: string; summary: SessionSummary };
