import { InvalidHexError } from "../shared/errors.js";
import type { Frame } from "../capture/types.js";

/**
 * Unencrypted header in front of each client request:
 *
 *   [1 type][4 flags LE][4 cipher tag][4 padding LE][payload...]
 *
 * Only the two message types below have been observed. Anything else decodes
 * as "unknown" so captures of newer clients still parse.
 */
export const ENVELOPE_HEADER_LENGTH = 13;

export const MESSAGE_TYPE_PRIMARY_REQUEST = 0x6d;
export const MESSAGE_TYPE_STATUS_QUERY = 0xd5;

export type MessageType =
  | { kind: "primary-request"; code: typeof MESSAGE_TYPE_PRIMARY_REQUEST }
  | { kind: "status-query"; code: typeof MESSAGE_TYPE_STATUS_QUERY }
  | { kind: "unknown"; code: number };

export type CipherTag =
  | { kind: "ascii"; text: string; raw: Buffer }
  | { kind: "raw"; raw: Buffer };

export interface Envelope {
  kind: "envelope";
  messageType: MessageType;
  flags: number;
  cipherTag: CipherTag;
  padding: number;
  /** View over the remaining bytes. Opaque ciphertext. */
  payload: Buffer;
}

export type NotAnEnvelopeReason = "too-short" | "not-a-request";

export interface NotAnEnvelope {
  kind: "none";
  reason: NotAnEnvelopeReason;
}

export type DecodeResult = Envelope | NotAnEnvelope;

export function messageTypeFromByte(code: number): MessageType {
  switch (code) {
    case MESSAGE_TYPE_PRIMARY_REQUEST:
      return { kind: "primary-request", code: MESSAGE_TYPE_PRIMARY_REQUEST };
    case MESSAGE_TYPE_STATUS_QUERY:
      return { kind: "status-query", code: MESSAGE_TYPE_STATUS_QUERY };
    default:
      return { kind: "unknown", code };
  }
}

function isPrintableAscii(bytes: Buffer): boolean {
  return bytes.every((b) => b >= 0x20 && b <= 0x7e);
}

function cipherTagFrom(raw: Buffer): CipherTag {
  if (isPrintableAscii(raw)) return { kind: "ascii", text: raw.toString("latin1"), raw };
  return { kind: "raw", raw };
}

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Never throws. Inputs shorter than the header are reported, not rejected. */
export function decodeEnvelope(bytes: Uint8Array): DecodeResult {
  if (bytes.length < ENVELOPE_HEADER_LENGTH) return { kind: "none", reason: "too-short" };
  const buf = asBuffer(bytes);
  return {
    kind: "envelope",
    messageType: messageTypeFromByte(buf[0]),
    flags: buf.readUInt32LE(1),
    cipherTag: cipherTagFrom(buf.subarray(5, 9)),
    padding: buf.readUInt32LE(9),
    payload: buf.subarray(ENVELOPE_HEADER_LENGTH),
  };
}

export function decodeFrame(frame: Frame): DecodeResult {
  if (frame.direction !== "client->server") return { kind: "none", reason: "not-a-request" };
  return decodeEnvelope(frame.data);
}

export function hex32(value: number): string {
  return `0x${value.toString(16).padStart(8, "0")}`;
}

export function hex8(value: number): string {
  return `0x${value.toString(16).padStart(2, "0")}`;
}

export function describeMessageType(type: MessageType): string {
  switch (type.kind) {
    case "primary-request":
      return `${hex8(type.code)} (primary request)`;
    case "status-query":
      return `${hex8(type.code)} (status query)`;
    case "unknown":
      return `${hex8(type.code)} (unknown)`;
  }
}

export function describeCipherTag(tag: CipherTag): string {
  return tag.kind === "ascii" ? tag.text : `<${tag.raw.toString("hex")}>`;
}

export function describeEnvelope(result: DecodeResult): string {
  if (result.kind === "none") {
    return result.reason === "too-short" ? "none (shorter than 13-byte header)" : "none (server frame)";
  }
  return [
    `type=${describeMessageType(result.messageType)}`,
    `flags=${hex32(result.flags)}`,
    `cipher=${describeCipherTag(result.cipherTag)}`,
    `padding=${hex32(result.padding)}`,
    `payload=${result.payload.length} bytes`,
  ].join(" ");
}

/** Parse user-supplied hex such as "6d 01 00 80", "0x6d0100" or "6d:01:00". */
export function parseHex(text: string): Buffer {
  const cleaned = text.replace(/0x/gi, "").replace(/[\s:,-]/g, "");
  if (cleaned.length % 2 !== 0) throw new InvalidHexError("Hex input has an odd number of digits");
  if (!/^[0-9a-f]*$/i.test(cleaned)) throw new InvalidHexError("Hex input contains non-hex characters");
  return Buffer.from(cleaned, "hex");
}
