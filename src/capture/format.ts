import { describeEnvelope } from "../protocol/envelope.js";
import { TEXT_PREFIX_BYTES } from "../shared/constants.js";
import { DIRECTION_TAGS, type CaptureEntry, type Direction } from "./types.js";

const RULE = "=".repeat(60);

/** UTF-8 rendering with U+FFFD for invalid sequences and '.' for control characters. */
export function renderText(bytes: Buffer): string {
  return bytes.toString("utf8").replace(/[\u0000-\u001f\u007f]/g, ".");
}

export function formatTextRecord(entry: CaptureEntry, prefixBytes = TEXT_PREFIX_BYTES): string {
  const { frame, envelope } = entry;
  const prefix = frame.data.subarray(0, prefixBytes);
  const lines = [
    "",
    RULE,
    `[${new Date(frame.timestamp).toISOString()}] ${DIRECTION_TAGS[frame.direction]} (${frame.data.length} bytes)`,
    RULE,
    `Connection: ${frame.connectionId}  Seq: ${frame.sequence}`,
    `Hex: ${prefix.toString("hex")}`,
    `Text: ${renderText(prefix)}`,
  ];
  if (frame.direction === "client->server") lines.push(`Envelope: ${describeEnvelope(envelope)}`);
  return lines.join("\n") + "\n";
}

const MARKER = Buffer.alloc(4);

export const BINARY_TAG_LENGTH = DIRECTION_TAGS["client->server"].length;
export const BINARY_HEADER_LENGTH = MARKER.length * 2 + BINARY_TAG_LENGTH + 4;

/** [00000000][tag][00000000][u32 LE length][bytes] */
export function encodeBinaryRecord(direction: Direction, data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32LE(data.length, 0);
  return Buffer.concat([MARKER, Buffer.from(DIRECTION_TAGS[direction], "ascii"), MARKER, length, data]);
}
