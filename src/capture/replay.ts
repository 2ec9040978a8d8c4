import { readFile } from "node:fs/promises";
import { CaptureFormatError } from "../shared/errors.js";
import { BINARY_HEADER_LENGTH, BINARY_TAG_LENGTH } from "./format.js";
import { directionFromTag, type Direction } from "./types.js";

export interface BinaryRecord {
  /** Byte offset of the record header in the capture file. */
  offset: number;
  direction: Direction;
  data: Buffer;
}

export interface BinaryCapture {
  records: BinaryRecord[];
  /** Bytes after the last complete record, left by a write cut short. */
  trailing: number;
}

function isZeroMarker(buf: Buffer, at: number): boolean {
  return buf.readUInt32LE(at) === 0;
}

/**
 * Reads records front to back. Lengths only appear in each record header, so
 * there is no way to seek without walking every record before it.
 */
export function* iterateBinaryCapture(buf: Buffer): Generator<BinaryRecord, number> {
  let offset = 0;
  while (offset < buf.length) {
    if (buf.length - offset < BINARY_HEADER_LENGTH) return buf.length - offset;
    if (!isZeroMarker(buf, offset)) throw new CaptureFormatError("Missing leading record marker", offset);
    const tagStart = offset + 4;
    const tag = buf.toString("ascii", tagStart, tagStart + BINARY_TAG_LENGTH);
    const direction = directionFromTag(tag);
    if (!direction) throw new CaptureFormatError(`Unknown direction tag "${tag}"`, tagStart);
    const trailerAt = tagStart + BINARY_TAG_LENGTH;
    if (!isZeroMarker(buf, trailerAt)) throw new CaptureFormatError("Missing trailing record marker", trailerAt);
    const length = buf.readUInt32LE(trailerAt + 4);
    const dataStart = offset + BINARY_HEADER_LENGTH;
    if (buf.length - dataStart < length) return buf.length - offset;
    yield { offset, direction, data: buf.subarray(dataStart, dataStart + length) };
    offset = dataStart + length;
  }
  return 0;
}

export function parseBinaryCapture(buf: Buffer): BinaryCapture {
  const records: BinaryRecord[] = [];
  const iterator = iterateBinaryCapture(buf);
  for (;;) {
    const step = iterator.next();
    if (step.done) return { records, trailing: step.value };
    records.push(step.value);
  }
}

export async function readBinaryCapture(filePath: string): Promise<BinaryCapture> {
  return parseBinaryCapture(await readFile(filePath));
}
