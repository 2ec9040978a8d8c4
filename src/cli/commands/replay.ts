import { readBinaryCapture, type BinaryCapture, type BinaryRecord } from "../../capture/replay.js";
import { DIRECTION_TAGS } from "../../capture/types.js";
import { decodeEnvelope, describeEnvelope, type DecodeResult } from "../../protocol/envelope.js";
import { CONSOLE_PREFIX_BYTES } from "../../shared/constants.js";
import { CaptureFormatError, EXIT, errorMessage, exit } from "../../shared/errors.js";

function envelopeOf(record: BinaryRecord): DecodeResult {
  if (record.direction !== "client->server") return { kind: "none", reason: "not-a-request" };
  return decodeEnvelope(record.data);
}

export function formatReplayRecord(record: BinaryRecord, index: number): string {
  const lines = [
    `#${index} ${DIRECTION_TAGS[record.direction]} ${record.data.length} bytes @${record.offset}`,
    `  head: ${record.data.subarray(0, CONSOLE_PREFIX_BYTES).toString("hex")}`,
  ];
  if (record.direction === "client->server") lines.push(`  envelope: ${describeEnvelope(envelopeOf(record))}`);
  return lines.join("\n");
}

export function replayRecordJson(record: BinaryRecord, index: number): string {
  const envelope = envelopeOf(record);
  return JSON.stringify({
    index,
    offset: record.offset,
    direction: record.direction,
    length: record.data.length,
    hex: record.data.toString("hex"),
    ...(record.direction === "client->server" ? { envelope: describeEnvelope(envelope) } : {}),
  });
}

export async function runReplay(file: string, opts: { json?: boolean; limit?: string }): Promise<void> {
  const limit = opts.limit === undefined ? Infinity : parseInt(opts.limit, 10);
  if (Number.isNaN(limit) || limit < 0) exit(EXIT.INVALID_ARGS, `--limit must be a non-negative integer`);

  let capture: BinaryCapture;
  try {
    capture = await readBinaryCapture(file);
  } catch (err) {
    const code = err instanceof CaptureFormatError ? EXIT.INVALID_ARGS : EXIT.GENERIC_ERROR;
    process.stderr.write(`Cannot replay ${file}: ${errorMessage(err)}\n`);
    exit(code);
  }

  for (const [index, record] of capture.records.entries()) {
    if (index >= limit) break;
    const line = opts.json ? replayRecordJson(record, index) : formatReplayRecord(record, index);
    process.stdout.write(line + "\n");
  }
  if (capture.trailing > 0) {
    process.stderr.write(`warning: ${capture.trailing} trailing bytes form an incomplete record\n`);
  }
}
