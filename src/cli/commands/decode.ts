import { decodeEnvelope, describeEnvelope, parseHex } from "../../protocol/envelope.js";
import { EXIT, exit, InvalidHexError } from "../../shared/errors.js";

export function runDecode(hex: string): void {
  let bytes: Buffer;
  try {
    bytes = parseHex(hex);
  } catch (err) {
    if (err instanceof InvalidHexError) {
      process.stderr.write(`${err.message}\n`);
      exit(EXIT.INVALID_ARGS);
    }
    throw err;
  }
  process.stdout.write(`${describeEnvelope(decodeEnvelope(bytes))}\n`);
}
