import { mkdir, open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { encodeBinaryRecord, formatTextRecord } from "./format.js";
import type { CaptureEntry, CaptureSink } from "./types.js";

export interface FileSinkOptions {
  /** Append to an existing file instead of truncating it. */
  append?: boolean;
  /** datasync() after every record. */
  fsync?: boolean;
}

async function openForWrite(filePath: string, options: FileSinkOptions): Promise<FileHandle> {
  await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  return open(filePath, options.append ? "a" : "w");
}

/**
 * One write() per record: the handle is unbuffered, so each record reaches the
 * OS whole before the call resolves.
 */
async function createFileSink(
  name: string,
  filePath: string,
  encode: (entry: CaptureEntry) => Buffer,
  options: FileSinkOptions
): Promise<CaptureSink> {
  const handle = await openForWrite(filePath, options);
  let closed = false;

  return {
    name,
    async write(entry: CaptureEntry): Promise<void> {
      const bytes = encode(entry);
      let offset = 0;
      while (offset < bytes.length) {
        const { bytesWritten } = await handle.write(bytes, offset, bytes.length - offset);
        offset += bytesWritten;
      }
      if (options.fsync) await handle.datasync();
    },
    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await handle.close();
    },
  };
}

export function createTextSink(filePath: string, options: FileSinkOptions = {}): Promise<CaptureSink> {
  return createFileSink(
    "text",
    filePath,
    (entry) => Buffer.from(formatTextRecord(entry), "utf8"),
    options
  );
}

export function createBinarySink(filePath: string, options: FileSinkOptions = {}): Promise<CaptureSink> {
  return createFileSink(
    "binary",
    filePath,
    (entry) => encodeBinaryRecord(entry.frame.direction, entry.frame.data),
    options
  );
}

export interface MemorySink extends CaptureSink {
  readonly entries: CaptureEntry[];
}

/** Keeps entries in memory for inspection. */
export function createMemorySink(name = "memory"): MemorySink {
  const entries: CaptureEntry[] = [];
  return {
    name,
    entries,
    async write(entry: CaptureEntry): Promise<void> {
      entries.push(entry);
    },
    async close(): Promise<void> {},
  };
}
