import type { DecodeResult } from "../protocol/envelope.js";
import {
  CaptureClosedError,
  CaptureWriteError,
  errorMessage,
} from "../shared/errors.js";
import { childLogger, type Logger } from "../shared/logging.js";
import { createBinarySink, createTextSink } from "./sinks.js";
import type { CaptureEntry, CaptureSink, Frame } from "./types.js";

/**
 * What to do when a sink write fails.
 * - continue: log once, stop capturing, keep relaying.
 * - halt: reject every record from then on; sessions tear down.
 */
export type CaptureErrorPolicy = "continue" | "halt";

export const CAPTURE_ERROR_POLICIES: readonly CaptureErrorPolicy[] = ["continue", "halt"];

export function isCaptureErrorPolicy(s: string): s is CaptureErrorPolicy {
  return (CAPTURE_ERROR_POLICIES as readonly string[]).includes(s);
}

export interface CaptureLogOptions {
  sinks: CaptureSink[];
  onWriteError?: CaptureErrorPolicy;
  logger?: Logger;
}

export interface CaptureStats {
  records: number;
  bytes: number;
  dropped: number;
  degraded: boolean;
  failure?: string;
}

interface Pending {
  entry: CaptureEntry;
  resolve: () => void;
  reject: (err: unknown) => void;
}

/**
 * Many producers, one writer. Entries are written to every sink in FIFO order
 * and a record is complete in all sinks before the next one starts.
 */
export class CaptureLog {
  private readonly sinks: CaptureSink[];
  private readonly policy: CaptureErrorPolicy;
  private readonly logger: Logger;
  private readonly queue: Pending[] = [];
  private writing = false;
  private closing = false;
  private idleWaiters: Array<() => void> = [];
  private failure: CaptureWriteError | undefined;
  private records = 0;
  private bytes = 0;
  private dropped = 0;

  constructor(options: CaptureLogOptions) {
    this.sinks = options.sinks;
    this.policy = options.onWriteError ?? "continue";
    this.logger = childLogger("capture", options.logger);
  }

  get degraded(): boolean {
    return this.failure !== undefined;
  }

  record(frame: Frame, envelope: DecodeResult): Promise<void> {
    if (this.closing) return Promise.reject(new CaptureClosedError());
    if (this.failure) {
      this.dropped += 1;
      return this.policy === "halt" ? Promise.reject(this.failure) : Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.queue.push({ entry: { frame, envelope }, resolve, reject });
      this.drain();
    });
  }

  stats(): CaptureStats {
    return {
      records: this.records,
      bytes: this.bytes,
      dropped: this.dropped,
      degraded: this.degraded,
      ...(this.failure ? { failure: this.failure.message } : {}),
    };
  }

  /** Stops accepting records, flushes what is queued and closes every sink. */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    await this.idle();
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.close()));
    for (const [i, result] of results.entries()) {
      if (result.status === "rejected") {
        this.logger.error({ sink: this.sinks[i].name, err: result.reason }, "failed to close capture sink");
      }
    }
  }

  private idle(): Promise<void> {
    if (!this.writing && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    if (this.writing) return;
    const next = this.queue.shift();
    if (!next) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const wake of waiters) wake();
      return;
    }
    this.writing = true;
    void this.writeEntry(next).finally(() => {
      this.writing = false;
      this.drain();
    });
  }

  private async writeEntry({ entry, resolve, reject }: Pending): Promise<void> {
    if (this.failure) {
      this.dropped += 1;
      if (this.policy === "halt") reject(this.failure);
      else resolve();
      return;
    }
    for (const sink of this.sinks) {
      try {
        await sink.write(entry);
      } catch (err) {
        this.failure = new CaptureWriteError(
          `Capture sink "${sink.name}" failed: ${errorMessage(err)}`,
          sink.name,
          err
        );
        this.dropped += 1;
        if (this.policy === "halt") {
          this.logger.error({ err, sink: sink.name }, "capture write failed; halting sessions");
          reject(this.failure);
        } else {
          this.logger.error({ err, sink: sink.name }, "capture write failed; continuing as a plain relay");
          resolve();
        }
        return;
      }
    }
    this.records += 1;
    this.bytes += entry.frame.data.length;
    resolve();
  }
}

export interface CaptureConfig {
  enabled: boolean;
  textLog: string;
  binaryLog: string;
  append: boolean;
  fsync: boolean;
  onWriteError: CaptureErrorPolicy;
}

/** Opens the file sinks named by the config. With capture disabled frames are only counted. */
export async function openCaptureLog(config: CaptureConfig, logger?: Logger): Promise<CaptureLog> {
  if (!config.enabled) return new CaptureLog({ sinks: [], logger });
  const fileOptions = { append: config.append, fsync: config.fsync };
  const text = await createTextSink(config.textLog, fileOptions);
  let binary: CaptureSink;
  try {
    binary = await createBinarySink(config.binaryLog, fileOptions);
  } catch (err) {
    await text.close();
    throw err;
  }
  return new CaptureLog({
    sinks: [text, binary],
    onWriteError: config.onWriteError,
    logger,
  });
}
