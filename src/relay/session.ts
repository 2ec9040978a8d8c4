import net, { type Socket } from "node:net";
import type { CaptureLog } from "../capture/log.js";
import { createFrame, type Direction } from "../capture/types.js";
import { decodeFrame } from "../protocol/envelope.js";
import {
  CaptureClosedError,
  CaptureWriteError,
  UpstreamDialError,
  errorCode,
  errorMessage,
} from "../shared/errors.js";
import { childLogger, type Logger } from "../shared/logging.js";
import { formatHostPort, type HostPort } from "../shared/net.js";
import type { RelayEventBus } from "./events.js";
import type { PerDirection, SessionOutcome, SessionSummary } from "./types.js";

export interface RelaySessionOptions {
  id: string;
  /** Accepted socket from the game client. */
  client: Socket;
  upstream: HostPort;
  capture: CaptureLog;
  /** Close both legs after this long without traffic. Off when unset or 0. */
  idleTimeoutMs?: number;
  connectTimeoutMs?: number;
  events?: RelayEventBus;
  logger?: Logger;
}

/**
 * graceful: pending writes are flushed before the sockets close (peer EOF).
 * abort: both sockets are destroyed immediately.
 */
type TeardownMode = "graceful" | "abort";

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  return Buffer.from(String(chunk), "latin1");
}

function waitForDrain(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      socket.off("drain", done);
      socket.off("close", done);
      resolve();
    };
    socket.on("drain", done);
    socket.on("close", done);
  });
}

function waitForClose(socket: Socket): Promise<void> {
  if (socket.closed) return Promise.resolve();
  return new Promise((resolve) => socket.once("close", () => resolve()));
}

function remoteOf(socket: Socket): string {
  const { remoteAddress, remotePort } = socket;
  if (!remoteAddress || remotePort === undefined) return "unknown";
  return formatHostPort({ host: remoteAddress, port: remotePort });
}

/**
 * One client connection and its upstream twin. Each direction is pumped by its
 * own loop: read a chunk, record it, write it unchanged, read the next.
 */
export class RelaySession {
  readonly id: string;
  private readonly client: Socket;
  private readonly upstream: HostPort;
  private readonly capture: CaptureLog;
  private readonly idleTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly events?: RelayEventBus;
  private readonly logger: Logger;
  private readonly remote: string;
  private readonly startedAt = Date.now();
  private readonly bytes: PerDirection<number> = { "client->server": 0, "server->client": 0 };
  private readonly frames: PerDirection<number> = { "client->server": 0, "server->client": 0 };
  private upstreamSocket: Socket | undefined;
  private teardownMode: TeardownMode | undefined;
  private outcome: SessionOutcome = "closed";
  private failure: unknown;
  private running: Promise<SessionSummary> | undefined;

  constructor(options: RelaySessionOptions) {
    this.id = options.id;
    this.client = options.client;
    this.upstream = options.upstream;
    this.capture = options.capture;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 0;
    this.events = options.events;
    this.remote = remoteOf(options.client);
    this.logger = childLogger("relay", options.logger).child({ sessionId: this.id });
    // Attached before anything else so an early reset cannot crash the process.
    this.client.on("error", (err) => this.onSocketError("client", err));
  }

  run(): Promise<SessionSummary> {
    this.running ??= this.execute();
    return this.running;
  }

  /** Destroy both legs now. Used for forced shutdown. */
  abort(): void {
    this.teardown("abort", "aborted");
  }

  private async execute(): Promise<SessionSummary> {
    this.logger.info({ remote: this.remote }, "client connected");
    this.events?.publish({ type: "session_start", sessionId: this.id, remote: this.remote });

    let upstream: Socket;
    try {
      upstream = await this.dial();
    } catch (err) {
      this.client.destroy();
      if (this.teardownMode) return this.finish(this.outcome, this.failure);
      this.logger.warn({ upstream: formatHostPort(this.upstream), err: errorMessage(err) }, "upstream dial failed");
      return this.finish("dial-failed", err);
    }

    upstream.on("error", (err) => this.onSocketError("upstream", err));
    if (this.teardownMode) {
      upstream.destroy();
      await Promise.all([waitForClose(this.client), waitForClose(upstream)]);
      return this.finish(this.outcome, this.failure);
    }

    this.logger.info({ upstream: formatHostPort(this.upstream) }, "upstream connected");
    this.events?.publish({
      type: "upstream_connected",
      sessionId: this.id,
      upstream: formatHostPort(this.upstream),
    });

    if (this.idleTimeoutMs > 0) {
      for (const socket of [this.client, upstream]) {
        socket.setTimeout(this.idleTimeoutMs);
        socket.on("timeout", () => this.teardown("abort", "idle-timeout"));
      }
    }

    await Promise.all([
      this.pump("client->server", this.client, upstream),
      this.pump("server->client", upstream, this.client),
    ]);
    await Promise.all([waitForClose(this.client), waitForClose(upstream)]);
    return this.finish(this.outcome, this.failure);
  }

  private dial(): Promise<Socket> {
    const { host, port } = this.upstream;
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port });
      this.upstreamSocket = socket;
      const timer =
        this.connectTimeoutMs > 0
          ? setTimeout(() => {
              socket.destroy();
              reject(new UpstreamDialError(`Timed out after ${this.connectTimeoutMs} ms`, "ETIMEDOUT"));
            }, this.connectTimeoutMs)
          : undefined;
      const cleanup = () => {
        clearTimeout(timer);
        socket.off("connect", onConnect);
        socket.off("error", onError);
        socket.off("close", onClose);
      };
      const onConnect = () => {
        cleanup();
        resolve(socket);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(new UpstreamDialError(err.message, errorCode(err)));
      };
      const onClose = () => {
        cleanup();
        reject(new UpstreamDialError("Closed before the connection was established"));
      };
      socket.on("connect", onConnect);
      socket.on("error", onError);
      socket.on("close", onClose);
    });
  }

  private async pump(direction: Direction, source: Socket, target: Socket): Promise<void> {
    let sequence = 0;
    try {
      for await (const chunk of source) {
        if (this.teardownMode === "abort") break;
        const data = toBuffer(chunk);
        const frame = createFrame(this.id, direction, sequence++, data);
        const envelope = decodeFrame(frame);
        this.frames[direction] += 1;
        this.bytes[direction] += data.length;
        this.events?.publish({ type: "frame", sessionId: this.id, frame, envelope });

        await this.capture.record(frame, envelope);

        if (target.destroyed || target.writableEnded) break;
        if (!target.write(data)) await waitForDrain(target);
      }
      this.teardown("graceful", "closed");
    } catch (err) {
      if (err instanceof CaptureWriteError || err instanceof CaptureClosedError) {
        this.teardown("abort", "capture-halted", err);
      } else if (!this.teardownMode) {
        this.teardown("abort", "error", err);
      }
    }
  }

  private onSocketError(leg: "client" | "upstream", err: Error): void {
    if (this.teardownMode) {
      this.logger.debug({ leg, code: errorCode(err) }, "socket error after teardown");
      return;
    }
    this.logger.info({ leg, code: errorCode(err), err: err.message }, "connection reset");
    this.teardown("abort", "error", err);
  }

  /** First caller wins; later calls are no-ops. */
  private teardown(mode: TeardownMode, outcome: SessionOutcome, err?: unknown): void {
    if (this.teardownMode) return;
    this.teardownMode = mode;
    this.outcome = outcome;
    this.failure = err;
    for (const socket of [this.client, this.upstreamSocket]) {
      if (!socket || socket.destroyed) continue;
      socket.setTimeout(0);
      if (mode === "abort") socket.destroy();
      else socket.end(() => socket.destroy());
    }
  }

  private finish(outcome: SessionOutcome, err: unknown): SessionSummary {
    const summary: SessionSummary = {
      id: this.id,
      outcome,
      remote: this.remote,
      upstream: formatHostPort(this.upstream),
      bytes: { ...this.bytes },
      frames: { ...this.frames },
      startedAt: this.startedAt,
      endedAt: Date.now(),
      ...(err !== undefined ? { error: errorMessage(err) } : {}),
    };
    if (outcome === "capture-halted") this.logger.error({ summary }, "session halted: capture unavailable");
    else if (outcome !== "dial-failed") this.logger.info({ summary }, "session closed");
    this.events?.publish({ type: "session_end", sessionId: this.id, summary });
    return summary;
  }
}
