import net, { type Server, type Socket } from "node:net";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import pino from "pino";
import type { RelayEventBus } from "../src/relay/events.js";
import type { SessionSummary } from "../src/relay/types.js";

export const silentLogger = pino({ level: "silent" });

export interface TestServer {
  server: Server;
  port: number;
  /** Accepted sockets in accept order. */
  sockets: Socket[];
  nextSocket(): Promise<Socket>;
  close(): Promise<void>;
}

/** In-process TCP server on 127.0.0.1 and an ephemeral port. */
export async function startTestServer(onSocket?: (socket: Socket) => void): Promise<TestServer> {
  const sockets: Socket[] = [];
  const waiting: Array<(socket: Socket) => void> = [];
  const server = net.createServer((socket) => {
    socket.on("error", () => {});
    sockets.push(socket);
    onSocket?.(socket);
    waiting.shift()?.(socket);
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server has no port");
  let seen = 0;
  return {
    server,
    port: address.port,
    sockets,
    nextSocket() {
      if (sockets.length > seen) return Promise.resolve(sockets[seen++]);
      return new Promise((resolve) => {
        waiting.push((socket) => {
          seen++;
          resolve(socket);
        });
      });
    },
    close() {
      for (const socket of sockets) socket.destroy();
      return new Promise((resolve) => server.close(() => resolve()));
    },
  };
}

/** Echo server: everything received is written back; ends when the peer ends. */
export function startEchoServer(): Promise<TestServer> {
  return startTestServer((socket) => socket.pipe(socket));
}

/** A port that was free a moment ago; nothing listens on it. */
export async function unusedPort(): Promise<number> {
  const probe = await startTestServer();
  const { port } = probe;
  await probe.close();
  return port;
}

export function connect(port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: "127.0.0.1", port });
    socket.once("connect", () => {
      socket.off("error", reject);
      socket.on("error", () => {});
      resolve(socket);
    });
    socket.once("error", reject);
  });
}

/** Collects everything a socket receives. */
export function collect(socket: Socket): { bytes: () => Buffer; waitFor: (length: number) => Promise<Buffer> } {
  const chunks: Buffer[] = [];
  const waiters: Array<{ length: number; resolve: (data: Buffer) => void }> = [];
  socket.on("data", (chunk: Buffer) => {
    chunks.push(chunk);
    const data = Buffer.concat(chunks);
    for (const waiter of [...waiters]) {
      if (data.length >= waiter.length) {
        waiters.splice(waiters.indexOf(waiter), 1);
        waiter.resolve(data);
      }
    }
  });
  return {
    bytes: () => Buffer.concat(chunks),
    waitFor(length: number) {
      const data = Buffer.concat(chunks);
      if (data.length >= length) return Promise.resolve(data);
      return new Promise((resolve) => waiters.push({ length, resolve }));
    },
  };
}

export function waitForClose(socket: Socket): Promise<void> {
  if (socket.closed) return Promise.resolve();
  return new Promise((resolve) => socket.once("close", () => resolve()));
}

/** Resolves with the first `count` session summaries published on the bus. */
export function sessionEnds(bus: RelayEventBus, count: number): Promise<SessionSummary[]> {
  const summaries: SessionSummary[] = [];
  return new Promise((resolve) => {
    const unsubscribe = bus.subscribe((event) => {
      if (event.type !== "session_end") return;
      summaries.push(event.summary);
      if (summaries.length === count) {
        unsubscribe();
        resolve(summaries);
      }
    });
  });
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), "patchtap-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
