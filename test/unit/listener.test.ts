import { describe, it, expect, afterEach } from "vitest";
import path from "node:path";
import { CaptureLog } from "../../src/capture/log.js";
import { readBinaryCapture } from "../../src/capture/replay.js";
import { createBinarySink, createMemorySink, createTextSink } from "../../src/capture/sinks.js";
import { RelayEventBus } from "../../src/relay/events.js";
import { startListener, type ListenerHandle } from "../../src/relay/listener.js";
import { ListenError } from "../../src/shared/errors.js";
import {
  collect,
  connect,
  sessionEnds,
  silentLogger,
  startEchoServer,
  startTestServer,
  waitForClose,
  withTempDir,
  type TestServer,
} from "../helpers.js";

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanups.length) await cleanups.pop()?.();
});

async function listen(
  upstream: TestServer,
  capture: CaptureLog,
  events = new RelayEventBus()
): Promise<ListenerHandle> {
  const handle = await startListener({
    listen: { host: "127.0.0.1", port: 0 },
    upstream: { host: "127.0.0.1", port: upstream.port },
    capture,
    events,
    logger: silentLogger,
  });
  cleanups.push(async () => {
    handle.abort();
    await handle.close();
  });
  return handle;
}

async function echoUpstream(): Promise<TestServer> {
  const server = await startEchoServer();
  cleanups.push(() => server.close());
  return server;
}

function shuffled<T>(items: T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

describe("startListener", () => {
  it("binds an ephemeral port when asked for port 0", async () => {
    const upstream = await echoUpstream();
    const handle = await listen(upstream, new CaptureLog({ sinks: [], logger: silentLogger }));
    expect(handle.host).toBe("127.0.0.1");
    expect(handle.port).toBeGreaterThan(0);
    expect(handle.activeSessions()).toBe(0);
  });

  it("rejects with ListenError when the port is taken", async () => {
    const occupied = await startTestServer();
    cleanups.push(() => occupied.close());
    const error = await startListener({
      listen: { host: "127.0.0.1", port: occupied.port },
      upstream: { host: "127.0.0.1", port: occupied.port },
      capture: new CaptureLog({ sinks: [] }),
      logger: silentLogger,
    }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ListenError);
    expect(error).toMatchObject({ code: "EADDRINUSE" });
    expect(String(error)).toContain(`Cannot listen on 127.0.0.1:${occupied.port}`);
  });

  it("keeps concurrent sessions apart and writes one consistent capture", async () => {
    await withTempDir(async (dir) => {
      const upstream = await echoUpstream();
      const memory = createMemorySink();
      const binaryPath = path.join(dir, "traffic.bin");
      const capture = new CaptureLog({
        sinks: [
          await createTextSink(path.join(dir, "traffic.log")),
          await createBinarySink(binaryPath),
          memory,
        ],
        logger: silentLogger,
      });
      const events = new RelayEventBus();
      const handle = await listen(upstream, capture, events);
      const count = 50;
      const ended = sessionEnds(events, count);

      const clients = await Promise.all(
        Array.from({ length: count }, async (_, i) => {
          const socket = await connect(handle.port);
          const received = collect(socket);
          const payload = Buffer.from(`client-${i}:`.padEnd(40, String.fromCharCode(65 + (i % 26))));
          socket.write(payload);
          return { socket, received, payload };
        })
      );
      for (const { received, payload } of clients) {
        expect(await received.waitFor(payload.length)).toEqual(payload);
      }

      for (const { socket } of shuffled(clients)) socket.end();
      await Promise.all(clients.map(({ socket }) => waitForClose(socket)));
      const summaries = await ended;
      expect(summaries.every((s) => s.outcome === "closed")).toBe(true);

      // The listener is still usable after the burst.
      const late = await connect(handle.port);
      const lateReceived = collect(late);
      late.write("late");
      expect((await lateReceived.waitFor(4)).toString()).toBe("late");
      late.end();
      await waitForClose(late);

      await handle.close();
      await capture.close();
      expect(handle.activeSessions()).toBe(0);

      const { records, trailing } = await readBinaryCapture(binaryPath);
      expect(trailing).toBe(0);
      expect(records.map((r) => [r.direction, r.data.toString("hex")])).toEqual(
        memory.entries.map((e) => [e.frame.direction, e.frame.data.toString("hex")])
      );

      const byConnection = new Map<string, { up: Buffer[]; down: Buffer[] }>();
      for (const { frame } of memory.entries) {
        const streams = byConnection.get(frame.connectionId) ?? { up: [], down: [] };
        (frame.direction === "client->server" ? streams.up : streams.down).push(frame.data);
        byConnection.set(frame.connectionId, streams);
      }
      expect(byConnection.size).toBe(count + 1);
      const sent = new Set([...clients.map((c) => c.payload.toString()), "late"]);
      for (const { up, down } of byConnection.values()) {
        const upText = Buffer.concat(up).toString();
        expect(sent.has(upText)).toBe(true);
        expect(Buffer.concat(down).toString()).toBe(upText);
        sent.delete(upText);
      }
      expect(sent.size).toBe(0);
    });
  });

  it("one upstream dropping does not disturb another session", async () => {
    const upstream = await startTestServer();
    cleanups.push(() => upstream.close());
    const handle = await listen(upstream, new CaptureLog({ sinks: [], logger: silentLogger }));

    const first = await connect(handle.port);
    const firstServer = await upstream.nextSocket();
    const second = await connect(handle.port);
    const secondServer = await upstream.nextSocket();
    const atSecondServer = collect(secondServer);

    firstServer.destroy();
    await waitForClose(first);

    second.write("alive");
    expect((await atSecondServer.waitFor(5)).toString()).toBe("alive");
    second.end();
  });

  it("close waits for open sessions to finish on their own", async () => {
    const upstream = await echoUpstream();
    const events = new RelayEventBus();
    const handle = await listen(upstream, new CaptureLog({ sinks: [], logger: silentLogger }), events);
    const client = await connect(handle.port);
    const echoed = collect(client);
    client.write("x");
    await echoed.waitFor(1);

    let closed = false;
    const closing = handle.close().then(() => {
      closed = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(closed).toBe(false);
    expect(handle.activeSessions()).toBe(1);

    client.end();
    await closing;
    expect(handle.activeSessions()).toBe(0);
  });

  it("abort tears down every open session", async () => {
    const upstream = await echoUpstream();
    const events = new RelayEventBus();
    const handle = await listen(upstream, new CaptureLog({ sinks: [], logger: silentLogger }), events);
    const ended = sessionEnds(events, 2);
    const a = await connect(handle.port);
    const b = await connect(handle.port);
    const echoA = collect(a);
    const echoB = collect(b);
    a.write("a");
    b.write("b");
    await Promise.all([echoA.waitFor(1), echoB.waitFor(1)]);

    const closing = handle.close();
    handle.abort();
    await closing;
    await Promise.all([waitForClose(a), waitForClose(b)]);
    expect((await ended).map((s) => s.outcome)).toEqual(["aborted", "aborted"]);
  });
});
