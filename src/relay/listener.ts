import net from "node:net";
import type { CaptureLog } from "../capture/log.js";
import { ListenError, errorCode, errorMessage } from "../shared/errors.js";
import { genId } from "../shared/ids.js";
import { childLogger, type Logger } from "../shared/logging.js";
import { formatHostPort, type HostPort } from "../shared/net.js";
import type { RelayEventBus } from "./events.js";
import { RelaySession } from "./session.js";

export interface ListenerOptions {
  listen: HostPort;
  upstream: HostPort;
  capture: CaptureLog;
  idleTimeoutMs?: number;
  connectTimeoutMs?: number;
  events?: RelayEventBus;
  logger?: Logger;
}

export interface ListenerHandle {
  host: string;
  /** Bound port; differs from the requested one when listening on port 0. */
  port: number;
  activeSessions(): number;
  /**
   * Stop accepting. Resolves once in-flight sessions have ended on their own;
   * they are not cut short.
   */
  close(): Promise<void>;
  /** Tear down every in-flight session immediately. */
  abort(): void;
}

export function startListener(options: ListenerOptions): Promise<ListenerHandle> {
  const logger = childLogger("listener", options.logger);
  const sessions = new Set<RelaySession>();
  let drainWaiters: Array<() => void> = [];

  const sessionEnded = (session: RelaySession) => {
    sessions.delete(session);
    if (sessions.size > 0) return;
    const waiters = drainWaiters;
    drainWaiters = [];
    for (const wake of waiters) wake();
  };

  const server = net.createServer((client) => {
    const session = new RelaySession({
      id: genId("conn"),
      client,
      upstream: options.upstream,
      capture: options.capture,
      idleTimeoutMs: options.idleTimeoutMs,
      connectTimeoutMs: options.connectTimeoutMs,
      events: options.events,
      logger: options.logger,
    });
    sessions.add(session);
    void session
      .run()
      .catch((err: unknown) => {
        client.destroy();
        logger.error({ sessionId: session.id, err }, "relay session failed unexpectedly");
      })
      .finally(() => sessionEnded(session));
  });

  const drained = (): Promise<void> => {
    if (sessions.size === 0) return Promise.resolve();
    return new Promise((resolve) => drainWaiters.push(resolve));
  };

  return new Promise((resolve, reject) => {
    const onListenError = (err: Error) => {
      reject(
        new ListenError(`Cannot listen on ${formatHostPort(options.listen)}: ${errorMessage(err)}`, errorCode(err))
      );
    };
    server.once("error", onListenError);
    server.listen(options.listen.port, options.listen.host, () => {
      server.off("error", onListenError);
      server.on("error", (err) => logger.error({ err }, "listener error"));

      const address = server.address();
      const port = address && typeof address === "object" ? address.port : options.listen.port;
      logger.info(
        { listen: formatHostPort({ host: options.listen.host, port }), upstream: formatHostPort(options.upstream) },
        "listening"
      );

      resolve({
        host: options.listen.host,
        port,
        activeSessions: () => sessions.size,
        close: async () => {
          if (server.listening) {
            await new Promise<void>((done) => server.close(() => done()));
          }
          await drained();
        },
        abort: () => {
          for (const session of sessions) session.abort();
        },
      });
    });
  });
}
