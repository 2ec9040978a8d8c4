import chalk from "chalk";
import { openCaptureLog, type CaptureLog } from "../../capture/log.js";
import { DIRECTION_TAGS } from "../../capture/types.js";
import { loadConfigFile, resolveConfig, type CliOptions, type RelayConfig } from "../../config.js";
import { describeEnvelope } from "../../protocol/envelope.js";
import { RelayEventBus } from "../../relay/events.js";
import { startListener, type ListenerHandle } from "../../relay/listener.js";
import { CONSOLE_PREFIX_BYTES } from "../../shared/constants.js";
import { ConfigError, EXIT, errorMessage, exit } from "../../shared/errors.js";
import { initLogger, type Logger } from "../../shared/logging.js";
import { formatHostPort } from "../../shared/net.js";
import { getPackageJsonVersion } from "../utils.js";

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

export function toCliOptions(opts: Record<string, unknown>): CliOptions {
  return {
    config: str(opts.config),
    listen: str(opts.listen),
    upstream: str(opts.upstream),
    textLog: str(opts.textLog),
    binaryLog: str(opts.binaryLog),
    append: bool(opts.append),
    fsync: bool(opts.fsync),
    capture: bool(opts.capture),
    onCaptureError: str(opts.onCaptureError),
    idleTimeout: str(opts.idleTimeout),
    connectTimeout: str(opts.connectTimeout),
    logLevel: str(opts.logLevel),
    logFormat: str(opts.logFormat),
    verbose: bool(opts.verbose),
  };
}

function printBanner(config: RelayConfig, handle: ListenerHandle): void {
  const listen = formatHostPort({ host: handle.host, port: handle.port });
  const capture = config.capture.enabled
    ? `${config.capture.textLog}, ${config.capture.binaryLog}`
    : "disabled (relay only)";
  process.stderr.write("\n");
  process.stderr.write(chalk.bold("patchtap") + ` v${getPackageJsonVersion()}\n`);
  process.stderr.write("───────────────────────────────────────────────────────────────\n");
  process.stderr.write(`Listening:   ${listen}\n`);
  process.stderr.write(`Upstream:    ${formatHostPort(config.upstream)}\n`);
  process.stderr.write(`Capture:     ${capture}\n`);
  process.stderr.write(`On failure:  ${config.capture.onWriteError}\n`);
  process.stderr.write(`Idle limit:  ${config.idleTimeoutMs > 0 ? `${config.idleTimeoutMs} ms` : "none"}\n`);
  process.stderr.write("\nNext:\n");
  process.stderr.write(`  - Point the patch server hostname at this machine (e.g. /etc/hosts)\n`);
  process.stderr.write(`  - Start the launcher; Ctrl+C stops accepting, twice forces\n`);
  process.stderr.write("───────────────────────────────────────────────────────────────\n\n");
}

function printFrames(events: RelayEventBus, logger: Logger): void {
  events.subscribe((event) => {
    if (event.type !== "frame") return;
    const { frame, envelope } = event;
    logger.info(
      {
        sessionId: event.sessionId,
        seq: frame.sequence,
        head: frame.data.subarray(0, CONSOLE_PREFIX_BYTES).toString("hex"),
        ...(envelope.kind === "envelope" ? { envelope: describeEnvelope(envelope) } : {}),
      },
      `${DIRECTION_TAGS[frame.direction]}: ${frame.data.length} bytes`
    );
  });
}

/** First signal drains in-flight sessions; a second one tears them down. */
function waitForShutdown(handle: ListenerHandle, capture: CaptureLog, logger: Logger): Promise<void> {
  return new Promise((resolve, reject) => {
    let stopping = false;
    const onSignal = () => {
      if (stopping) {
        logger.warn({ active: handle.activeSessions() }, "forcing shutdown");
        handle.abort();
        return;
      }
      stopping = true;
      logger.info(
        { active: handle.activeSessions() },
        "no longer accepting; waiting for open sessions (signal again to force)"
      );
      handle
        .close()
        .then(() => capture.close())
        .then(resolve, reject);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export async function runServe(opts: Record<string, unknown>): Promise<void> {
  const cli = toCliOptions(opts);
  let config: RelayConfig;
  try {
    const file = cli.config ? await loadConfigFile(cli.config) : {};
    config = resolveConfig(cli, file);
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`);
      exit(EXIT.INVALID_ARGS);
    }
    throw err;
  }

  const logger = initLogger(config.logLevel, config.logFormat);

  let capture: CaptureLog;
  try {
    capture = await openCaptureLog(config.capture, logger);
  } catch (err) {
    exit(EXIT.CAPTURE_FAILURE, `Cannot open capture files: ${errorMessage(err)}`);
  }

  const events = new RelayEventBus();
  if (opts.quiet !== true) printFrames(events, logger);

  let handle: ListenerHandle;
  try {
    handle = await startListener({
      listen: config.listen,
      upstream: config.upstream,
      capture,
      idleTimeoutMs: config.idleTimeoutMs,
      connectTimeoutMs: config.connectTimeoutMs,
      events,
      logger,
    });
  } catch (err) {
    await capture.close();
    exit(EXIT.LISTEN_FAILURE, errorMessage(err));
  }

  printBanner(config, handle);
  await waitForShutdown(handle, capture, logger);

  const stats = capture.stats();
  logger.info({ ...stats }, "capture closed");
  exit(stats.degraded ? EXIT.CAPTURE_FAILURE : EXIT.SUCCESS);
}
