import { readFile } from "node:fs/promises";
import { type } from "arktype";
import { isCaptureErrorPolicy, type CaptureConfig } from "./capture/log.js";
import {
  DEFAULT_BINARY_LOG,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_LISTEN,
  DEFAULT_PORT,
  DEFAULT_TEXT_LOG,
  DEFAULT_UPSTREAM,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { ConfigError, errorMessage } from "./shared/errors.js";
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from "./shared/logging.js";
import { parseHostPort, type HostPort } from "./shared/net.js";

const ConfigFileSchema = type({
  "listen?": "string",
  "upstream?": "string",
  "textLog?": "string",
  "binaryLog?": "string",
  "append?": "boolean",
  "fsync?": "boolean",
  "capture?": "boolean",
  "onCaptureError?": "'continue' | 'halt'",
  "idleTimeoutMs?": "number >= 0",
  "connectTimeoutMs?": "number >= 0",
  "logLevel?": "'error' | 'warn' | 'info' | 'debug'",
  "logFormat?": "'text' | 'json' | 'plain'",
});

export type ConfigFile = typeof ConfigFileSchema.infer;

/** Values as they arrive from commander; every field is optional. */
export interface CliOptions {
  config?: string;
  listen?: string;
  upstream?: string;
  textLog?: string;
  binaryLog?: string;
  append?: boolean;
  fsync?: boolean;
  /** commander's --no-capture; only an explicit false has an effect. */
  capture?: boolean;
  onCaptureError?: string;
  idleTimeout?: string;
  connectTimeout?: string;
  logLevel?: string;
  logFormat?: string;
  verbose?: boolean;
}

export interface RelayConfig {
  listen: HostPort;
  upstream: HostPort;
  capture: CaptureConfig;
  /** 0 disables the idle timeout. */
  idleTimeoutMs: number;
  connectTimeoutMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const LISTEN_FALLBACK: HostPort = parseHostPort(DEFAULT_LISTEN, { host: "0.0.0.0", port: DEFAULT_PORT });
const UPSTREAM_FALLBACK: HostPort = parseHostPort(DEFAULT_UPSTREAM, { host: "127.0.0.1", port: DEFAULT_PORT });

export function parseConfigFile(data: unknown): ConfigFile {
  const out = ConfigFileSchema(data);
  if (out instanceof type.errors) throw new ConfigError(`Invalid config file: ${out.summary}`);
  return out;
}

export async function loadConfigFile(filePath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(err)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseConfigFile(data);
}

function parseMillis(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) throw new ConfigError(`${name} must be a non-negative integer (ms), got "${value}"`);
  return parseInt(value, 10);
}

function pickMillis(name: string, cli: string | undefined, env: string | undefined, file: number | undefined, fallback: number): number {
  if (cli !== undefined) return parseMillis(cli, name);
  if (env !== undefined) return parseMillis(env, name);
  return file ?? fallback;
}

/** Precedence: flag, then environment, then config file, then defaults. */
export function resolveConfig(cli: CliOptions, file: ConfigFile = {}): RelayConfig {
  const listen = parseHostPort(cli.listen ?? getEnv("LISTEN") ?? file.listen, LISTEN_FALLBACK);
  const upstream = parseHostPort(cli.upstream ?? getEnv("UPSTREAM") ?? file.upstream, UPSTREAM_FALLBACK);

  const policy = cli.onCaptureError ?? file.onCaptureError ?? "continue";
  if (!isCaptureErrorPolicy(policy)) {
    throw new ConfigError(`--on-capture-error must be "continue" or "halt", got "${policy}"`);
  }

  const logLevel = cli.verbose ? "debug" : (cli.logLevel ?? getEnv("LOG_LEVEL") ?? file.logLevel ?? "info");
  if (!isLogLevel(logLevel)) throw new ConfigError(`Unknown log level "${logLevel}"`);
  const logFormat = cli.logFormat ?? file.logFormat ?? "text";
  if (!isLogFormat(logFormat)) throw new ConfigError(`Unknown log format "${logFormat}"`);

  return {
    listen,
    upstream,
    capture: {
      enabled: cli.capture === false ? false : (file.capture ?? true),
      textLog: cli.textLog ?? getEnv("TEXT_LOG") ?? file.textLog ?? DEFAULT_TEXT_LOG,
      binaryLog: cli.binaryLog ?? getEnv("BINARY_LOG") ?? file.binaryLog ?? DEFAULT_BINARY_LOG,
      append: cli.append ?? file.append ?? false,
      fsync: cli.fsync ?? file.fsync ?? false,
      onWriteError: policy,
    },
    idleTimeoutMs: pickMillis("--idle-timeout", cli.idleTimeout, getEnv("IDLE_TIMEOUT_MS"), file.idleTimeoutMs, 0),
    connectTimeoutMs: pickMillis(
      "--connect-timeout",
      cli.connectTimeout,
      undefined,
      file.connectTimeoutMs,
      DEFAULT_CONNECT_TIMEOUT_MS
    ),
    logLevel,
    logFormat,
  };
}
