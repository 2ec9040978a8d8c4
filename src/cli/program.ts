import { Command } from "commander";
import { DEFAULT_BINARY_LOG, DEFAULT_LISTEN, DEFAULT_TEXT_LOG, DEFAULT_UPSTREAM } from "../shared/constants.js";
import { getPackageJsonVersion } from "./utils.js";
import { runServe } from "./commands/serve.js";
import { runReplay } from "./commands/replay.js";
import { runDecode } from "./commands/decode.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("patchtap")
    .description("Transparent capture proxy for the game patch service protocol")
    .version(getPackageJsonVersion());

  program
    .command("serve", { isDefault: true })
    .description("Relay client connections to the patch server and capture every byte")
    .option("--config <path>", "JSON config file")
    .option("--listen <host:port>", `Listen address (default ${DEFAULT_LISTEN})`)
    .option("--upstream <host:port>", `Real patch server (default ${DEFAULT_UPSTREAM})`)
    .option("--text-log <path>", `Human-readable capture log (default ${DEFAULT_TEXT_LOG})`)
    .option("--binary-log <path>", `Replayable binary capture (default ${DEFAULT_BINARY_LOG})`)
    .option("--append", "Append to existing capture files instead of truncating")
    .option("--fsync", "Sync capture files to disk after every frame")
    .option("--no-capture", "Relay only; count frames but write no capture files")
    .option("--on-capture-error <policy>", "continue (relay without capture) or halt (close sessions)")
    .option("--idle-timeout <ms>", "Close a session after this long without traffic")
    .option("--connect-timeout <ms>", "Upstream connect timeout")
    .option("-q, --quiet", "Do not print a line per captured frame")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info, debug")
    .option("--log-format <format>", "Log format: text, json or plain")
    .action((opts: Record<string, unknown>) => runServe(opts));

  program
    .command("replay <file>")
    .description("Print the frames stored in a binary capture file")
    .option("--json", "One JSON object per frame")
    .option("--limit <n>", "Stop after n frames")
    .action((file: string, opts: { json?: boolean; limit?: string }) => runReplay(file, opts));

  program
    .command("decode <hex...>")
    .description("Decode a request envelope header from hex bytes")
    .action((hex: string[]) => runDecode(hex.join(" ")));

  return program;
}
