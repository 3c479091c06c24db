import { Command } from "commander";
import { DEFAULT_LISTEN } from "../shared/constants.js";
import { runConfigGet, runConfigPath, runConfigSet } from "./commands/config.js";
import { runConnect, type ConnectCommandOptions } from "./commands/connect.js";
import { runServe, type ServeCommandOptions } from "./commands/serve.js";
import {
  getPackageJsonVersion,
  hostPortOption,
  positiveIntOption,
  type GlobalOptions,
} from "./utils.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("tunnel-pump")
    .description("Relay a WebSocket connection to a local process, TCP socket or stdio")
    .version(getPackageJsonVersion())
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info or debug")
    .option("--log-format <format>", "Log format: text, json or plain")
    .option("--data-dir <path>", "Data directory (default ~/.tunnel-pump)")
    .enablePositionalOptions()
    .exitOverride();

  program
    .command("connect")
    .description("Dial a ws:// or wss:// URL and bridge it to a command, a TCP endpoint or stdio")
    .argument("<url>", "WebSocket URL")
    .argument("[command...]", "Command to spawn; its stdin/stdout are relayed")
    .option("--tcp <host:port>", "Relay to a TCP endpoint instead of a command", hostPortOption)
    .option("--token <token>", "Bearer token sent to the server")
    .option("--insecure", "Accept unverifiable TLS certificates")
    .option("--echo", "Echo relayed traffic")
    .option("--tick-ms <ms>", "Read deadline per polling tick", positiveIntOption)
    .option("--timeout-ms <ms>", "Inactivity timeout", positiveIntOption)
    .passThroughOptions()
    .action((url: string, command: string[], _opts: unknown, cmd: Command) =>
      runConnect(url, command, cmd.optsWithGlobals<ConnectCommandOptions>())
    );

  program
    .command("serve")
    .description("Accept WebSocket connections and bridge each to a freshly spawned command")
    .argument("<command...>", "Command to spawn per connection")
    .option("--listen <host:port>", `Listen address (default ${DEFAULT_LISTEN})`)
    .option("--token <token>", "Require this bearer token")
    .option("--echo", "Echo relayed traffic")
    .option("--tick-ms <ms>", "Read deadline per polling tick", positiveIntOption)
    .option("--timeout-ms <ms>", "Inactivity timeout", positiveIntOption)
    .passThroughOptions()
    .action((command: string[], _opts: unknown, cmd: Command) =>
      runServe(command, cmd.optsWithGlobals<ServeCommandOptions>())
    );

  const config = program.command("config").description("Read or change the config file");
  config
    .command("get")
    .argument("<key>")
    .action((key: string, _opts: unknown, cmd: Command) =>
      runConfigGet(key, cmd.optsWithGlobals<GlobalOptions>())
    );
  config
    .command("set")
    .argument("<key>")
    .argument("<value>")
    .action((key: string, value: string, _opts: unknown, cmd: Command) =>
      runConfigSet(key, value, cmd.optsWithGlobals<GlobalOptions>())
    );
  config
    .command("path")
    .action((_opts: unknown, cmd: Command) => runConfigPath(cmd.optsWithGlobals<GlobalOptions>()));

  return program;
}
