import chalk from "chalk";
import { getDataDir, readConfig, resolveSettings } from "../../config.js";
import { EXIT, errorMessage, exit } from "../../shared/errors.js";
import { initLogger } from "../../shared/logging.js";
import { parseListen } from "../../shared/net.js";
import { startTunnelServer, type ServerHandle } from "../../server/server.js";
import { getPackageJsonVersion, splitCommand, type GlobalOptions } from "../utils.js";

export interface ServeCommandOptions extends GlobalOptions {
  listen?: string;
  token?: string;
  echo?: boolean;
  tickMs?: number;
  timeoutMs?: number;
}

function printBanner(handle: ServerHandle, command: string[], hasToken: boolean): void {
  const rule = "───────────────────────────────────────────────────────────────\n";
  process.stderr.write("\n");
  process.stderr.write(chalk.bold("tunnel-pump") + "\n");
  process.stderr.write(rule);
  process.stderr.write(`Version:     v${getPackageJsonVersion()}\n`);
  process.stderr.write(`Listening:   ws://${handle.host}:${handle.port}\n`);
  process.stderr.write(`Command:     ${command.join(" ")}\n`);
  process.stderr.write(`Auth:        ${hasToken ? "bearer token" : "none"}\n`);
  process.stderr.write(rule + "\n");
}

export async function runServe(command: string[], opts: ServeCommandOptions): Promise<void> {
  const settings = resolveSettings(opts, await readConfig(getDataDir(opts.dataDir)));
  initLogger(opts.verbose ? "debug" : settings.logLevel, settings.logFormat);

  const target = splitCommand(command);
  if (!target) {
    exit(EXIT.INVALID_ARGS, "serve needs a command to spawn for each connection");
  }
  const { host, port } = parseListen(settings.listen);

  let handle: ServerHandle;
  try {
    handle = await startTunnelServer({
      host,
      port,
      command: target.cmd,
      args: target.args,
      envAllowlist: settings.childEnv,
      token: settings.token,
      bridge: {
        tickMs: settings.tickMs,
        inactivityTimeoutMs: settings.inactivityTimeoutMs,
        echo: settings.echo,
      },
    });
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "EADDRINUSE") {
      exit(
        EXIT.SERVER_FAILURE,
        `Cannot listen on ${host}:${port} (EADDRINUSE). Choose a different port with --listen ${host}:<port>`
      );
    }
    exit(EXIT.SERVER_FAILURE, `Cannot start server: ${errorMessage(err)}`);
  }

  printBanner(handle, command, settings.token !== undefined);

  await new Promise<void>((_, reject) => {
    const closeAll = () =>
      handle
        .close()
        .then(() => process.exit(EXIT.SUCCESS))
        .catch(reject);
    process.on("SIGINT", closeAll);
    process.on("SIGTERM", closeAll);
  });
}
