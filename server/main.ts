#!/usr/bin/env node
import path from "path";
import { fileURLToPath } from "url";
import { runCli, selfInvocation } from "./cli.js";
import { getDaemonUrl, getHomeDir, SERVICE_ID } from "./config.js";
import { runDaemon } from "./daemon.js";
import { LaunchAgentService } from "./launchd.js";

process.on("unhandledRejection", (err) => {
  // eslint-disable-next-line no-console
  console.error("eventually unhandledRejection:", err);
  process.exit(1);
});

const entry = process.argv[1] ? path.resolve(process.argv[1]) : fileURLToPath(import.meta.url);
const programArguments = selfInvocation(process.execPath, process.execArgv, entry, (specifier) =>
  import.meta.resolve(specifier)
);
const [executable, ...pluginArgs] = programArguments;

process.exitCode = await runCli(process.argv.slice(2), {
  daemonUrl: getDaemonUrl(),
  runDaemon: () => runDaemon({ pluginCommand: { executable, args: pluginArgs } }),
  runService: (action) =>
    new LaunchAgentService({
      label: SERVICE_ID,
      homeDir: getHomeDir(),
      programArguments,
    }).execute(action),
});
