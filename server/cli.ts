import { decodeAction } from "./actions.js";
import { describeError } from "./calendar_errors.js";
import { SERVICE_ACTIONS, type ServiceAction } from "./launchd.js";
import { renderOffline } from "./xbar_render.js";

export type CliCommand =
  | { kind: "daemon" }
  | { kind: "service"; action: ServiceAction }
  | { kind: "plugin" }
  | { kind: "action"; payload: string }
  | { kind: "help" };

export type CliDeps = {
  daemonUrl: string;
  runDaemon: () => Promise<number>;
  runService: (action: ServiceAction) => Promise<void>;
  fetch?: typeof fetch;
  out?: (text: string) => void;
  err?: (text: string) => void;
};

const REQUEST_TIMEOUT_MS = 3_000;

export function usage(): string {
  return [
    "eventually - macOS menu bar calendar",
    "",
    "Usage:",
    "  eventually                     Run the status daemon",
    "  eventually service <action>    Manage the launchd agent (install, uninstall, start, stop, restart)",
    "  eventually plugin              Print the menu in SwiftBar/xbar plugin format",
    "  eventually action <payload>    Send a menu action to the running daemon",
    "  eventually --help              Show this message",
  ].join("\n");
}

const LOADER_FLAGS = ["--import", "--loader", "--experimental-loader"];

function isBareSpecifier(specifier: string): boolean {
  return !specifier.startsWith(".") && !specifier.startsWith("/") && !specifier.includes(":");
}

/**
 * The argument vector that re-runs this CLI the way it was started. Loader
 * flags are kept, with bare package names resolved to absolute URLs so the
 * command works from any working directory.
 */
export function selfInvocation(
  execPath: string,
  execArgv: readonly string[],
  entry: string,
  resolveSpecifier: (specifier: string) => string = (specifier) => specifier
): string[] {
  const resolve = (specifier: string) =>
    isBareSpecifier(specifier) ? resolveSpecifier(specifier) : specifier;
  const args: string[] = [];
  for (let index = 0; index < execArgv.length; index += 1) {
    const arg = execArgv[index];
    const next = execArgv[index + 1];
    if (LOADER_FLAGS.includes(arg) && next !== undefined) {
      args.push(arg, resolve(next));
      index += 1;
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq > 0 && LOADER_FLAGS.includes(arg.slice(0, eq))) {
      args.push(`${arg.slice(0, eq)}=${resolve(arg.slice(eq + 1))}`);
      continue;
    }
    args.push(arg);
  }
  return [execPath, ...args, entry];
}

function isServiceAction(value: string): value is ServiceAction {
  return SERVICE_ACTIONS.some((action) => action === value);
}

export function parseArgs(argv: string[]): { ok: true; command: CliCommand } | { ok: false; error: string } {
  const [first, second, ...rest] = argv;
  if (first === undefined) return { ok: true, command: { kind: "daemon" } };
  if (first === "--help" || first === "-h" || first === "help") {
    return { ok: true, command: { kind: "help" } };
  }
  if (first === "service") {
    if (!second) return { ok: false, error: "Missing service action." };
    if (!isServiceAction(second)) return { ok: false, error: `Unknown service action: ${second}` };
    if (rest.length) return { ok: false, error: `Unexpected argument: ${rest[0]}` };
    return { ok: true, command: { kind: "service", action: second } };
  }
  if (first === "plugin") {
    if (second !== undefined) return { ok: false, error: `Unexpected argument: ${second}` };
    return { ok: true, command: { kind: "plugin" } };
  }
  if (first === "action") {
    if (!second) return { ok: false, error: "Missing action payload." };
    if (rest.length) return { ok: false, error: `Unexpected argument: ${rest[0]}` };
    return { ok: true, command: { kind: "action", payload: second } };
  }
  return { ok: false, error: `Unknown command: ${first}` };
}

async function printPlugin(deps: CliDeps, out: (text: string) => void): Promise<number> {
  const doFetch = deps.fetch ?? fetch;
  try {
    const response = await doFetch(`${deps.daemonUrl}/menu.xbar`, {
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) {
      out(renderOffline(`Daemon responded with HTTP ${response.status}`));
      return 0;
    }
    out(await response.text());
  } catch (err) {
    out(renderOffline(`Daemon not reachable at ${deps.daemonUrl} (${describeError(err)})`));
  }
  return 0;
}

async function sendAction(
  payload: string,
  deps: CliDeps,
  err: (text: string) => void
): Promise<number> {
  const decoded = decodeAction(payload);
  if (!decoded.ok) {
    err(decoded.error);
    return 1;
  }
  const doFetch = deps.fetch ?? fetch;
  try {
    const response = await doFetch(`${deps.daemonUrl}/actions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(decoded.data),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!response.ok) {
      const body = await response.text();
      err(`Action failed (HTTP ${response.status}): ${body}`);
      return 1;
    }
  } catch (error) {
    err(`Daemon not reachable at ${deps.daemonUrl}: ${describeError(error)}`);
    return 1;
  }
  return 0;
}

/** Resolves with the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const out = deps.out ?? ((text: string) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`));
  const err = deps.err ?? ((text: string) => console.error(text));

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    err(`${parsed.error}\n\n${usage()}`);
    return 1;
  }

  const { command } = parsed;
  switch (command.kind) {
    case "help":
      out(usage());
      return 0;
    case "daemon":
      return deps.runDaemon();
    case "service":
      try {
        await deps.runService(command.action);
        return 0;
      } catch (error) {
        err(`Command failed: ${describeError(error)}`);
        return 1;
      }
    case "plugin":
      return printPlugin(deps, out);
    case "action":
      return sendAction(command.payload, deps, err);
  }
}
