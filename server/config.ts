import fs from "fs";
import os from "os";
import path from "path";

const VERSION = resolveVersion();
const TRUE_ENV_VALUES = new Set(["1", "true", "yes", "on"]);

export const SERVICE_ID = "io.eventually.menubar";

function trimEnvValue(value: string | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed || null;
}

export function parseNumberEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function isTruthyEnv(value: string | undefined): boolean {
  if (!value) return false;
  return TRUE_ENV_VALUES.has(value.trim().toLowerCase());
}

function resolveVersion(): string {
  const npmVersion = (process.env.npm_package_version || "").trim();
  if (npmVersion) return npmVersion;
  try {
    const pkgPath = path.join(process.cwd(), "package.json");
    const parsed = JSON.parse(fs.readFileSync(pkgPath, "utf8")) as { version?: unknown };
    if (typeof parsed.version === "string" && parsed.version.trim()) {
      return parsed.version.trim();
    }
  } catch {
    // not run from the package root
  }
  return "unknown";
}

export function getAppVersion(): string {
  return VERSION;
}

export function getHomeDir(): string {
  return trimEnvValue(process.env.EVENTUALLY_HOME) ?? os.homedir();
}

export function getServerPort(): number {
  return parseNumberEnv(process.env.EVENTUALLY_PORT, 4317);
}

export function getServerHost(): string {
  return trimEnvValue(process.env.EVENTUALLY_HOST) ?? "127.0.0.1";
}

export function getAllowLan(): boolean {
  return isTruthyEnv(process.env.EVENTUALLY_ALLOW_LAN);
}

export function getDaemonUrl(): string {
  const host = getServerHost();
  const reachable = host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host;
  return `http://${reachable}:${getServerPort()}`;
}

export function getSettingsPath(): string {
  const raw = trimEnvValue(process.env.EVENTUALLY_CONFIG_PATH);
  if (raw) return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
  return path.join(getHomeDir(), ".config", "eventually", "config.yml");
}
