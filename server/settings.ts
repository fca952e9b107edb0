import fs from "fs";
import path from "path";
import YAML from "yaml";
import { z } from "zod";
import { getSettingsPath } from "./config.js";
import type { TitlePolicy } from "./formatting.js";

export const HOUR_ROUNDING = ["floor", "nearest"] as const;

const DisplaySettingsSchema = z
  .object({
    title_max_length: z.number().int().min(10).max(200).default(30),
    hour_rounding: z.enum(HOUR_ROUNDING).default("floor"),
    refresh_interval_seconds: z.number().int().min(5).max(3600).default(60),
    permission_timeout_seconds: z.number().int().min(1).max(600).default(30),
  })
  .passthrough();

export type DisplaySettings = {
  title_max_length: number;
  hour_rounding: (typeof HOUR_ROUNDING)[number];
  refresh_interval_seconds: number;
  permission_timeout_seconds: number;
};

export type DisplaySettingsResponse = {
  saved: DisplaySettings;
  effective: DisplaySettings;
  env_overrides: {
    title_max_length?: number;
    refresh_interval_seconds?: number;
  };
  source_path: string | null;
};

function defaults(): DisplaySettings {
  return {
    title_max_length: 30,
    hour_rounding: "floor",
    refresh_interval_seconds: 60,
    permission_timeout_seconds: 30,
  };
}

function pick(settings: z.infer<typeof DisplaySettingsSchema>): DisplaySettings {
  return {
    title_max_length: settings.title_max_length,
    hour_rounding: settings.hour_rounding,
    refresh_interval_seconds: settings.refresh_interval_seconds,
    permission_timeout_seconds: settings.permission_timeout_seconds,
  };
}

export function normalizeSettings(value: unknown): DisplaySettings {
  const parsed = DisplaySettingsSchema.safeParse(value ?? {});
  if (parsed.success) return pick(parsed.data);
  const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "(root)");
  console.warn(`[settings] ignoring invalid settings (${fields.join(", ")}); using defaults`);
  return defaults();
}

export function readSettingsFile(filePath: string): DisplaySettings | null {
  if (!fs.existsSync(filePath)) return null;
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    console.warn(
      `[settings] failed to parse ${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`
    );
    return defaults();
  }
  if (parsed !== null && parsed !== undefined && (typeof parsed !== "object" || Array.isArray(parsed))) {
    console.warn(`[settings] ${path.basename(filePath)} must contain a YAML map at the root.`);
    return defaults();
  }
  return normalizeSettings(parsed ?? {});
}

function parseIntOverride(raw: string | undefined, min: number, max: number): number | undefined {
  if (!raw) return undefined;
  const value = Math.trunc(Number(raw));
  if (!Number.isFinite(value) || value < min) return undefined;
  return Math.min(value, max);
}

function applyEnvOverrides(
  settings: DisplaySettings,
  env: NodeJS.ProcessEnv
): Pick<DisplaySettingsResponse, "effective" | "env_overrides"> {
  const title_max_length = parseIntOverride(env.EVENTUALLY_TITLE_MAX_LENGTH, 10, 200);
  const refresh_interval_seconds = parseIntOverride(env.EVENTUALLY_REFRESH_INTERVAL_SECONDS, 5, 3600);
  const env_overrides: DisplaySettingsResponse["env_overrides"] = {};
  if (title_max_length !== undefined) env_overrides.title_max_length = title_max_length;
  if (refresh_interval_seconds !== undefined) {
    env_overrides.refresh_interval_seconds = refresh_interval_seconds;
  }
  return {
    env_overrides,
    effective: {
      ...settings,
      title_max_length: title_max_length ?? settings.title_max_length,
      refresh_interval_seconds: refresh_interval_seconds ?? settings.refresh_interval_seconds,
    },
  };
}

export function getDisplaySettingsResponse(
  filePath: string = getSettingsPath(),
  env: NodeJS.ProcessEnv = process.env
): DisplaySettingsResponse {
  const fromFile = readSettingsFile(filePath);
  const saved = fromFile ?? defaults();
  return {
    saved,
    ...applyEnvOverrides(saved, env),
    source_path: fromFile ? filePath : null,
  };
}

export function toTitlePolicy(settings: DisplaySettings): TitlePolicy {
  return { maxLength: settings.title_max_length, hourRounding: settings.hour_rounding };
}
