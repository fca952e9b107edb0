import { encodeAction } from "./actions.js";
import { resolveIcon } from "./icons.js";
import type { MenuItemRow, MenuRow, RgbColor } from "./types.js";

/** How the menu bar host should invoke this CLI when a row is clicked. */
export type PluginCommand = {
  executable: string;
  args: string[];
};

export const OFFLINE_TITLE = "Eventually offline";
const SECONDARY_COLOR = "#8E8E93";
const ANSI = "\u001b[";
const ANSI_RESET = `${ANSI}0m`;
const ANSI_BOLD = `${ANSI}1m`;
const ANSI_SECONDARY = `${ANSI}90m`;
const ANSI_TERTIARY = `${ANSI}2;90m`;

export function rgbToHex(color: RgbColor): string {
  const hex = color
    .map((channel) => {
      const scaled = Math.round(Math.min(1, Math.max(0, channel)) * 255);
      return scaled.toString(16).padStart(2, "0");
    })
    .join("");
  return `#${hex.toUpperCase()}`;
}

// "|" separates the label from its parameters in the plugin format.
export function escapeLabel(label: string): string {
  return label.replace(/\|/g, "¦").replace(/\r?\n/g, " ");
}

function escapeMarkdown(label: string): string {
  return label.replace(/([*_`])/g, "\\$1");
}

function ansiLabel(label: string, range: readonly [number, number], bold: boolean, dimmed: boolean): string {
  const chars = Array.from(label);
  const [from, to] = range;
  const base = bold ? ANSI_BOLD : "";
  return [
    base,
    chars.slice(0, from).join(""),
    dimmed ? ANSI_TERTIARY : ANSI_SECONDARY,
    chars.slice(from, to).join(""),
    ANSI_RESET,
    base,
    chars.slice(to).join(""),
    bold ? ANSI_RESET : "",
  ].join("");
}

function paramValue(value: string): string {
  return /[\s"]/.test(value) ? `"${value.replace(/"/g, '\\"')}"` : value;
}

function actionParams(row: MenuItemRow, command: PluginCommand): string[] {
  if (!row.action) return [];
  const args = [...command.args, "action", encodeAction(row.action)];
  return [
    `bash=${paramValue(command.executable)}`,
    ...args.map((arg, index) => `param${index + 1}=${paramValue(arg)}`),
    "terminal=false",
    "refresh=true",
  ];
}

export function renderRow(row: MenuRow, command: PluginCommand): string {
  if (row.kind === "separator") return "---";

  const label = escapeLabel(row.label);
  const params: string[] = [];
  let text = label;
  if (row.mutedRange) {
    text = ansiLabel(label, row.mutedRange, row.bold, row.dimmed);
    params.push("ansi=true");
  } else if (row.bold) {
    text = `**${escapeMarkdown(label)}**`;
    params.push("md=true");
  }
  if (row.dimmed) params.push(`color=${SECONDARY_COLOR}`);
  const symbol = resolveIcon(row.icon);
  if (symbol) {
    params.push(`sfimage=${symbol}`);
    if (row.color) params.push(`sfcolor=${rgbToHex(row.color)}`);
  }
  if (row.disabled) params.push("disabled=true");
  if (row.shortcut) params.push(`shortcut=CMD+${row.shortcut.toUpperCase()}`);
  params.push(...actionParams(row, command));

  return params.length ? `${text} | ${params.join(" ")}` : text;
}

export function renderXbar(title: string, rows: readonly MenuRow[], command: PluginCommand): string {
  const lines = [escapeLabel(title), "---", ...rows.map((row) => renderRow(row, command))];
  return `${lines.join("\n")}\n`;
}

export function renderOffline(reason: string): string {
  return `${OFFLINE_TITLE}\n---\n${escapeLabel(reason)} | color=${SECONDARY_COLOR} disabled=true\n`;
}
