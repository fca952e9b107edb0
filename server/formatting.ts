export type HourRounding = "floor" | "nearest";

export type TitlePolicy = {
  maxLength: number;
  hourRounding: HourRounding;
};

export type TitleTemplate = "current" | "upcoming";

export const DEFAULT_TITLE_POLICY: TitlePolicy = {
  maxLength: 30,
  hourRounding: "floor",
};

export const END_OF_DAY_SECONDS = 86_399;
const ELLIPSIS = "…";

const WEEKDAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

const MONTH_ABBREVIATIONS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function renderTemplate(template: TitleTemplate, title: string, time: string): string {
  switch (template) {
    case "current":
      return `${title} • ${time} left`;
    case "upcoming":
      return `${title} • in ${time}`;
  }
}

/** Length in Unicode scalar values, so surrogate pairs count once. */
export function charCount(value: string): number {
  return Array.from(value).length;
}

export function formatTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

export function secondsFromMidnight(date: Date): number {
  return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
}

/**
 * All-day events come from the calendar as local midnight through 23:59:59
 * of the same day; there is no separate flag.
 */
export function isAllDay(start: Date, end: Date): boolean {
  return secondsFromMidnight(start) === 0 && secondsFromMidnight(end) === END_OF_DAY_SECONDS;
}

export function wholeMinutes(durationMs: number): number {
  return Math.trunc(durationMs / 60_000);
}

export function formatTimeLabel(minutes: number, rounding: HourRounding = "floor"): string {
  if (minutes <= 60) return `${minutes}m`;
  let hours = Math.floor(minutes / 60);
  if (rounding === "nearest" && minutes % 60 >= 30) hours += 1;
  return `${hours}h`;
}

export function truncateTitle(title: string, maxLength: number): string {
  const chars = Array.from(title);
  if (chars.length <= maxLength) return title;
  if (maxLength <= 0) return "";
  return `${chars.slice(0, maxLength - 1).join("")}${ELLIPSIS}`;
}

export function formatEventTitle(
  title: string,
  durationMs: number,
  template: TitleTemplate,
  policy: TitlePolicy = DEFAULT_TITLE_POLICY
): string {
  const time = formatTimeLabel(wholeMinutes(durationMs), policy.hourRounding);
  const overhead = charCount(renderTemplate(template, "", time));
  const maxTitleLength = Math.max(0, policy.maxLength - overhead);
  return renderTemplate(template, truncateTitle(title, maxTitleLength), time);
}

export function formatDayDate(date: Date): string {
  return `${pad2(date.getDate())} ${MONTH_ABBREVIATIONS[date.getMonth()]}`;
}

export function weekdayName(date: Date): string {
  return WEEKDAY_NAMES[date.getDay()];
}

/** `offset` is the number of days after today, 0 for today itself. */
export function dayLabel(date: Date, offset: number): string {
  if (offset === 0) return "Today";
  if (offset === 1) return "Tomorrow";
  return weekdayName(date);
}
