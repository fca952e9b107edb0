import type { ServiceInfo, ServiceKind } from "./types.js";

export const SERVICES: Readonly<Record<ServiceKind, ServiceInfo>> = {
  slack: { kind: "slack", name: "Slack", icon: "slack" },
  zoom: { kind: "zoom", name: "Zoom", icon: "zoom" },
  google_meet: { kind: "google_meet", name: "Google Meet", icon: "google" },
  microsoft_teams: { kind: "microsoft_teams", name: "Teams", icon: "teams" },
  generic: { kind: "generic", name: "Video Call", icon: "video" },
};

// Order matters: the first fragment found in the URL wins.
const DOMAIN_FRAGMENTS: ReadonlyArray<readonly [fragment: string, kind: ServiceKind]> = [
  ["slack.com", "slack"],
  ["zoom.us", "zoom"],
  ["meet.google", "google_meet"],
  ["teams.microsoft.com", "microsoft_teams"],
  ["teams.live.com", "microsoft_teams"],
];

export function detectService(url: string): ServiceInfo {
  for (const [fragment, kind] of DOMAIN_FRAGMENTS) {
    if (url.includes(fragment)) return SERVICES[kind];
  }
  return SERVICES.generic;
}

/**
 * Returns the location itself when it is an http(s) link. The prefix is
 * checked on the raw string, so leading whitespace disqualifies it.
 */
export function extractUrl(location: string | null | undefined): string | null {
  if (!location) return null;
  if (location.startsWith("http://") || location.startsWith("https://")) {
    return location;
  }
  return null;
}

export function serviceForLocation(
  location: string | null | undefined
): { url: string; service: ServiceInfo } | null {
  const url = extractUrl(location);
  if (!url) return null;
  return { url, service: detectService(url) };
}
