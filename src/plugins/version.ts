import { UNKNOWN_VERSION } from "./constants.ts";

export type VersionTuple = readonly [major: number, minor: number, patch: number];

/** Drops one leading non-digit character, as in "v1.2.0" or "r12". */
export function stripVersionPrefix(version: string): string {
  return /^\D/.test(version) ? version.slice(1) : version;
}

function toComponent(digits: string): number {
  const n = Number(digits);
  return Number.isSafeInteger(n) ? n : Number.MAX_SAFE_INTEGER;
}

/**
 * Parses any string into a (major, minor, patch) tuple. Numeric runs are
 * taken in order, missing components are zero and extra ones are dropped,
 * so "" and "garbage" both give (0, 0, 0).
 */
export function parseVersion(version: string): VersionTuple {
  const runs = stripVersionPrefix(version.trim()).match(/\d+/g) ?? [];
  const [major = 0, minor = 0, patch = 0] = runs.slice(0, 3).map(toComponent);
  return [major, minor, patch];
}

/** Lexicographic comparison: negative, zero or positive. */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  for (let i = 0; i < 3; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function isNewerVersion(current: string, candidate: string): boolean {
  return compareVersions(candidate, current) > 0;
}

export function formatVersionDisplay(version: string | undefined): string {
  if (!version || version === UNKNOWN_VERSION) return UNKNOWN_VERSION;
  return version.startsWith("v") ? version : `v${version}`;
}
