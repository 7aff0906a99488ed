import chalk from "chalk";
import type { RepoType, UpdateType } from "../plugins/types.ts";

export const NAME_WIDTH = 32;
export const TYPE_WIDTH = 8;
export const STARS_WIDTH = 7;

export function getDescriptionWidth(): number {
  const cols = process.stdout.columns || 80;
  const fixed = NAME_WIDTH + 1 + TYPE_WIDTH + 1 + STARS_WIDTH + 1;
  return Math.max(20, cols - fixed);
}

export function padEnd(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, "");
  const pad = Math.max(0, len - stripped.length);
  return str + " ".repeat(pad);
}

export function truncate(str: string, maxLen: number): string {
  return str.length > maxLen ? str.slice(0, maxLen - 1) + "..." : str;
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/** `2025-03-01T12:00:00Z` -> `2025-03-01`; anything unparsable passes through. */
export function formatDate(iso: string): string {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? iso : new Date(ms).toISOString().slice(0, 10);
}

export function repoTypeLabel(type: RepoType): string {
  return type === "plugin" ? chalk.cyan("plugin") : chalk.magenta("patch");
}

export function updateTypeColor(type: UpdateType): (text: string) => string {
  switch (type) {
    case "release": return chalk.green;
    case "commit": return chalk.yellow;
    case "repository": return chalk.dim;
  }
}
