import chalk from "chalk";
import { ApiError, RetryExhaustedError } from "../api/client.ts";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_AUTH = 3;
export const EXIT_NETWORK = 4;
export const EXIT_NOT_FOUND = 5;

export enum ErrorCode {
  AUTH_FAILED = "AUTH_FAILED",
  RATE_LIMITED = "RATE_LIMITED",
  NOT_FOUND = "NOT_FOUND",
  VALIDATION = "VALIDATION",
  NETWORK = "NETWORK",
  INSTALL_FAILED = "INSTALL_FAILED",
  NO_DEVICE = "NO_DEVICE",
  UNKNOWN = "UNKNOWN",
}

let DEBUG = false;

export function setDebug(value: boolean): void {
  DEBUG = value;
}

export function debug(...args: unknown[]): void {
  if (DEBUG) console.error("[debug]", ...args);
}

export class CliError extends Error {
  code: number;
  errorCode: ErrorCode;
  suggestion?: string;

  constructor(message: string, opts: { code: number; errorCode?: ErrorCode; suggestion?: string }) {
    super(message);
    this.name = "CliError";
    this.code = opts.code;
    this.errorCode = opts.errorCode ?? ErrorCode.UNKNOWN;
    this.suggestion = opts.suggestion;
  }
}

export function wrapApiError(err: unknown): CliError {
  const message = err instanceof Error ? err.message : String(err);

  debug("wrapApiError called with:", message);

  if (err instanceof ApiError) {
    if (err.status === 401) {
      return new CliError("GitHub rejected the configured token.", {
        code: EXIT_AUTH,
        errorCode: ErrorCode.AUTH_FAILED,
        suggestion: "Run `kostore auth <token>` with a valid token, or unset GITHUB_TOKEN.",
      });
    }

    // GitHub answers 403 with a zero remaining quota for anonymous rate limits
    if (err.status === 429 || (err.status === 403 && err.body.includes("rate limit"))) {
      return new CliError("GitHub rate limit exceeded.", {
        code: EXIT_NETWORK,
        errorCode: ErrorCode.RATE_LIMITED,
        suggestion: "Anonymous requests are limited to 60 per hour. Set a token with `kostore auth <token>`.",
      });
    }

    if (err.status === 404) {
      return new CliError("Repository or resource not found on GitHub.", {
        code: EXIT_NOT_FOUND,
        errorCode: ErrorCode.NOT_FOUND,
        suggestion: "Check the owner/repo spelling.",
      });
    }

    if (err.status >= 500) {
      return new CliError("GitHub is experiencing issues. Try again later.", {
        code: EXIT_NETWORK,
        errorCode: ErrorCode.NETWORK,
      });
    }
  }

  if (err instanceof RetryExhaustedError) {
    return new CliError("Network error: could not reach GitHub.", {
      code: EXIT_NETWORK,
      errorCode: ErrorCode.NETWORK,
      suggestion: "Check your internet connection and try again.",
    });
  }

  return new CliError(message, { code: EXIT_FAILURE, errorCode: ErrorCode.UNKNOWN });
}

export function formatCliError(err: CliError): string {
  let out = chalk.red(`Error: ${err.message}`);
  if (DEBUG) {
    out += `\n${chalk.dim(`[${err.errorCode}] exit code: ${err.code}`)}`;
    if (err.stack) {
      out += `\n${chalk.dim(err.stack)}`;
    }
  }
  if (err.suggestion) {
    out += `\n${chalk.yellow("Hint:")} ${err.suggestion}`;
  }
  return out;
}

function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(Math.min((prev[j] ?? 0) + 1, (row[j - 1] ?? 0) + 1, (prev[j - 1] ?? 0) + cost));
    }
    prev = row;
  }

  return prev[b.length] ?? 0;
}

export function didYouMean(input: string, candidates: string[]): string | null {
  let bestMatch: string | null = null;
  let bestDist = Infinity;

  for (const c of candidates) {
    const dist = levenshtein(input.toLowerCase(), c.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      bestMatch = c;
    }
  }

  return bestMatch;
}

export function handleError(err: unknown): never {
  const cliErr = err instanceof CliError ? err : wrapApiError(err);
  debug("handleError:", cliErr.errorCode, cliErr.message);
  console.error(formatCliError(cliErr));
  process.exit(cliErr.code);
}
