import type { Command } from "commander";
import chalk from "chalk";
import { GitHubClient } from "../api/github.ts";
import { getDevicePath, getNetworkConfig, getSearchConfig, getToken } from "../config/index.ts";
import { buildCatalog, type CatalogResult } from "../plugins/catalog.ts";
import { DeviceLibrary, detectDevice, validateInstallation } from "../plugins/device.ts";
import type { Task } from "../plugins/task.ts";
import { CliError, ErrorCode, EXIT_USAGE } from "../utils/errors.ts";

export interface GlobalOpts {
  device?: string;
  debug?: boolean;
}

export function createClient(): GitHubClient {
  const network = getNetworkConfig();
  return new GitHubClient({
    token: getToken(),
    timeoutMs: network.timeout * 1000,
    downloadTimeoutMs: network.download_timeout * 1000,
    maxRetries: network.retry_count,
  });
}

/** `--device`, then the configured path, then auto-detection. */
export function resolveLibrary(program: Command): DeviceLibrary {
  const { device } = program.opts<GlobalOpts>();
  const path = device ?? getDevicePath() ?? detectDevice();
  if (!path) {
    throw new CliError("No KOReader device found.", {
      code: EXIT_USAGE,
      errorCode: ErrorCode.NO_DEVICE,
      suggestion: "Connect your e-reader, pass --device <path>, or run `kostore device --save`.",
    });
  }
  if (!validateInstallation(path)) {
    console.error(chalk.yellow(`Warning: ${path} does not look like a KOReader installation.`));
  }
  return new DeviceLibrary(path);
}

export function parseRepoRef(ref: string): { owner: string; repo: string } {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(ref.trim());
  if (!match?.[1] || !match[2]) {
    throw new CliError(`Invalid repository "${ref}".`, {
      code: EXIT_USAGE,
      errorCode: ErrorCode.VALIDATION,
      suggestion: "Use the owner/repo form, e.g. someone/example.koplugin.",
    });
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Prints progress events to stderr and returns the task's value. A failed
 * task rethrows its original error so `handleError` can classify it.
 */
export async function runTask<T>(task: Task<T>): Promise<T> {
  for await (const event of task.events) {
    if (event.type === "progress") {
      console.error(chalk.dim(event.message));
    }
  }
  const result = await task.done;
  if (result.type === "failure") throw result.cause;
  return result.value;
}

export async function loadCatalog(
  client: GitHubClient,
  progress: (message: string) => void,
  deep = false,
): Promise<CatalogResult> {
  const search = getSearchConfig();
  return buildCatalog(client, {
    topics: search.topics,
    namePatterns: search.name_patterns,
    deep,
    onProgress: progress,
  });
}

export function reportQueryFailures(result: CatalogResult): void {
  for (const failure of result.failures) {
    console.error(chalk.yellow(`Search "${failure.query}" failed: ${failure.reason}`));
  }
}
