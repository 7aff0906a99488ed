import type { RemoteRepositoryClient } from "../api/github.ts";
import type { SearchRepo } from "../api/types.ts";
import { judgeUnseen, toRawCandidate } from "./classifier.ts";
import { locatePlugin } from "./locator.ts";
import { errorMessage } from "./strategy.ts";
import { fetchRemoteTree } from "./tree.ts";
import type { RawCandidate, RemoteCandidate } from "./types.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("catalog");

export interface CatalogOptions {
  topics: readonly string[];
  namePatterns: readonly string[];
  /** Run the structure check on plugin candidates the cheap filter rejected. */
  deep?: boolean;
  onProgress?: (message: string) => void;
}

export interface QueryFailure {
  query: string;
  reason: string;
}

export interface CatalogResult {
  catalog: RemoteCandidate[];
  failures: QueryFailure[];
}

export function buildQueries(topics: readonly string[], namePatterns: readonly string[]): string[] {
  return [...topics.map((t) => `topic:${t}`), ...namePatterns.map((p) => `${p} in:name`)];
}

/**
 * Expensive acceptance: lists the repository root and its first-level
 * directories and runs the locator over the result. Any listing error counts
 * as "no structure".
 */
export async function hasPluginStructure(
  client: RemoteRepositoryClient,
  owner: string,
  repo: string,
): Promise<boolean> {
  try {
    const tree = await fetchRemoteTree(client, owner, repo, { depth: 1 });
    return locatePlugin(tree) !== null;
  } catch (err) {
    log.debug(`Structure check failed for ${owner}/${repo}: ${errorMessage(err)}`);
    return false;
  }
}

/**
 * Runs every query, deduplicating by repository id across queries. A failing
 * query is recorded in `failures` and the remaining queries still run.
 */
export async function buildCatalog(client: RemoteRepositoryClient, opts: CatalogOptions): Promise<CatalogResult> {
  const seen = new Set<number>();
  const catalog: RemoteCandidate[] = [];
  const failures: QueryFailure[] = [];
  const rejected: RawCandidate[] = [];

  for (const query of buildQueries(opts.topics, opts.namePatterns)) {
    opts.onProgress?.(`Searching ${query}...`);
    let items: SearchRepo[];
    try {
      items = await client.searchRepositories(query);
    } catch (err) {
      const reason = errorMessage(err);
      log.warn(`Search failed for "${query}": ${reason}`);
      failures.push({ query, reason });
      continue;
    }

    let added = 0;
    for (const verdict of judgeUnseen(items.map(toRawCandidate), seen)) {
      if (verdict.admitted) {
        catalog.push(verdict.candidate);
        added++;
      } else if (verdict.repoType === "plugin") {
        rejected.push(verdict.candidate);
      }
    }
    log.info(`"${query}": ${items.length} results, ${added} new`);
  }

  if (opts.deep) {
    for (const raw of rejected) {
      opts.onProgress?.(`Inspecting ${raw.owner}/${raw.name}...`);
      if (await hasPluginStructure(client, raw.owner, raw.name)) {
        log.info(`Admitted ${raw.owner}/${raw.name} by structure`);
        catalog.push({ ...raw, repoType: "plugin" });
      }
    }
  }

  return { catalog, failures };
}
