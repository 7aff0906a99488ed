import type { SearchRepo } from "../api/types.ts";
import { FIRMWARE_NAME, PLUGIN_KEYWORD, PLUGIN_SUFFIX, TOPIC_ALLOW_SET } from "./constants.ts";
import type { RawCandidate, RemoteCandidate, RepoType } from "./types.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("classifier");

export function toRawCandidate(repo: SearchRepo): RawCandidate {
  return {
    id: repo.id,
    name: repo.name,
    owner: repo.owner.login,
    description: repo.description,
    topics: new Set(repo.topics),
    updatedAt: repo.updated_at,
    stars: repo.stargazers_count,
    htmlUrl: repo.html_url,
    defaultBranch: repo.default_branch,
  };
}

/** Name-based type assignment; null means the repository is neither. */
export function classifyRepoType(name: string): RepoType | null {
  const lower = name.toLowerCase();
  if (lower.includes(PLUGIN_KEYWORD) || lower.endsWith("plugin") || lower.endsWith("plugins")) {
    return "plugin";
  }
  if (lower.includes("patch")) {
    return "patch";
  }
  return null;
}

export type AcceptanceReason = "name" | "topic" | "description";

/**
 * Cheap check that a plugin-named repository actually targets the firmware,
 * so generic "*-plugin" repositories stay out of the catalog. Returns which
 * rule admitted the candidate, or null.
 */
export function quickAcceptance(candidate: RawCandidate): AcceptanceReason | null {
  const name = candidate.name.toLowerCase();
  if (
    name.endsWith(PLUGIN_SUFFIX) ||
    name.includes(PLUGIN_KEYWORD) ||
    name.endsWith(".patch") ||
    name.includes(`${FIRMWARE_NAME}.patches`) ||
    name.includes(FIRMWARE_NAME)
  ) {
    return "name";
  }
  for (const topic of candidate.topics) {
    if (TOPIC_ALLOW_SET.has(topic)) return "topic";
  }
  if (candidate.description.toLowerCase().includes(FIRMWARE_NAME)) {
    return "description";
  }
  return null;
}

export type Verdict =
  | { admitted: true; candidate: RemoteCandidate; reason?: AcceptanceReason }
  | { admitted: false; repoType: RepoType | null; candidate: RawCandidate };

/** Classification and cheap acceptance for a single candidate. */
export function judge(candidate: RawCandidate): Verdict {
  const repoType = classifyRepoType(candidate.name);
  if (!repoType) {
    log.info(`Discarding ${candidate.owner}/${candidate.name} (neither plugin nor patch)`);
    return { admitted: false, repoType, candidate };
  }
  if (repoType === "patch") {
    return { admitted: true, candidate: { ...candidate, repoType } };
  }
  const reason = quickAcceptance(candidate);
  if (!reason) {
    log.info(`Filtering out plugin: ${candidate.owner}/${candidate.name} (not KOReader-related)`);
    return { admitted: false, repoType, candidate };
  }
  return { admitted: true, candidate: { ...candidate, repoType }, reason };
}

/**
 * Judges every candidate whose id is not yet in `seen`, recording it there.
 * The first occurrence of an id wins; pass the same set across batches to
 * deduplicate over several searches.
 */
export function* judgeUnseen(candidates: Iterable<RawCandidate>, seen: Set<number> = new Set()): Generator<Verdict> {
  for (const candidate of candidates) {
    if (seen.has(candidate.id)) continue;
    seen.add(candidate.id);
    yield judge(candidate);
  }
}

/**
 * Deduplicates by id (first occurrence wins), assigns a repo type and applies
 * the cheap acceptance filter. The result is the catalog, in input order.
 */
export function classify(candidates: Iterable<RawCandidate>): RemoteCandidate[] {
  const catalog: RemoteCandidate[] = [];
  for (const verdict of judgeUnseen(candidates)) {
    if (verdict.admitted) catalog.push(verdict.candidate);
  }
  return catalog;
}
