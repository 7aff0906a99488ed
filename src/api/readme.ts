import { ApiError, isNotFound, RetryExhaustedError } from "./client.ts";
import { rawFileUrl, type RemoteRepositoryClient } from "./github.ts";
import type { ContentEntry } from "./types.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("readme");

export const README_CANDIDATES = ["README.md", "README", "readme.md", "readme", "README.rst", "README.txt"];

export const NO_README = "No README file found in this repository";

const IMAGE_PATTERN = /!\[([^\]]*)\]\(([^)]+)\)/g;

/**
 * Points relative markdown image paths at raw.githubusercontent.com so the
 * README renders outside the repository. Absolute URLs are left alone.
 */
export function absolutizeImagePaths(content: string, owner: string, repo: string, branch = "main"): string {
  return content.replace(IMAGE_PATTERN, (match, alt: string, path: string) => {
    if (/^https?:\/\//.test(path)) return match;
    return `![${alt}](${rawFileUrl(owner, repo, branch, path)})`;
  });
}

async function readEntry(client: RemoteRepositoryClient, entry: ContentEntry): Promise<string | null> {
  if (entry.download_url) {
    return client.getRawFile(entry.download_url);
  }
  if (entry.content) {
    return Buffer.from(entry.content, "base64").toString("utf-8");
  }
  return null;
}

function unavailable(err: unknown): string | null {
  if (err instanceof ApiError) return `README not available (HTTP ${err.status})`;
  if (err instanceof RetryExhaustedError) return "README not available (network error)";
  return null;
}

/**
 * Fetches the README text of a repository, trying the usual file names before
 * GitHub's own `/readme` lookup. Never throws: failures come back as a short
 * human-readable message in place of the content.
 */
export async function getReadme(client: RemoteRepositoryClient, owner: string, repo: string): Promise<string> {
  for (const name of README_CANDIDATES) {
    try {
      const [entry] = await client.getContents(owner, repo, name);
      if (!entry) continue;
      const content = await readEntry(client, entry);
      if (content !== null) {
        log.info(`Fetched ${name} for ${owner}/${repo}`);
        return absolutizeImagePaths(content, owner, repo);
      }
    } catch (err) {
      if (isNotFound(err)) continue;
      const message = unavailable(err);
      log.error(`Error fetching ${name} for ${owner}/${repo}`, err);
      if (message) return message;
    }
  }

  try {
    const entry = await client.getReadmeEntry(owner, repo);
    const content = entry ? await readEntry(client, entry) : null;
    if (content !== null) return absolutizeImagePaths(content, owner, repo);
  } catch (err) {
    log.error(`Error fetching README via API for ${owner}/${repo}`, err);
    const message = unavailable(err);
    if (message && !isNotFound(err)) return message;
  }

  log.info(`No README found for ${owner}/${repo}`);
  return NO_README;
}
