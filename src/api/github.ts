import { GitHubHttp, isNotFound, type GitHubHttpOptions } from "./client.ts";
import {
  CommitListSchema,
  ContentsResponseSchema,
  ReleaseSchema,
  SearchResponseSchema,
  type CommitSummary,
  type ContentEntry,
  type Release,
  type SearchRepo,
} from "./types.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("github");

const SEARCH_PAGE_SIZE = 100;
const COMMITS_PAGE_SIZE = 10;

/**
 * What the store needs from the hosting platform. Implemented by GitHubClient;
 * tests substitute an in-memory fake.
 */
export interface RemoteRepositoryClient {
  searchRepositories(query: string): Promise<SearchRepo[]>;
  /** Entries of a directory (or the single entry of a file path). */
  getContents(owner: string, repo: string, path?: string): Promise<ContentEntry[]>;
  /** `null` when the repository has no published release. */
  getLatestRelease(owner: string, repo: string): Promise<Release | null>;
  /** `null` when no commits came back. */
  getRecentCommits(owner: string, repo: string, since?: string): Promise<CommitSummary | null>;
  /** Metadata of the repository's README as chosen by GitHub, or `null`. */
  getReadmeEntry(owner: string, repo: string): Promise<ContentEntry | null>;
  getRawFile(url: string): Promise<string>;
  downloadArchive(url: string): Promise<Uint8Array>;
}

export function sourceArchiveUrl(owner: string, repo: string, branch: string): string {
  return `https://github.com/${owner}/${repo}/archive/refs/heads/${branch}.zip`;
}

export function tagArchiveUrl(owner: string, repo: string, tag: string): string {
  return `https://github.com/${owner}/${repo}/archive/${tag}.zip`;
}

export function rawFileUrl(owner: string, repo: string, branch: string, path: string): string {
  return `https://raw.githubusercontent.com/${owner}/${repo}/${branch}/${path.replace(/^\/+/, "")}`;
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

function contentsPath(owner: string, repo: string, path: string): string {
  const encoded = path
    .split("/")
    .filter(Boolean)
    .map(encodeURIComponent)
    .join("/");
  return `${repoPath(owner, repo)}/contents/${encoded}`;
}

export class GitHubClient implements RemoteRepositoryClient {
  readonly http: GitHubHttp;

  constructor(opts: GitHubHttpOptions | GitHubHttp = {}) {
    this.http = opts instanceof GitHubHttp ? opts : new GitHubHttp(opts);
  }

  async searchRepositories(query: string): Promise<SearchRepo[]> {
    log.debug(`search: ${query}`);
    const data = await this.http.getJson("/search/repositories", SearchResponseSchema, {
      q: query,
      per_page: SEARCH_PAGE_SIZE,
      sort: "stars",
      order: "desc",
    });
    return data.items;
  }

  async getContents(owner: string, repo: string, path = ""): Promise<ContentEntry[]> {
    return this.http.getJson(contentsPath(owner, repo, path), ContentsResponseSchema);
  }

  async getLatestRelease(owner: string, repo: string): Promise<Release | null> {
    try {
      return await this.http.getJson(`${repoPath(owner, repo)}/releases/latest`, ReleaseSchema);
    } catch (err) {
      if (isNotFound(err)) {
        log.info(`No releases found for ${owner}/${repo}`);
        return null;
      }
      throw err;
    }
  }

  async getRecentCommits(owner: string, repo: string, since?: string): Promise<CommitSummary | null> {
    const commits = await this.http.getJson(`${repoPath(owner, repo)}/commits`, CommitListSchema, {
      per_page: COMMITS_PAGE_SIZE,
      since,
    });
    const latest = commits[0];
    if (!latest?.commit.committer) return null;
    return {
      latestSha: latest.sha,
      latestDate: latest.commit.committer.date,
      count: commits.length,
    };
  }

  async getReadmeEntry(owner: string, repo: string): Promise<ContentEntry | null> {
    try {
      const [entry] = await this.http.getJson(`${repoPath(owner, repo)}/readme`, ContentsResponseSchema);
      return entry ?? null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async getRawFile(url: string): Promise<string> {
    return this.http.getText(url);
  }

  async downloadArchive(url: string): Promise<Uint8Array> {
    const bytes = await this.http.getBytes(url);
    log.info(`Downloaded ${url} (${bytes.byteLength} bytes)`);
    return bytes;
  }
}
