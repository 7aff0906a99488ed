import { statSync } from "fs";
import { tagArchiveUrl, type RemoteRepositoryClient } from "../api/github.ts";
import type { Release } from "../api/types.ts";
import { ARCHIVE_SUFFIX, RECENT_UPDATE_LABEL, UNKNOWN_VERSION, stripPluginSuffix } from "./constants.ts";
import { found, notApplicable, runChain, type Strategy } from "./strategy.ts";
import type { InstalledPlugin, RemoteCandidate, UpdateCandidate } from "./types.ts";
import { isNewerVersion, stripVersionPrefix } from "./version.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("resolver");

const DAY_MS = 24 * 60 * 60 * 1000;
export const COMMIT_GRACE_MS = DAY_MS;
export const RECENT_WINDOW_MS = 7 * DAY_MS;

/** Exact name, then without `.koplugin`, then case-insensitive. */
export function findCandidate(
  pluginName: string,
  catalog: readonly RemoteCandidate[],
): RemoteCandidate | undefined {
  const stripped = stripPluginSuffix(pluginName);
  return (
    catalog.find((c) => c.name === pluginName) ??
    catalog.find((c) => c.name === stripped) ??
    catalog.find((c) => c.name.toLowerCase() === stripped.toLowerCase())
  );
}

/** First `.zip` asset, else the source archive of the tag. */
export function releaseDownloadUrl(release: Release, owner: string, repo: string): string {
  const asset = release.assets.find((a) => a.name.endsWith(ARCHIVE_SUFFIX));
  return asset ? asset.browser_download_url : tagArchiveUrl(owner, repo, release.tag_name);
}

interface TierContext {
  installed: InstalledPlugin;
  candidate: RemoteCandidate;
  now: Date;
}

/** `found(null)` means "decided: up to date". */
type Tier = Strategy<TierContext, UpdateCandidate | null>;

function baseCandidate(ctx: TierContext): Pick<UpdateCandidate, "pluginName" | "installedVersion" | "candidate"> {
  return {
    pluginName: ctx.installed.canonicalName,
    installedVersion: ctx.installed.version,
    candidate: ctx.candidate,
  };
}

function parseTime(value: string): number | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function releaseTier(client: RemoteRepositoryClient): Tier {
  return {
    name: "release",
    async run(ctx) {
      const { owner, name } = ctx.candidate;
      const release = await client.getLatestRelease(owner, name);
      if (!release?.tag_name) return notApplicable("no tagged release");

      const installed = stripVersionPrefix(ctx.installed.version);
      const latest = stripVersionPrefix(release.tag_name);
      if (!isNewerVersion(installed, latest)) return found(null);

      return found<UpdateCandidate>({
        ...baseCandidate(ctx),
        latestVersion: release.tag_name,
        updateType: "release",
        downloadUrl: releaseDownloadUrl(release, owner, name),
        releaseNotes: release.body,
        publishedAt: release.published_at,
      });
    },
  };
}

function commitTier(client: RemoteRepositoryClient): Tier {
  return {
    name: "commit",
    async run(ctx) {
      const { metaPath } = ctx.installed;
      if (!metaPath) return notApplicable("no metadata file");
      const installedAt = statSync(metaPath).mtimeMs;

      const commits = await client.getRecentCommits(ctx.candidate.owner, ctx.candidate.name);
      if (!commits) return notApplicable("no commits");

      const committedAt = parseTime(commits.latestDate);
      if (committedAt === null) return notApplicable(`unparsable commit date "${commits.latestDate}"`);
      if (committedAt <= installedAt + COMMIT_GRACE_MS) return found(null);

      return found<UpdateCandidate>({
        ...baseCandidate(ctx),
        latestVersion: commits.latestSha.slice(0, 8),
        updateType: "commit",
        publishedAt: commits.latestDate,
      });
    },
  };
}

const repositoryTier: Tier = {
  name: "repository",
  async run(ctx) {
    if (ctx.installed.version !== UNKNOWN_VERSION) return notApplicable("installed version is known");
    const updatedAt = parseTime(ctx.candidate.updatedAt);
    if (updatedAt === null) return notApplicable("no repository timestamp");
    if (updatedAt <= ctx.now.getTime() - RECENT_WINDOW_MS) return notApplicable("not updated recently");

    return found<UpdateCandidate>({
      ...baseCandidate(ctx),
      latestVersion: RECENT_UPDATE_LABEL,
      updateType: "repository",
      publishedAt: ctx.candidate.updatedAt,
    });
  },
};

export interface ResolverOptions {
  now?: () => Date;
}

export class UpdateResolver {
  private readonly tiers: Tier[];
  private readonly now: () => Date;

  constructor(client: RemoteRepositoryClient, opts: ResolverOptions = {}) {
    this.tiers = [releaseTier(client), commitTier(client), repositoryTier];
    this.now = opts.now ?? (() => new Date());
  }

  /** `null` when no candidate matches or no tier signals an update. */
  async resolve(installed: InstalledPlugin, catalog: readonly RemoteCandidate[]): Promise<UpdateCandidate | null> {
    const candidate = findCandidate(installed.canonicalName, catalog);
    if (!candidate) {
      log.debug(`No catalog entry for ${installed.canonicalName}`);
      return null;
    }

    const result = await runChain(this.tiers, { installed, candidate, now: this.now() }, log);
    if (result.outcome.kind !== "found" || !result.outcome.value) return null;

    const update = result.outcome.value;
    log.info(`Update available for ${update.pluginName}: ${installed.version} -> ${update.latestVersion} (${update.updateType})`);
    return update;
  }

  /** The update set, in the order of `installed`. */
  async resolveAll(
    installed: readonly InstalledPlugin[],
    catalog: readonly RemoteCandidate[],
    onProgress?: (message: string) => void,
  ): Promise<UpdateCandidate[]> {
    const updates: UpdateCandidate[] = [];
    for (const plugin of installed) {
      onProgress?.(`Checking ${plugin.canonicalName}...`);
      const update = await this.resolve(plugin, catalog);
      if (update) updates.push(update);
    }
    return updates;
  }
}
