import { join, basename } from "path";
import { cpSync, existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import StreamZip from "node-stream-zip";
import { sourceArchiveUrl, type RemoteRepositoryClient } from "../api/github.ts";
import { ARCHIVE_SUFFIX, LEGACY_DEFAULT_BRANCH, canonicalPluginName } from "./constants.ts";
import type { DeviceLibrary } from "./device.ts";
import { locatePlugin } from "./locator.ts";
import { errorMessage, found, notApplicable, runChain, type Strategy } from "./strategy.ts";
import { readLocalTree } from "./tree.ts";
import type { InstallResult, PatchFile, UpdateCandidate } from "./types.ts";
import type { WorkDir } from "./workdir.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("installer");

export const NO_ARCHIVE = "No archive available";
export const NO_PLUGIN_STRUCTURE = "No valid plugin structure found (missing main.lua and _meta.lua)";

const ARCHIVE_FILE = "archive.zip";
const EXTRACT_DIR = "extract";

interface ArchiveContext {
  owner: string;
  repo: string;
  branch: string;
  progress: (message: string) => void;
}

type ArchiveSource = Strategy<ArchiveContext, Uint8Array>;

export interface InstallOptions {
  onProgress?: (message: string) => void;
  /** Changes the success message to "updated". */
  isUpdate?: boolean;
}

export async function extractArchive(archivePath: string, destDir: string): Promise<void> {
  mkdirSync(destDir, { recursive: true });
  const zip = new StreamZip.async({ file: archivePath });
  try {
    await zip.extract(null, destDir);
  } finally {
    await zip.close();
  }
}

function isPlainName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !name.includes("\\") && basename(name) === name;
}

function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "es"}`;
}

export class ArchiveInstaller {
  private readonly client: RemoteRepositoryClient;
  private readonly library: DeviceLibrary;

  constructor(client: RemoteRepositoryClient, library: DeviceLibrary) {
    this.client = client;
    this.library = library;
  }

  /** Release asset, then the named branch, then `master`. */
  archiveSources(): ArchiveSource[] {
    const client = this.client;
    return [
      {
        name: "release-asset",
        async run(ctx) {
          const release = await client.getLatestRelease(ctx.owner, ctx.repo);
          if (!release) return notApplicable("no release");
          const asset = release.assets.find((a) => a.name.endsWith(ARCHIVE_SUFFIX));
          if (!asset) return notApplicable("release has no archive asset");
          ctx.progress(`Downloading ${asset.name}...`);
          return found(await client.downloadArchive(asset.browser_download_url));
        },
      },
      {
        name: "branch-archive",
        async run(ctx) {
          ctx.progress(`Downloading ${ctx.repo} (${ctx.branch})...`);
          return found(await client.downloadArchive(sourceArchiveUrl(ctx.owner, ctx.repo, ctx.branch)));
        },
      },
      {
        name: "master-archive",
        async run(ctx) {
          if (ctx.branch === LEGACY_DEFAULT_BRANCH) return notApplicable("branch is already master");
          ctx.progress(`Downloading ${ctx.repo} (${LEGACY_DEFAULT_BRANCH})...`);
          return found(
            await client.downloadArchive(sourceArchiveUrl(ctx.owner, ctx.repo, LEGACY_DEFAULT_BRANCH)),
          );
        },
      },
    ];
  }

  /**
   * Downloads, extracts and installs the plugin of `owner/repo`. The work
   * directory is claimed for this call; it is removed on success and left in
   * place for inspection when a later step fails.
   */
  async install(
    owner: string,
    repo: string,
    branch: string,
    workDir: WorkDir,
    opts: InstallOptions = {},
  ): Promise<InstallResult> {
    return this.installWith(this.archiveSources(), { owner, repo, branch }, workDir, opts);
  }

  /**
   * Installs an update set entry. A known download URL is tried first; the
   * regular archive sources follow when it fails.
   */
  async installUpdate(update: UpdateCandidate, workDir: WorkDir, opts: InstallOptions = {}): Promise<InstallResult> {
    const client = this.client;
    const sources = this.archiveSources();
    const { downloadUrl } = update;
    if (downloadUrl) {
      sources.unshift({
        name: "update-url",
        async run(ctx) {
          ctx.progress(`Downloading ${update.latestVersion}...`);
          return found(await client.downloadArchive(downloadUrl));
        },
      });
    }
    const { owner, name, defaultBranch } = update.candidate;
    return this.installWith(sources, { owner, repo: name, branch: defaultBranch ?? "main" }, workDir, {
      isUpdate: true,
      ...opts,
    });
  }

  private async installWith(
    sources: ArchiveSource[],
    target: Omit<ArchiveContext, "progress">,
    workDir: WorkDir,
    opts: InstallOptions,
  ): Promise<InstallResult> {
    workDir.claim();
    const progress = opts.onProgress ?? (() => {});
    const { repo } = target;

    const acquired = await runChain(sources, { ...target, progress }, log);
    if (acquired.outcome.kind !== "found") {
      log.error(`No archive for ${target.owner}/${repo}: ${acquired.trail.map((s) => s.name).join(", ")} exhausted`);
      return { success: false, message: NO_ARCHIVE };
    }
    log.info(`Archive for ${target.owner}/${repo} from ${acquired.decidedBy}`);

    try {
      const scratch = workDir.prepare();
      const archivePath = join(scratch, ARCHIVE_FILE);
      const extractDir = join(scratch, EXTRACT_DIR);
      writeFileSync(archivePath, acquired.outcome.value);

      progress("Extracting...");
      await extractArchive(archivePath, extractDir);

      progress("Analyzing plugin structure...");
      const tree = await readLocalTree(extractDir, EXTRACT_DIR);
      const layout = locatePlugin(tree, { degraded: true });
      if (!layout) {
        log.warn(`No plugin structure in ${target.owner}/${repo}`);
        return { success: false, message: NO_PLUGIN_STRUCTURE };
      }
      log.info(`Found ${layout.layoutKind} layout at "${layout.rootDir || "."}"`);

      const sourceDir = join(extractDir, ...layout.rootDir.split("/").filter(Boolean));
      const pluginName = canonicalPluginName(layout.rootDir ? basename(sourceDir) : repo);
      const pluginPath = this.library.pluginPath(pluginName);

      progress("Installing...");
      mkdirSync(this.library.pluginsDir, { recursive: true });
      if (existsSync(pluginPath)) {
        rmSync(pluginPath, { recursive: true, force: true });
      }
      cpSync(sourceDir, pluginPath, { recursive: true });

      workDir.dispose();

      const verb = opts.isUpdate ? "updated" : "installed";
      return { success: true, message: `${repo} ${verb} successfully!`, pluginName, pluginPath };
    } catch (err) {
      log.error(`Error during installation of ${target.owner}/${repo}`, err);
      return { success: false, message: `Error: ${errorMessage(err)}` };
    }
  }

  /**
   * Fetches and writes each patch into the patches area. The first failed
   * fetch aborts the batch; patches already written stay.
   */
  async installPatches(patches: readonly PatchFile[], opts: InstallOptions = {}): Promise<InstallResult> {
    if (patches.length === 0) {
      return { success: false, message: "No patches found" };
    }
    const installedNames: string[] = [];
    try {
      mkdirSync(this.library.patchesDir, { recursive: true });
      for (const patch of patches) {
        opts.onProgress?.(`Downloading ${patch.name}...`);
        const text = await this.client.getRawFile(patch.downloadUrl);
        writeFileSync(join(this.library.patchesDir, basename(patch.name)), text, "utf-8");
        installedNames.push(patch.name);
      }
    } catch (err) {
      log.error("Error during patch installation", err);
      return { success: false, message: `Error: ${errorMessage(err)}`, installedNames };
    }
    return {
      success: true,
      message: `${pluralize(installedNames.length, "patch")} installed successfully!`,
      installedNames,
    };
  }

  /** Removes `plugins/<name>.koplugin`. Names that are not a single path segment are refused. */
  uninstall(name: string): InstallResult {
    if (!isPlainName(name)) {
      return { success: false, message: `Invalid plugin name "${name}"` };
    }
    const pluginName = canonicalPluginName(name);
    const installed = this.library.findInstalled(pluginName);
    if (!installed) {
      return { success: false, message: `Plugin ${pluginName} is not installed`, pluginName };
    }
    const pluginPath = installed.path;
    try {
      rmSync(pluginPath, { recursive: true, force: true });
    } catch (err) {
      log.error(`Error removing ${pluginPath}`, err);
      return { success: false, message: `Error: ${errorMessage(err)}`, pluginName };
    }
    log.info(`Uninstalled ${pluginName}`);
    return { success: true, message: `${pluginName} uninstalled successfully!`, pluginName, pluginPath };
  }
}
