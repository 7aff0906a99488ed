export type RepoType = "plugin" | "patch";

/** A search hit before classification. */
export interface RawCandidate {
  id: number;
  name: string;
  owner: string;
  description: string;
  topics: ReadonlySet<string>;
  updatedAt: string;
  stars: number;
  htmlUrl?: string;
  defaultBranch?: string;
}

/** A search hit admitted to the catalog. */
export interface RemoteCandidate extends RawCandidate {
  repoType: RepoType;
}

export type LayoutKind = "root" | "subdir" | "split" | "degraded" | "weak";

export interface PluginLayout {
  /** Path of the plugin root relative to the tree root, "" for the root itself. */
  rootDir: string;
  entryFilePresent: boolean;
  metaFilePresent: boolean;
  layoutKind: LayoutKind;
}

/**
 * A directory listing, remote or local. On a directory, `children` undefined
 * means the listing was never fetched (or failed); an empty array means the
 * directory is empty.
 */
export interface FileTree {
  name: string;
  type: "file" | "dir";
  children?: FileTree[];
  downloadUrl?: string;
  size?: number;
}

export interface InstalledPlugin {
  /** Directory name, always ending in `.koplugin`. */
  canonicalName: string;
  path: string;
  version: string;
  hasMeta: boolean;
  /** The metadata file the version was read from. */
  metaPath?: string;
}

export type UpdateType = "release" | "commit" | "repository";

export interface UpdateCandidate {
  pluginName: string;
  installedVersion: string;
  latestVersion: string;
  updateType: UpdateType;
  downloadUrl?: string;
  releaseNotes?: string;
  publishedAt?: string;
  candidate: RemoteCandidate;
}

export interface PatchFile {
  name: string;
  downloadUrl: string;
  /** Location inside the repository, for display. */
  path?: string;
  size?: number;
  sha?: string;
}

export interface InstallResult {
  success: boolean;
  message: string;
  pluginName?: string;
  pluginPath?: string;
  installedNames?: string[];
}
