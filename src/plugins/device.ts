import { join } from "path";
import { existsSync, readdirSync, readFileSync, statSync } from "fs";
import { homedir } from "os";
import {
  FIRMWARE_NAME,
  META_FILES,
  PATCHES_DIR_NAME,
  PATCH_SUFFIX,
  PLUGIN_SUFFIX,
  PLUGINS_DIR_NAME,
  UNKNOWN_VERSION,
} from "./constants.ts";
import type { InstalledPlugin } from "./types.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("device");

const VERSION_PATTERN = /version\s*=\s*["']([^"']+)["']/;

/** Best-effort `version = "..."` extraction; "Unknown" on anything else. */
export function extractVersion(metaSource: string): string {
  return VERSION_PATTERN.exec(metaSource)?.[1] ?? UNKNOWN_VERSION;
}

function isDir(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** The `plugins/` and `patches/` areas of one KOReader installation. */
export class DeviceLibrary {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  get pluginsDir(): string {
    return join(this.root, PLUGINS_DIR_NAME);
  }

  get patchesDir(): string {
    return join(this.root, PATCHES_DIR_NAME);
  }

  pluginPath(canonicalName: string): string {
    return join(this.pluginsDir, canonicalName);
  }

  /** Reads the version of a plugin directory; the first metadata file found decides. */
  readPlugin(dir: string, canonicalName: string): InstalledPlugin {
    for (const metaName of META_FILES) {
      const metaPath = join(dir, metaName);
      if (!existsSync(metaPath)) continue;
      let version = UNKNOWN_VERSION;
      try {
        version = extractVersion(readFileSync(metaPath, "utf-8"));
      } catch (err) {
        log.warn(`Could not read ${metaPath}`, err);
      }
      return { canonicalName, path: dir, version, hasMeta: true, metaPath };
    }
    return { canonicalName, path: dir, version: UNKNOWN_VERSION, hasMeta: false };
  }

  /** Every `*.koplugin` directory in the plugins area, sorted by name. */
  listInstalled(): InstalledPlugin[] {
    if (!isDir(this.pluginsDir)) return [];
    return readdirSync(this.pluginsDir, { withFileTypes: true })
      .filter((e) => e.isDirectory() && e.name.endsWith(PLUGIN_SUFFIX))
      .map((e) => this.readPlugin(join(this.pluginsDir, e.name), e.name))
      .sort((a, b) => a.canonicalName.localeCompare(b.canonicalName));
  }

  findInstalled(canonicalName: string): InstalledPlugin | null {
    const dir = this.pluginPath(canonicalName);
    return isDir(dir) ? this.readPlugin(dir, canonicalName) : null;
  }

  listPatches(): string[] {
    if (!isDir(this.patchesDir)) return [];
    return readdirSync(this.patchesDir, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.endsWith(PATCH_SUFFIX))
      .map((e) => e.name)
      .sort();
  }
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

const REQUIRED_ENTRIES = ["koreader.sh", "frontend", "plugins", "data"];

const WINDOWS_DRIVES = "EFGHIJKLMNOPQRSTUVWXYZ".split("").map((letter) => `${letter}:`);
const WINDOWS_SUBPATHS = [
  ".adds/koreader",
  ".adds",
  "koreader",
  "extensions/koreader",
  "documents/koreader",
  ".kobo/koreader",
  "applications/koreader",
];

export interface DetectOptions {
  platform?: NodeJS.Platform;
  homedir?: string;
}

function hasLauncher(path: string): boolean {
  return existsSync(join(path, "koreader.sh"));
}

/** Expands a single `*` path segment against the directories that exist. */
function expandWildcard(pattern: string): string[] {
  const [prefix = "", suffix = ""] = pattern.split("*");
  if (!isDir(prefix)) return [];
  try {
    return readdirSync(prefix, { withFileTypes: true })
      .filter((e) => e.isDirectory())
      .map((e) => join(prefix, e.name, suffix));
  } catch {
    return [];
  }
}

export function candidatePaths(opts: DetectOptions = {}): string[] {
  const platform = opts.platform ?? process.platform;
  const home = opts.homedir ?? homedir();
  const local = join(home, FIRMWARE_NAME);

  switch (platform) {
    case "win32":
      return [
        ...WINDOWS_DRIVES.filter(existsSync).flatMap((drive) => WINDOWS_SUBPATHS.map((sub) => join(drive, sub))),
        local,
        "C:/koreader",
        "C:/Program Files/koreader",
        "C:/Program Files (x86)/koreader",
      ];
    case "darwin":
      return ["/Volumes/koreader", "/Volumes/KOReader", local, "/Applications/koreader"];
    default:
      return [...expandWildcard("/media/*/koreader"), ...expandWildcard("/mnt/*/koreader"), local, "/opt/koreader"];
  }
}

/** A valid installation has the launcher script plus its core directories. */
export function validateInstallation(path: string): boolean {
  if (!existsSync(path)) return false;
  for (const entry of REQUIRED_ENTRIES) {
    if (!existsSync(join(path, entry))) {
      log.debug(`Missing ${entry} in ${path}`);
      return false;
    }
  }
  return true;
}

export function detectDevice(opts: DetectOptions = {}): string | null {
  const found = candidatePaths(opts).filter(hasLauncher);
  log.info(`Found KOReader paths: ${found.join(", ") || "(none)"}`);
  const valid = found.find(validateInstallation);
  if (!valid) {
    log.warn("No KOReader device detected");
    return null;
  }
  log.info(`Detected KOReader device at ${valid}`);
  return valid;
}

export interface DeviceInfo {
  path: string;
  valid: boolean;
  version: string;
  platform: NodeJS.Platform;
  pluginsExist: boolean;
  patchesExist: boolean;
}

export function getDeviceInfo(path: string, platform: NodeJS.Platform = process.platform): DeviceInfo {
  const info: DeviceInfo = {
    path,
    valid: validateInstallation(path),
    version: UNKNOWN_VERSION,
    platform,
    pluginsExist: false,
    patchesExist: false,
  };
  if (!info.valid) return info;

  const revFile = join(path, "git-rev");
  if (existsSync(revFile)) {
    try {
      info.version = readFileSync(revFile, "utf-8").trim();
    } catch (err) {
      log.warn(`Could not read ${revFile}`, err);
    }
  }
  info.pluginsExist = isDir(join(path, PLUGINS_DIR_NAME));
  info.patchesExist = isDir(join(path, PATCHES_DIR_NAME));
  return info;
}
