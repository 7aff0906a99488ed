export const FIRMWARE_NAME = "koreader";

export const ENTRY_FILE = "main.lua";
export const META_FILE = "_meta.lua";
export const ALT_META_FILE = "manifest.lua";
export const META_FILES = [META_FILE, ALT_META_FILE] as const;

export const PLUGIN_SUFFIX = ".koplugin";
export const PLUGIN_KEYWORD = "koplugin";
export const PATCH_SUFFIX = ".lua";
export const ARCHIVE_SUFFIX = ".zip";

export const TOPIC_ALLOW_SET: ReadonlySet<string> = new Set([
  "koreader-plugin",
  "koreader-user-patch",
  "koreader",
]);

export const UNKNOWN_VERSION = "Unknown";
export const RECENT_UPDATE_LABEL = "Recent Update";

export const PLUGINS_DIR_NAME = "plugins";
export const PATCHES_DIR_NAME = "patches";

export const LEGACY_DEFAULT_BRANCH = "master";
export const DEFAULT_BRANCH = "main";

/** Appends the `.koplugin` suffix when it is missing. */
export function canonicalPluginName(name: string): string {
  return name.endsWith(PLUGIN_SUFFIX) ? name : `${name}${PLUGIN_SUFFIX}`;
}

export function stripPluginSuffix(name: string): string {
  return name.endsWith(PLUGIN_SUFFIX) ? name.slice(0, -PLUGIN_SUFFIX.length) : name;
}
