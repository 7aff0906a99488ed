import { ENTRY_FILE, META_FILES, PLUGIN_SUFFIX } from "./constants.ts";
import { hasFile, subdirectories, walk } from "./tree.ts";
import type { FileTree, PluginLayout } from "./types.ts";

export interface LocateOptions {
  /**
   * Enables the last-resort search used on freshly extracted archives: any
   * nested `*.koplugin` directory with both files, then any first-level
   * directory holding the entry file alone.
   */
  degraded?: boolean;
}

function hasMeta(tree: FileTree): boolean {
  return META_FILES.some((name) => hasFile(tree, name));
}

function isComplete(tree: FileTree): boolean {
  return hasFile(tree, ENTRY_FILE) && hasMeta(tree);
}

function layout(rootDir: string, layoutKind: PluginLayout["layoutKind"], metaFilePresent = true): PluginLayout {
  return { rootDir, entryFilePresent: true, metaFilePresent, layoutKind };
}

/**
 * Finds the directory that makes up a plugin. Rules are tried in order and
 * the first match wins:
 *
 * 1. root   - entry and metadata file directly in `tree`
 * 2. subdir - a first-level directory satisfying rule 1
 * 3. split  - entry in `tree`, metadata file in some first-level directory
 * 4. degraded fallback, only with `opts.degraded`
 *
 * Returns null when nothing installable is found. Works on remote listings
 * and extracted archives alike; unexpanded directories are skipped.
 */
export function locatePlugin(tree: FileTree, opts: LocateOptions = {}): PluginLayout | null {
  if (isComplete(tree)) return layout("", "root");

  const firstLevel = subdirectories(tree);

  const nested = firstLevel.find(isComplete);
  if (nested) return layout(nested.name, "subdir");

  if (hasFile(tree, ENTRY_FILE) && firstLevel.some(hasMeta)) {
    return layout("", "split");
  }

  if (!opts.degraded) return null;

  for (const { node, path } of walk(tree)) {
    if (node.type === "dir" && node.name.endsWith(PLUGIN_SUFFIX) && path !== "" && isComplete(node)) {
      return layout(path, "degraded");
    }
  }

  const weak = firstLevel.find((dir) => hasFile(dir, ENTRY_FILE));
  // rule 2 already took every first-level directory that has a metadata file
  if (weak) return layout(weak.name, "weak", false);

  return null;
}
