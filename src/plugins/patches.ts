import type { RemoteRepositoryClient } from "../api/github.ts";
import { PATCH_SUFFIX } from "./constants.ts";
import { fetchRemoteTree, walk } from "./tree.ts";
import type { FileTree, PatchFile } from "./types.ts";

const PATCH_EXTENSIONS = [".patch", ".diff", ".lua", ".sh"];

/** User patches are `.lua` files named with a leading priority digit, e.g. `2-custom-footer.lua`. */
export function isUserPatchName(name: string): boolean {
  return name.endsWith(PATCH_SUFFIX) && /^\d/.test(name);
}

export function looksLikePatch(name: string): boolean {
  const lower = name.toLowerCase();
  return PATCH_EXTENSIONS.some((ext) => lower.endsWith(ext)) || lower.includes("patch");
}

/** User patches at the repository root. */
export async function listPatchFiles(
  client: RemoteRepositoryClient,
  owner: string,
  repo: string,
): Promise<PatchFile[]> {
  const entries = await client.getContents(owner, repo);
  const patches: PatchFile[] = [];
  for (const entry of entries) {
    if (entry.type !== "file" || !entry.download_url || !isUserPatchName(entry.name)) continue;
    patches.push({
      name: entry.name,
      downloadUrl: entry.download_url,
      path: entry.path ?? entry.name,
      size: entry.size,
      sha: entry.sha,
    });
  }
  return patches;
}

/** Every downloadable patch-like file anywhere in `tree`, in walk order. */
export function collectPatchFiles(tree: FileTree): PatchFile[] {
  const patches: PatchFile[] = [];
  for (const { node, path } of walk(tree)) {
    if (node.type !== "file" || !node.downloadUrl || !looksLikePatch(node.name)) continue;
    patches.push({ name: node.name, downloadUrl: node.downloadUrl, path, size: node.size });
  }
  return patches;
}

export async function findAllPatchFiles(
  client: RemoteRepositoryClient,
  owner: string,
  repo: string,
  depth = 2,
): Promise<PatchFile[]> {
  return collectPatchFiles(await fetchRemoteTree(client, owner, repo, { depth }));
}
