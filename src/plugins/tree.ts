import { readdir } from "fs/promises";
import { join } from "path";
import type { RemoteRepositoryClient } from "../api/github.ts";
import type { ContentEntry } from "../api/types.ts";
import type { FileTree } from "./types.ts";
import { getLogger } from "../utils/logger.ts";

const log = getLogger("tree");

export function fileNode(name: string, extra: Omit<FileTree, "name" | "type" | "children"> = {}): FileTree {
  return { name, type: "file", ...extra };
}

export function dirNode(name: string, children?: FileTree[]): FileTree {
  return { name, type: "dir", children };
}

export function childNamed(tree: FileTree, name: string): FileTree | undefined {
  return tree.children?.find((c) => c.name === name);
}

export function hasFile(tree: FileTree, name: string): boolean {
  return childNamed(tree, name)?.type === "file";
}

export function subdirectories(tree: FileTree): FileTree[] {
  return (tree.children ?? []).filter((c) => c.type === "dir");
}

/** Resolves a "/"-separated path relative to `tree`; "" is the tree itself. */
export function nodeAt(tree: FileTree, relPath: string): FileTree | undefined {
  let node: FileTree | undefined = tree;
  for (const segment of relPath.split("/").filter(Boolean)) {
    node = node ? childNamed(node, segment) : undefined;
  }
  return node;
}

export function joinRel(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

/** Depth-first walk yielding every node with its path relative to the root. */
export function* walk(tree: FileTree, relPath = ""): Generator<{ node: FileTree; path: string }> {
  yield { node: tree, path: relPath };
  for (const child of tree.children ?? []) {
    yield* walk(child, joinRel(relPath, child.name));
  }
}

function fromEntry(entry: ContentEntry): FileTree {
  if (entry.type === "dir") return dirNode(entry.name);
  return fileNode(entry.name, {
    downloadUrl: entry.download_url ?? undefined,
    size: entry.size,
  });
}

export interface RemoteTreeOptions {
  path?: string;
  /** Directory levels to expand below the root; 1 lists first-level subdirectories. */
  depth?: number;
}

/**
 * Builds a tree from the `contents` API. The root listing must succeed; a
 * subdirectory whose listing fails stays unexpanded (`children` undefined)
 * and is skipped by the locator.
 */
export async function fetchRemoteTree(
  client: RemoteRepositoryClient,
  owner: string,
  repo: string,
  opts: RemoteTreeOptions = {},
): Promise<FileTree> {
  const rootPath = opts.path ?? "";
  const depth = opts.depth ?? 1;
  const entries = await client.getContents(owner, repo, rootPath);
  const root = dirNode(repo, entries.map(fromEntry));
  await expand(root, rootPath, depth);
  return root;

  async function expand(node: FileTree, path: string, remaining: number): Promise<void> {
    if (remaining <= 0) return;
    for (const child of subdirectories(node)) {
      const childPath = joinRel(path, child.name);
      try {
        const listing = await client.getContents(owner, repo, childPath);
        child.children = listing.map(fromEntry);
      } catch (err) {
        log.debug(`Failed to list ${owner}/${repo}/${childPath}`, err);
        continue;
      }
      await expand(child, childPath, remaining - 1);
    }
  }
}

/** Reads a local directory recursively into a tree. Symlinks are not followed. */
export async function readLocalTree(dir: string, name = dir): Promise<FileTree> {
  const entries = await readdir(dir, { withFileTypes: true });
  const children: FileTree[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      children.push(await readLocalTree(join(dir, entry.name), entry.name));
    } else if (entry.isFile()) {
      children.push(fileNode(entry.name));
    }
  }
  children.sort((a, b) => a.name.localeCompare(b.name));
  return dirNode(name, children);
}
