import { describe, it, expect } from "vitest";
import { locatePlugin } from "../../src/plugins/locator.ts";
import { dirNode, fileNode } from "../../src/plugins/tree.ts";

const main = () => fileNode("main.lua");
const meta = () => fileNode("_meta.lua");

describe("locatePlugin", () => {
  it("detects a root layout", () => {
    const tree = dirNode("repo", [main(), meta(), fileNode("README.md")]);
    expect(locatePlugin(tree)).toEqual({ rootDir: "", entryFilePresent: true, metaFilePresent: true, layoutKind: "root" });
  });

  it("accepts the alternate metadata file", () => {
    const tree = dirNode("repo", [main(), fileNode("manifest.lua")]);
    expect(locatePlugin(tree)?.layoutKind).toBe("root");
  });

  it("prefers root over split when both apply", () => {
    const tree = dirNode("repo", [main(), meta(), dirNode("extra", [meta()])]);
    expect(locatePlugin(tree)?.layoutKind).toBe("root");
  });

  it("detects a subdirectory layout", () => {
    const tree = dirNode("repo", [fileNode("README.md"), dirNode("docs", []), dirNode("foo.koplugin", [main(), meta()])]);
    expect(locatePlugin(tree)).toEqual({
      rootDir: "foo.koplugin",
      entryFilePresent: true,
      metaFilePresent: true,
      layoutKind: "subdir",
    });
  });

  it("takes the first complete subdirectory", () => {
    const tree = dirNode("repo", [dirNode("a.koplugin", [main(), meta()]), dirNode("b.koplugin", [main(), meta()])]);
    expect(locatePlugin(tree)?.rootDir).toBe("a.koplugin");
  });

  it("skips unexpanded subdirectories", () => {
    const tree = dirNode("repo", [dirNode("unlisted"), fileNode("README.md")]);
    expect(locatePlugin(tree)).toBeNull();
  });

  it("detects a split layout", () => {
    const tree = dirNode("repo", [main(), dirNode("meta", [meta()])]);
    expect(locatePlugin(tree)).toEqual({ rootDir: "", entryFilePresent: true, metaFilePresent: true, layoutKind: "split" });
  });

  it("does not use the degraded rules unless asked", () => {
    const tree = dirNode("extract", [dirNode("myrepo-main", [dirNode("mypatch.koplugin", [main(), meta()])])]);
    expect(locatePlugin(tree)).toBeNull();
  });

  it("finds a nested .koplugin directory in degraded mode", () => {
    const tree = dirNode("extract", [dirNode("myrepo-main", [fileNode("LICENSE"), dirNode("mypatch.koplugin", [main(), meta()])])]);
    expect(locatePlugin(tree, { degraded: true })).toEqual({
      rootDir: "myrepo-main/mypatch.koplugin",
      entryFilePresent: true,
      metaFilePresent: true,
      layoutKind: "degraded",
    });
  });

  it("ignores nested directories without the plugin suffix in degraded mode", () => {
    const tree = dirNode("extract", [dirNode("myrepo-main", [dirNode("src", [dirNode("plugin", [main(), meta()])])])]);
    expect(locatePlugin(tree, { degraded: true })).toBeNull();
  });

  it("falls back to a weak match on the entry file alone", () => {
    const tree = dirNode("extract", [dirNode("tool-main", [main(), fileNode("README.md")])]);
    expect(locatePlugin(tree, { degraded: true })).toEqual({
      rootDir: "tool-main",
      entryFilePresent: true,
      metaFilePresent: false,
      layoutKind: "weak",
    });
  });

  it("returns null for an empty tree", () => {
    expect(locatePlugin(dirNode("empty", []), { degraded: true })).toBeNull();
  });
});
