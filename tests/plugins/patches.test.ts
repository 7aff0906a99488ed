import { describe, it, expect } from "vitest";
import {
  collectPatchFiles,
  findAllPatchFiles,
  isUserPatchName,
  listPatchFiles,
  looksLikePatch,
} from "../../src/plugins/patches.ts";
import { dirNode, fileNode } from "../../src/plugins/tree.ts";
import { FakeClient, dir, file } from "../helpers/fake-client.ts";

describe("patch names", () => {
  it("recognises user patches by leading digit and .lua suffix", () => {
    expect(isUserPatchName("2-custom-footer.lua")).toBe(true);
    expect(isUserPatchName("custom.lua")).toBe(false);
    expect(isUserPatchName("2-notes.md")).toBe(false);
  });

  it("recognises patch-like files", () => {
    expect(looksLikePatch("fix.diff")).toBe(true);
    expect(looksLikePatch("install.sh")).toBe(true);
    expect(looksLikePatch("PATCHES.md")).toBe(true);
    expect(looksLikePatch("README.md")).toBe(false);
  });
});

describe("listPatchFiles", () => {
  it("returns root user patches only", async () => {
    const client = new FakeClient();
    client.setContents("dev", "patches", "", [
      file("2-footer.lua", { path: "2-footer.lua", sha: "abc" }),
      file("helper.lua"),
      file("README.md"),
      dir("3-folder.lua"),
    ]);

    expect(await listPatchFiles(client, "dev", "patches")).toEqual([
      {
        name: "2-footer.lua",
        downloadUrl: "https://raw.example.test/2-footer.lua",
        path: "2-footer.lua",
        size: 10,
        sha: "abc",
      },
    ]);
  });
});

describe("collectPatchFiles", () => {
  it("walks the tree and keeps downloadable patch-like files", () => {
    const tree = dirNode("repo", [
      fileNode("README.md", { downloadUrl: "https://raw.test/README.md" }),
      dirNode("screen", [
        fileNode("2-dim.lua", { downloadUrl: "https://raw.test/screen/2-dim.lua", size: 120 }),
        fileNode("local.patch"),
      ]),
    ]);

    expect(collectPatchFiles(tree)).toEqual([
      { name: "2-dim.lua", downloadUrl: "https://raw.test/screen/2-dim.lua", path: "screen/2-dim.lua", size: 120 },
    ]);
  });
});

describe("findAllPatchFiles", () => {
  it("lists patches two levels deep", async () => {
    const client = new FakeClient();
    client.setContents("dev", "patches", "", [dir("reader")]);
    client.setContents("dev", "patches", "reader", [dir("fonts")]);
    client.setContents("dev", "patches", "reader/fonts", [file("5-font.lua")]);

    const patches = await findAllPatchFiles(client, "dev", "patches");

    expect(patches.map((p) => p.path)).toEqual(["reader/fonts/5-font.lua"]);
  });
});
