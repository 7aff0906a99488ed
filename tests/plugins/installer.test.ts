import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ArchiveInstaller, NO_ARCHIVE, NO_PLUGIN_STRUCTURE } from "../../src/plugins/installer.ts";
import { DeviceLibrary } from "../../src/plugins/device.ts";
import type { RemoteCandidate, UpdateCandidate } from "../../src/plugins/types.ts";
import { WorkDir } from "../../src/plugins/workdir.ts";
import { FakeClient, release } from "../helpers/fake-client.ts";
import { buildZip } from "../helpers/zip.ts";

const MAIN_URL = "https://github.com/dev/myrepo/archive/refs/heads/main.zip";
const MASTER_URL = "https://github.com/dev/myrepo/archive/refs/heads/master.zip";

const nestedPlugin = () =>
  buildZip({
    "myrepo-main/": "",
    "myrepo-main/README.md": "# myrepo",
    "myrepo-main/mypatch.koplugin/": "",
    "myrepo-main/mypatch.koplugin/main.lua": "return {}",
    "myrepo-main/mypatch.koplugin/_meta.lua": 'return { version = "1.0" }',
  });

let root: string;
let library: DeviceLibrary;
let client: FakeClient;
let installer: ArchiveInstaller;
let scratchBase: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "kostore-installer-"));
  library = new DeviceLibrary(join(root, "koreader"));
  scratchBase = join(root, "scratch");
  mkdirSync(scratchBase);
  client = new FakeClient();
  installer = new ArchiveInstaller(client, library);
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("ArchiveInstaller.install", () => {
  it("installs a plugin nested inside the archive's top folder", async () => {
    client.archives.set(MAIN_URL, nestedPlugin());
    const workDir = WorkDir.create(scratchBase);

    const result = await installer.install("dev", "myrepo", "main", workDir);

    const target = join(library.pluginsDir, "mypatch.koplugin");
    expect(result).toEqual({
      success: true,
      message: "myrepo installed successfully!",
      pluginName: "mypatch.koplugin",
      pluginPath: target,
    });
    expect(readdirSync(target).sort()).toEqual(["_meta.lua", "main.lua"]);
    expect(existsSync(workDir.path)).toBe(false);
  });

  it("prefers a zip asset from the latest release", async () => {
    client.releases.set(
      "dev/myrepo",
      release({ assets: [{ name: "mypatch.zip", browser_download_url: "https://dl.test/mypatch.zip" }] }),
    );
    client.archives.set("https://dl.test/mypatch.zip", nestedPlugin());

    const result = await installer.install("dev", "myrepo", "main", WorkDir.create(scratchBase));

    expect(result.success).toBe(true);
    expect(client.calls).toEqual(["release dev/myrepo", "archive https://dl.test/mypatch.zip"]);
  });

  it("falls back to the master branch archive", async () => {
    client.archives.set(MASTER_URL, nestedPlugin());

    const result = await installer.install("dev", "myrepo", "main", WorkDir.create(scratchBase));

    expect(result.success).toBe(true);
    expect(client.calls).toEqual(["release dev/myrepo", `archive ${MAIN_URL}`, `archive ${MASTER_URL}`]);
  });

  it("fails without touching the disk when no archive is available", async () => {
    const workDir = WorkDir.create(scratchBase);

    const result = await installer.install("dev", "myrepo", "main", workDir);

    expect(result).toEqual({ success: false, message: NO_ARCHIVE });
    expect(existsSync(workDir.path)).toBe(false);
    expect(existsSync(library.pluginsDir)).toBe(false);
  });

  it("leaves the work directory behind when no plugin is found", async () => {
    client.archives.set(MAIN_URL, buildZip({ "myrepo-main/": "", "myrepo-main/README.md": "nothing" }));
    const workDir = WorkDir.create(scratchBase);

    const result = await installer.install("dev", "myrepo", "main", workDir);

    expect(result).toEqual({ success: false, message: NO_PLUGIN_STRUCTURE });
    expect(existsSync(join(workDir.path, "archive.zip"))).toBe(true);
  });

  it("reports a corrupt archive as an error result", async () => {
    client.archives.set(MAIN_URL, new TextEncoder().encode("not a zip"));

    const result = await installer.install("dev", "myrepo", "main", WorkDir.create(scratchBase));

    expect(result.success).toBe(false);
    expect(result.message.startsWith("Error: ")).toBe(true);
  });

  it("names a root-level plugin after the repository", async () => {
    client.archives.set(MAIN_URL, buildZip({ "main.lua": "return {}", "_meta.lua": "return {}" }));

    const result = await installer.install("dev", "myrepo", "main", WorkDir.create(scratchBase));

    expect(result.pluginName).toBe("myrepo.koplugin");
  });

  it("replaces an existing installation", async () => {
    const target = join(library.pluginsDir, "mypatch.koplugin");
    mkdirSync(target, { recursive: true });
    writeFileSync(join(target, "stale.lua"), "old");
    client.archives.set(MAIN_URL, nestedPlugin());

    await installer.install("dev", "myrepo", "main", WorkDir.create(scratchBase));

    expect(readdirSync(target).sort()).toEqual(["_meta.lua", "main.lua"]);
    expect(readFileSync(join(target, "_meta.lua"), "utf-8")).toBe('return { version = "1.0" }');
  });

  it("refuses to reuse a work directory", async () => {
    client.archives.set(MAIN_URL, nestedPlugin());
    const workDir = WorkDir.create(scratchBase);
    await installer.install("dev", "myrepo", "main", workDir);

    await expect(installer.install("dev", "myrepo", "main", workDir)).rejects.toThrow("already in use");
  });

  it("reports progress", async () => {
    client.archives.set(MAIN_URL, nestedPlugin());
    const messages: string[] = [];

    await installer.install("dev", "myrepo", "main", WorkDir.create(scratchBase), {
      onProgress: (m) => messages.push(m),
    });

    expect(messages).toEqual([
      "Downloading myrepo (main)...",
      "Extracting...",
      "Analyzing plugin structure...",
      "Installing...",
    ]);
  });
});

describe("ArchiveInstaller.installUpdate", () => {
  const candidate: RemoteCandidate = {
    id: 1,
    name: "myrepo",
    owner: "dev",
    description: "",
    topics: new Set(),
    updatedAt: "2025-01-01T00:00:00Z",
    stars: 0,
    repoType: "plugin",
  };

  function update(overrides: Partial<UpdateCandidate> = {}): UpdateCandidate {
    return {
      pluginName: "mypatch.koplugin",
      installedVersion: "0.9",
      latestVersion: "v1.0.0",
      updateType: "release",
      candidate,
      ...overrides,
    };
  }

  it("downloads the known URL first", async () => {
    client.archives.set("https://github.com/dev/myrepo/archive/v1.0.0.zip", nestedPlugin());

    const result = await installer.installUpdate(
      update({ downloadUrl: "https://github.com/dev/myrepo/archive/v1.0.0.zip" }),
      WorkDir.create(scratchBase),
    );

    expect(result.message).toBe("myrepo updated successfully!");
    expect(client.calls).toEqual(["archive https://github.com/dev/myrepo/archive/v1.0.0.zip"]);
  });

  it("falls back to the regular sources without a URL", async () => {
    client.archives.set(MAIN_URL, nestedPlugin());

    const result = await installer.installUpdate(update({ updateType: "commit" }), WorkDir.create(scratchBase));

    expect(result.success).toBe(true);
    expect(client.calls).toEqual(["release dev/myrepo", `archive ${MAIN_URL}`]);
  });
});

describe("ArchiveInstaller.installPatches", () => {
  it("writes every patch into the patches folder", async () => {
    client.raw.set("https://raw.test/2-a.lua", "-- a");
    client.raw.set("https://raw.test/3-b.lua", "-- b");

    const result = await installer.installPatches([
      { name: "2-a.lua", downloadUrl: "https://raw.test/2-a.lua" },
      { name: "3-b.lua", downloadUrl: "https://raw.test/3-b.lua" },
    ]);

    expect(result).toEqual({
      success: true,
      message: "2 patches installed successfully!",
      installedNames: ["2-a.lua", "3-b.lua"],
    });
    expect(readFileSync(join(library.patchesDir, "3-b.lua"), "utf-8")).toBe("-- b");
  });

  it("aborts on the first failure without rolling back", async () => {
    client.raw.set("https://raw.test/2-a.lua", "-- a");

    const result = await installer.installPatches([
      { name: "2-a.lua", downloadUrl: "https://raw.test/2-a.lua" },
      { name: "3-b.lua", downloadUrl: "https://raw.test/3-b.lua" },
      { name: "4-c.lua", downloadUrl: "https://raw.test/4-c.lua" },
    ]);

    expect(result).toEqual({
      success: false,
      message: "Error: GitHub error 404: Not Found",
      installedNames: ["2-a.lua"],
    });
    expect(existsSync(join(library.patchesDir, "2-a.lua"))).toBe(true);
    expect(client.calls).not.toContain("raw https://raw.test/4-c.lua");
  });

  it("fails on an empty selection", async () => {
    expect(await installer.installPatches([])).toEqual({ success: false, message: "No patches found" });
  });
});

describe("ArchiveInstaller.uninstall", () => {
  it("removes an installed plugin by bare name", () => {
    const target = join(library.pluginsDir, "reader.koplugin");
    mkdirSync(target, { recursive: true });
    writeFileSync(join(target, "main.lua"), "");

    const result = installer.uninstall("reader");

    expect(result).toEqual({
      success: true,
      message: "reader.koplugin uninstalled successfully!",
      pluginName: "reader.koplugin",
      pluginPath: target,
    });
    expect(existsSync(target)).toBe(false);
  });

  it("refuses names that leave the plugins folder", () => {
    mkdirSync(library.pluginsDir, { recursive: true });
    const outside = join(root, "victim.koplugin");
    mkdirSync(outside);

    expect(installer.uninstall("../../victim")).toEqual({
      success: false,
      message: 'Invalid plugin name "../../victim"',
    });
    expect(installer.uninstall("..")).toMatchObject({ success: false, message: 'Invalid plugin name ".."' });
    expect(installer.uninstall("nested/reader")).toMatchObject({ success: false });
    expect(existsSync(outside)).toBe(true);
  });

  it("reports a missing plugin as not installed", () => {
    expect(installer.uninstall("ghost.koplugin")).toEqual({
      success: false,
      message: "Plugin ghost.koplugin is not installed",
      pluginName: "ghost.koplugin",
    });
  });
});
