import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  DeviceLibrary,
  candidatePaths,
  detectDevice,
  extractVersion,
  getDeviceInfo,
  validateInstallation,
} from "../../src/plugins/device.ts";

function makeInstallation(path: string): void {
  mkdirSync(join(path, "frontend"), { recursive: true });
  mkdirSync(join(path, "plugins"), { recursive: true });
  mkdirSync(join(path, "data"), { recursive: true });
  writeFileSync(join(path, "koreader.sh"), "#!/bin/sh\n");
}

describe("extractVersion", () => {
  it("reads double- and single-quoted versions", () => {
    expect(extractVersion('local _ = require("gettext")\nreturn { name = "x", version = "1.4.2" }')).toBe("1.4.2");
    expect(extractVersion("return { version='0.3' }")).toBe("0.3");
  });

  it("falls back to Unknown", () => {
    expect(extractVersion("return { name = 'x' }")).toBe("Unknown");
    expect(extractVersion("version = 3")).toBe("Unknown");
  });
});

describe("DeviceLibrary", () => {
  let root: string;
  let library: DeviceLibrary;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "kostore-device-"));
    library = new DeviceLibrary(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("returns nothing when the plugins folder is missing", () => {
    expect(library.listInstalled()).toEqual([]);
    expect(library.listPatches()).toEqual([]);
  });

  it("lists .koplugin directories with their versions", () => {
    const alpha = join(library.pluginsDir, "alpha.koplugin");
    const beta = join(library.pluginsDir, "beta.koplugin");
    const gamma = join(library.pluginsDir, "gamma.koplugin");
    mkdirSync(alpha, { recursive: true });
    mkdirSync(beta, { recursive: true });
    mkdirSync(gamma, { recursive: true });
    mkdirSync(join(library.pluginsDir, "notaplugin"), { recursive: true });
    writeFileSync(join(alpha, "_meta.lua"), 'return { version = "2.0" }');
    writeFileSync(join(beta, "manifest.lua"), "return { version = 'v0.5' }");

    expect(library.listInstalled()).toEqual([
      { canonicalName: "alpha.koplugin", path: alpha, version: "2.0", hasMeta: true, metaPath: join(alpha, "_meta.lua") },
      { canonicalName: "beta.koplugin", path: beta, version: "v0.5", hasMeta: true, metaPath: join(beta, "manifest.lua") },
      { canonicalName: "gamma.koplugin", path: gamma, version: "Unknown", hasMeta: false },
    ]);
  });

  it("finds a single installed plugin", () => {
    mkdirSync(library.pluginPath("alpha.koplugin"), { recursive: true });
    expect(library.findInstalled("alpha.koplugin")?.version).toBe("Unknown");
    expect(library.findInstalled("missing.koplugin")).toBeNull();
  });

  it("lists installed patch files", () => {
    mkdirSync(library.patchesDir, { recursive: true });
    writeFileSync(join(library.patchesDir, "2-b.lua"), "");
    writeFileSync(join(library.patchesDir, "1-a.lua"), "");
    writeFileSync(join(library.patchesDir, "notes.txt"), "");

    expect(library.listPatches()).toEqual(["1-a.lua", "2-b.lua"]);
  });
});

describe("device detection", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "kostore-home-"));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it("lists the macOS candidates", () => {
    expect(candidatePaths({ platform: "darwin", homedir: "/Users/me" })).toEqual([
      "/Volumes/koreader",
      "/Volumes/KOReader",
      join("/Users/me", "koreader"),
      "/Applications/koreader",
    ]);
  });

  it("validates only complete installations", () => {
    const path = join(home, "koreader");
    mkdirSync(path);
    writeFileSync(join(path, "koreader.sh"), "");
    expect(validateInstallation(path)).toBe(false);

    makeInstallation(path);
    expect(validateInstallation(path)).toBe(true);
    expect(validateInstallation(join(home, "missing"))).toBe(false);
  });

  it("detects an installation in the home folder", () => {
    makeInstallation(join(home, "koreader"));
    expect(detectDevice({ platform: "darwin", homedir: home })).toBe(join(home, "koreader"));
  });

  it("returns null when nothing is found", () => {
    expect(detectDevice({ platform: "darwin", homedir: home })).toBeNull();
  });

  it("reports device details", () => {
    const path = join(home, "koreader");
    makeInstallation(path);
    writeFileSync(join(path, "git-rev"), "v2024.11\n");

    expect(getDeviceInfo(path, "linux")).toEqual({
      path,
      valid: true,
      version: "v2024.11",
      platform: "linux",
      pluginsExist: true,
      patchesExist: false,
    });
  });

  it("reports an invalid path without details", () => {
    expect(getDeviceInfo(join(home, "nowhere"), "linux")).toMatchObject({ valid: false, version: "Unknown" });
  });
});
