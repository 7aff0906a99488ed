import { describe, it, expect, afterAll } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { WorkDir } from "../../src/plugins/workdir.ts";

describe("WorkDir", () => {
  const base = mkdtempSync(join(tmpdir(), "kostore-workdir-"));

  afterAll(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it("creates distinct paths without touching the disk", () => {
    const a = WorkDir.create(base);
    const b = WorkDir.create(base);
    expect(a.path).not.toBe(b.path);
    expect(a.path.startsWith(join(base, "kostore-"))).toBe(true);
    expect(existsSync(a.path)).toBe(false);
  });

  it("can be claimed once", () => {
    const dir = WorkDir.create(base);
    dir.claim();
    expect(dir.isClaimed).toBe(true);
    expect(() => dir.claim()).toThrow(`Work directory ${dir.path} is already in use`);
  });

  it("prepares and disposes the directory", () => {
    const dir = WorkDir.create(base);
    writeFileSync(join(dir.prepare(), "archive.zip"), "x");
    expect(existsSync(join(dir.path, "archive.zip"))).toBe(true);

    dir.dispose();
    expect(existsSync(dir.path)).toBe(false);
  });
});
