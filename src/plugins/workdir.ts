import { randomUUID } from "crypto";
import { mkdirSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

/**
 * Scratch directory for one install. The caller creates it and hands it to
 * the installer, which claims it exactly once; a second claim throws, so two
 * installs can never share extraction state. Nothing touches the disk until
 * `prepare()`.
 */
export class WorkDir {
  readonly path: string;
  private claimed = false;

  private constructor(path: string) {
    this.path = path;
  }

  static create(base: string = tmpdir()): WorkDir {
    return new WorkDir(join(base, `kostore-${randomUUID()}`));
  }

  get isClaimed(): boolean {
    return this.claimed;
  }

  claim(): void {
    if (this.claimed) {
      throw new Error(`Work directory ${this.path} is already in use`);
    }
    this.claimed = true;
  }

  prepare(): string {
    mkdirSync(this.path, { recursive: true });
    return this.path;
  }

  dispose(): void {
    rmSync(this.path, { recursive: true, force: true });
  }
}
