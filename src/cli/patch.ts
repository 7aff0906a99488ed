import type { Command } from "commander";
import chalk from "chalk";
import { ArchiveInstaller } from "../plugins/installer.ts";
import { findAllPatchFiles, listPatchFiles } from "../plugins/patches.ts";
import { startTask } from "../plugins/task.ts";
import type { PatchFile } from "../plugins/types.ts";
import { CliError, ErrorCode, EXIT_FAILURE, EXIT_NOT_FOUND, handleError } from "../utils/errors.ts";
import { formatFileSize, padEnd } from "../utils/format.ts";
import { createClient, parseRepoRef, resolveLibrary, runTask } from "./context.ts";

interface PatchesOpts {
  install?: boolean;
  all?: boolean;
  only?: string[];
}

function selectPatches(patches: readonly PatchFile[], only: readonly string[] | undefined): PatchFile[] {
  if (!only || only.length === 0) return [...patches];
  const missing = only.filter((name) => !patches.some((p) => p.name === name));
  if (missing.length > 0) {
    throw new CliError(`Unknown patch file(s): ${missing.join(", ")}`, {
      code: EXIT_NOT_FOUND,
      errorCode: ErrorCode.NOT_FOUND,
    });
  }
  return patches.filter((p) => only.includes(p.name));
}

export function registerPatchCommand(program: Command): void {
  program
    .command("patches")
    .description("List (and optionally install) user patches from a repository")
    .argument("<repo>", "owner/repo")
    .option("--all", "Include every patch-like file in the repository, not just root user patches")
    .option("--only <names...>", "Restrict to these file names")
    .option("-i, --install", "Install the listed patches into the device's patches folder")
    .action(async (ref: string, opts: PatchesOpts) => {
      try {
        const { owner, repo } = parseRepoRef(ref);
        const client = createClient();
        const found = opts.all ? await findAllPatchFiles(client, owner, repo) : await listPatchFiles(client, owner, repo);
        const patches = selectPatches(found, opts.only);

        if (patches.length === 0) {
          console.log(chalk.dim("No patches found."));
          return;
        }

        if (!opts.install) {
          console.log(chalk.bold(`Patches in ${owner}/${repo}`));
          for (const p of patches) {
            const size = p.size !== undefined ? chalk.dim(formatFileSize(p.size)) : "";
            console.log(`  ${padEnd(p.path ?? p.name, 48)} ${size}`);
          }
          return;
        }

        const installer = new ArchiveInstaller(client, resolveLibrary(program));
        const result = await runTask(startTask((progress) => installer.installPatches(patches, { onProgress: progress })));
        if (!result.success) {
          throw new CliError(result.message, { code: EXIT_FAILURE, errorCode: ErrorCode.INSTALL_FAILED });
        }
        console.log(chalk.green(result.message));
      } catch (err) {
        handleError(err);
      }
    });
}
