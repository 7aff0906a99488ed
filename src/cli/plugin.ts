import type { Command } from "commander";
import chalk from "chalk";
import { DEFAULT_BRANCH, canonicalPluginName } from "../plugins/constants.ts";
import { ArchiveInstaller } from "../plugins/installer.ts";
import { UpdateResolver } from "../plugins/resolver.ts";
import { startTask } from "../plugins/task.ts";
import type { InstallResult, UpdateCandidate } from "../plugins/types.ts";
import { formatVersionDisplay } from "../plugins/version.ts";
import { WorkDir } from "../plugins/workdir.ts";
import { CliError, ErrorCode, EXIT_FAILURE, EXIT_NOT_FOUND, handleError } from "../utils/errors.ts";
import { formatDate, padEnd, updateTypeColor } from "../utils/format.ts";
import { createClient, loadCatalog, parseRepoRef, reportQueryFailures, resolveLibrary, runTask } from "./context.ts";

function reportInstall(result: InstallResult): void {
  if (!result.success) {
    throw new CliError(result.message, { code: EXIT_FAILURE, errorCode: ErrorCode.INSTALL_FAILED });
  }
  console.log(chalk.green(result.message));
  if (result.pluginPath) console.log(chalk.dim(`  ${result.pluginPath}`));
}

function printUpdates(updates: readonly UpdateCandidate[]): void {
  for (const u of updates) {
    const color = updateTypeColor(u.updateType);
    const when = u.publishedAt ? chalk.dim(` (${formatDate(u.publishedAt)})`) : "";
    console.log(
      `  ${padEnd(chalk.bold(u.pluginName), 34)} ${formatVersionDisplay(u.installedVersion)} ${chalk.dim("->")} ${color(u.latestVersion)} ${chalk.dim(`[${u.updateType}]`)}${when}`,
    );
  }
}

export function registerPluginCommand(program: Command): void {
  // ── kostore list ──
  program
    .command("list")
    .description("List plugins and patches installed on the device")
    .action(() => {
      try {
        const library = resolveLibrary(program);
        const plugins = library.listInstalled();
        const patches = library.listPatches();

        console.log(chalk.bold(`Plugins (${plugins.length})`));
        if (plugins.length === 0) console.log(chalk.dim("  No plugins installed."));
        for (const p of plugins) {
          const meta = p.hasMeta ? "" : chalk.yellow(" (no metadata)");
          console.log(`  ${padEnd(chalk.bold(p.canonicalName), 34)} ${chalk.cyan(formatVersionDisplay(p.version))}${meta}`);
        }

        console.log("");
        console.log(chalk.bold(`Patches (${patches.length})`));
        if (patches.length === 0) console.log(chalk.dim("  No patches installed."));
        for (const name of patches) console.log(`  ${name}`);
      } catch (err) {
        handleError(err);
      }
    });

  // ── kostore check ──
  program
    .command("check")
    .description("Check installed plugins for updates")
    .action(async () => {
      try {
        const library = resolveLibrary(program);
        const client = createClient();
        const installed = library.listInstalled();
        if (installed.length === 0) {
          console.log(chalk.dim("No plugins installed."));
          return;
        }

        const updates = await runTask(
          startTask(async (progress) => {
            const result = await loadCatalog(client, progress);
            reportQueryFailures(result);
            return new UpdateResolver(client).resolveAll(installed, result.catalog, progress);
          }),
        );

        if (updates.length === 0) {
          console.log(chalk.green("All plugins are up to date."));
          return;
        }
        console.log(chalk.bold(`Updates available (${updates.length})`));
        printUpdates(updates);
        console.log("");
        console.log(chalk.dim("Run `kostore update` to install them."));
      } catch (err) {
        handleError(err);
      }
    });

  // ── kostore install <owner/repo> ──
  program
    .command("install")
    .description("Install a plugin from a GitHub repository")
    .argument("<repo>", "owner/repo")
    .option("-b, --branch <branch>", "Branch to download when there is no release", DEFAULT_BRANCH)
    .action(async (ref: string, opts: { branch: string }) => {
      try {
        const { owner, repo } = parseRepoRef(ref);
        const library = resolveLibrary(program);
        const installer = new ArchiveInstaller(createClient(), library);
        const result = await runTask(
          startTask((progress) => installer.install(owner, repo, opts.branch, WorkDir.create(), { onProgress: progress })),
        );
        reportInstall(result);
      } catch (err) {
        handleError(err);
      }
    });

  // ── kostore update [name] ──
  program
    .command("update")
    .description("Install available updates (all, or one plugin)")
    .argument("[name]", "Installed plugin name")
    .action(async (name: string | undefined) => {
      try {
        const library = resolveLibrary(program);
        const client = createClient();
        let installed = library.listInstalled();
        if (name) {
          const wanted = canonicalPluginName(name);
          installed = installed.filter((p) => p.canonicalName === wanted);
          if (installed.length === 0) {
            throw new CliError(`Plugin ${wanted} is not installed`, {
              code: EXIT_NOT_FOUND,
              errorCode: ErrorCode.NOT_FOUND,
              suggestion: "Run `kostore list` to see installed plugins.",
            });
          }
        }

        const installer = new ArchiveInstaller(client, library);
        const results = await runTask(
          startTask(async (progress) => {
            const catalog = await loadCatalog(client, progress);
            reportQueryFailures(catalog);
            const updates = await new UpdateResolver(client).resolveAll(installed, catalog.catalog, progress);
            const out: InstallResult[] = [];
            for (const update of updates) {
              out.push(await installer.installUpdate(update, WorkDir.create(), { onProgress: progress }));
            }
            return out;
          }),
        );

        if (results.length === 0) {
          console.log(chalk.green("All plugins are up to date."));
          return;
        }
        let failed = 0;
        for (const r of results) {
          if (r.success) {
            console.log(chalk.green(r.message));
          } else {
            failed++;
            console.error(chalk.red(r.message));
          }
        }
        if (failed > 0) {
          throw new CliError(`${failed} update(s) failed.`, { code: EXIT_FAILURE, errorCode: ErrorCode.INSTALL_FAILED });
        }
      } catch (err) {
        handleError(err);
      }
    });

  // ── kostore uninstall <name> ──
  program
    .command("uninstall")
    .description("Remove an installed plugin")
    .argument("<name>", "Plugin name, with or without .koplugin")
    .action((name: string) => {
      try {
        const library = resolveLibrary(program);
        const result = new ArchiveInstaller(createClient(), library).uninstall(name);
        if (!result.success) {
          console.log(chalk.yellow(result.message));
          return;
        }
        console.log(chalk.green(result.message));
      } catch (err) {
        handleError(err);
      }
    });
}
