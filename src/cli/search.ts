import type { Command } from "commander";
import chalk from "chalk";
import { getReadme } from "../api/readme.ts";
import { startTask } from "../plugins/task.ts";
import type { RemoteCandidate, RepoType } from "../plugins/types.ts";
import { CliError, ErrorCode, EXIT_USAGE, handleError } from "../utils/errors.ts";
import {
  getDescriptionWidth,
  NAME_WIDTH,
  padEnd,
  repoTypeLabel,
  STARS_WIDTH,
  truncate,
  TYPE_WIDTH,
} from "../utils/format.ts";
import { createClient, loadCatalog, parseRepoRef, reportQueryFailures, runTask } from "./context.ts";

interface SearchOpts {
  deep?: boolean;
  json?: boolean;
  type?: string;
  filter?: string;
}

function parseTypeFilter(value: string | undefined): RepoType | undefined {
  if (value === undefined) return undefined;
  if (value === "plugin" || value === "patch") return value;
  throw new CliError(`Invalid type "${value}".`, {
    code: EXIT_USAGE,
    errorCode: ErrorCode.VALIDATION,
    suggestion: "Use --type plugin or --type patch.",
  });
}

function toJson(c: RemoteCandidate): Record<string, unknown> {
  return {
    id: c.id,
    name: c.name,
    owner: c.owner,
    type: c.repoType,
    description: c.description,
    topics: [...c.topics],
    stars: c.stars,
    updated_at: c.updatedAt,
    url: c.htmlUrl,
  };
}

function printCatalog(catalog: readonly RemoteCandidate[]): void {
  const descWidth = getDescriptionWidth();
  console.log(
    chalk.bold(`${padEnd("Repository", NAME_WIDTH)} ${padEnd("Type", TYPE_WIDTH)} ${padEnd("Stars", STARS_WIDTH)} Description`),
  );
  console.log(chalk.dim("-".repeat(NAME_WIDTH + TYPE_WIDTH + STARS_WIDTH + 3 + Math.min(descWidth, 40))));
  for (const c of catalog) {
    const name = truncate(`${c.owner}/${c.name}`, NAME_WIDTH);
    const stars = chalk.yellow(String(c.stars));
    const desc = chalk.dim(truncate(c.description || "(no description)", descWidth));
    console.log(`${padEnd(name, NAME_WIDTH)} ${padEnd(repoTypeLabel(c.repoType), TYPE_WIDTH)} ${padEnd(stars, STARS_WIDTH)} ${desc}`);
  }
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search")
    .description("Search GitHub for KOReader plugins and patches")
    .option("--deep", "Inspect rejected plugin repositories for a plugin layout (slow)")
    .option("--type <type>", "Only show plugin or patch repositories")
    .option("--filter <text>", "Only show repositories whose name or description contains text")
    .option("--json", "Output JSON")
    .action(async (opts: SearchOpts) => {
      try {
        const type = parseTypeFilter(opts.type);
        const client = createClient();
        const result = await runTask(startTask((progress) => loadCatalog(client, progress, opts.deep)));
        reportQueryFailures(result);

        const needle = opts.filter?.toLowerCase();
        const catalog = result.catalog.filter(
          (c) =>
            (!type || c.repoType === type) &&
            (!needle || c.name.toLowerCase().includes(needle) || c.description.toLowerCase().includes(needle)),
        );

        if (opts.json) {
          console.log(JSON.stringify(catalog.map(toJson), null, 2));
          return;
        }
        if (catalog.length === 0) {
          console.log(chalk.dim("No repositories found."));
          return;
        }
        printCatalog(catalog);
        console.log("");
        console.log(chalk.dim(`${catalog.length} repositories`));
      } catch (err) {
        handleError(err);
      }
    });

  program
    .command("readme")
    .description("Show the README of a repository")
    .argument("<repo>", "owner/repo")
    .action(async (ref: string) => {
      try {
        const { owner, repo } = parseRepoRef(ref);
        const text = await getReadme(createClient(), owner, repo);
        console.log(text);
      } catch (err) {
        handleError(err);
      }
    });
}
