import type { Command } from "commander";
import chalk from "chalk";
import { setToken } from "../config/index.ts";
import { CliError, EXIT_USAGE, handleError } from "../utils/errors.ts";
import { createClient } from "./context.ts";

export function registerAuthCommand(program: Command): void {
  program
    .command("auth")
    .description("Store a GitHub token to raise the API rate limit")
    .argument("<token>", "GitHub personal access token")
    .action(async (input: string) => {
      try {
        const token = input.trim();
        if (!token) {
          throw new CliError("Token cannot be empty.", { code: EXIT_USAGE });
        }
        setToken(token);

        const client = createClient();
        await client.searchRepositories("topic:koreader-plugin");
        console.log(chalk.green("Token saved and accepted by GitHub."));
      } catch (err) {
        handleError(err);
      }
    });
}
