#!/usr/bin/env tsx
import { program } from "commander";
import chalk from "chalk";
import { registerAuthCommand } from "./auth.ts";
import { registerDeviceCommand } from "./device.ts";
import { registerPatchCommand } from "./patch.ts";
import { registerPluginCommand } from "./plugin.ts";
import { registerSearchCommand } from "./search.ts";
import { didYouMean, EXIT_USAGE, handleError, setDebug, debug } from "../utils/errors.ts";
import { initLogger, getLogger } from "../utils/logger.ts";

program
  .name("kostore")
  .description("Find, install and update KOReader plugins and patches from GitHub")
  .version("0.1.0")
  .option("--device <path>", "KOReader folder on the device (default: configured or auto-detected)")
  .option("--debug", "Enable debug output")
  .hook("preAction", () => {
    if (program.opts().debug) {
      setDebug(true);
      debug("Debug mode enabled");
    }
  });

registerSearchCommand(program);
registerPluginCommand(program);
registerPatchCommand(program);
registerDeviceCommand(program);
registerAuthCommand(program);

async function main(): Promise<void> {
  initLogger();
  const log = getLogger("cli");
  log.info("Starting kostore v" + program.version());

  const knownCommands = program.commands.map((c) => c.name());

  // "Did you mean?" for unknown commands
  program.on("command:*", (operands: string[]) => {
    const unknown = operands[0];
    if (unknown) {
      const suggestion = didYouMean(unknown, knownCommands);
      console.error(chalk.red(`Unknown command: ${unknown}`));
      if (suggestion) {
        console.error(chalk.yellow(`Did you mean: ${chalk.bold(suggestion)}?`));
      }
      console.error(chalk.dim("Run 'kostore --help' for usage information."));
      process.exit(EXIT_USAGE);
    }
  });

  await program.parseAsync();
}

main().catch(handleError);
