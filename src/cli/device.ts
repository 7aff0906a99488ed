import type { Command } from "commander";
import chalk from "chalk";
import { getDevicePath, setDevicePath } from "../config/index.ts";
import { detectDevice, getDeviceInfo } from "../plugins/device.ts";
import { CliError, ErrorCode, EXIT_NOT_FOUND, handleError } from "../utils/errors.ts";
import type { GlobalOpts } from "./context.ts";

function flag(value: boolean): string {
  return value ? chalk.green("yes") : chalk.red("no");
}

export function registerDeviceCommand(program: Command): void {
  program
    .command("device")
    .description("Detect the KOReader device and show its details")
    .option("--save", "Remember the device path in the config file")
    .action((opts: { save?: boolean }) => {
      try {
        const { device } = program.opts<GlobalOpts>();
        const path = device ?? detectDevice() ?? getDevicePath();
        if (!path) {
          throw new CliError("No KOReader device detected.", {
            code: EXIT_NOT_FOUND,
            errorCode: ErrorCode.NO_DEVICE,
            suggestion: "Mount the e-reader over USB or pass --device <path>.",
          });
        }

        const info = getDeviceInfo(path);
        console.log(chalk.bold("KOReader device"));
        console.log(`  Path:      ${info.path}`);
        console.log(`  Valid:     ${flag(info.valid)}`);
        console.log(`  Version:   ${info.version}`);
        console.log(`  Platform:  ${info.platform}`);
        if (info.valid) {
          console.log(`  Plugins:   ${flag(info.pluginsExist)}`);
          console.log(`  Patches:   ${flag(info.patchesExist)}`);
        }

        if (opts.save) {
          setDevicePath(path);
          console.log(chalk.green(`Saved device path ${path}`));
        }
      } catch (err) {
        handleError(err);
      }
    });
}
