import { homedir } from "os";
import { join } from "path";

export const CONFIG_DIR =
  process.env.KOSTORE_CONFIG_DIR || join(homedir(), ".config", "kostore");
export const CONFIG_PATH = join(CONFIG_DIR, "config.toml");
export const LOG_DIR = join(CONFIG_DIR, "logs");
