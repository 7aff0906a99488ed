import { mkdirSync, readFileSync, writeFileSync, existsSync } from "fs";
import TOML from "@iarna/toml";
import { CliError, EXIT_USAGE } from "../utils/errors.ts";
import { CONFIG_DIR, CONFIG_PATH } from "./paths.ts";

export { CONFIG_DIR };

export interface NetworkConfig {
  timeout: number;           // seconds, metadata requests
  download_timeout: number;  // seconds, archive downloads
  retry_count: number;
}

export interface SearchConfig {
  topics: string[];
  name_patterns: string[];
}

export interface Config {
  auth: { github_token?: string };
  device: { path?: string };
  network: NetworkConfig;
  search: SearchConfig;
}

const KNOWN_TOP_LEVEL_KEYS = new Set(["auth", "device", "network", "search"]);

export const DEFAULT_NETWORK: NetworkConfig = {
  timeout: 10,
  download_timeout: 30,
  retry_count: 2,
};

export const DEFAULT_SEARCH: SearchConfig = {
  topics: ["koreader-plugin", "koreader-user-patch"],
  name_patterns: ["koplugin", "koreader patches"],
};

export function defaultConfig(): Config {
  return {
    auth: {},
    device: {},
    network: { ...DEFAULT_NETWORK },
    search: {
      topics: [...DEFAULT_SEARCH.topics],
      name_patterns: [...DEFAULT_SEARCH.name_patterns],
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function readPositiveInt(
  section: Record<string, unknown>,
  key: keyof NetworkConfig,
  fallback: number,
  errors: string[],
  allowZero = false,
): number {
  const value = section[key];
  if (value === undefined) return fallback;
  const min = allowZero ? 0 : 1;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    const expected = allowZero ? "a non-negative integer" : "a positive integer";
    errors.push(`Config error: network.${key} must be ${expected}, got ${JSON.stringify(value)}`);
    return fallback;
  }
  return value;
}

/**
 * Validates a raw parsed config object and returns a typed Config merged over
 * the defaults. All problems are collected into a single CliError; unknown
 * top-level keys only produce a warning on stderr.
 */
export function validateConfig(raw: unknown): Config {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;

  if (!isPlainObject(raw)) {
    throw new CliError("Config error: configuration must be an object", {
      code: EXIT_USAGE,
    });
  }

  const errors: string[] = [];

  for (const key of Object.keys(raw)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      console.error(`Config warning: unknown top-level key "${key}" will be ignored`);
    }
  }

  if (raw.auth !== undefined) {
    if (!isPlainObject(raw.auth)) {
      errors.push("Config error: auth must be an object");
    } else if (raw.auth.github_token !== undefined) {
      if (typeof raw.auth.github_token !== "string") {
        errors.push(`Config error: auth.github_token must be a string, got ${JSON.stringify(raw.auth.github_token)}`);
      } else {
        config.auth.github_token = raw.auth.github_token;
      }
    }
  }

  if (raw.device !== undefined) {
    if (!isPlainObject(raw.device)) {
      errors.push("Config error: device must be an object");
    } else if (raw.device.path !== undefined) {
      if (typeof raw.device.path !== "string" || raw.device.path.trim() === "") {
        errors.push(`Config error: device.path must be a non-empty string, got ${JSON.stringify(raw.device.path)}`);
      } else {
        config.device.path = raw.device.path;
      }
    }
  }

  if (raw.network !== undefined) {
    if (!isPlainObject(raw.network)) {
      errors.push("Config error: network must be an object");
    } else {
      config.network = {
        timeout: readPositiveInt(raw.network, "timeout", DEFAULT_NETWORK.timeout, errors),
        download_timeout: readPositiveInt(raw.network, "download_timeout", DEFAULT_NETWORK.download_timeout, errors),
        retry_count: readPositiveInt(raw.network, "retry_count", DEFAULT_NETWORK.retry_count, errors, true),
      };
    }
  }

  if (raw.search !== undefined) {
    if (!isPlainObject(raw.search)) {
      errors.push("Config error: search must be an object");
    } else {
      for (const key of ["topics", "name_patterns"] as const) {
        const value = raw.search[key];
        if (value === undefined) continue;
        if (!isStringArray(value)) {
          errors.push(`Config error: search.${key} must be an array of strings, got ${JSON.stringify(value)}`);
        } else {
          config.search[key] = value;
        }
      }
    }
  }

  if (errors.length > 0) {
    throw new CliError(errors.join("\n"), { code: EXIT_USAGE });
  }

  return config;
}

function toToml(config: Config): TOML.JsonMap {
  const map: TOML.JsonMap = {
    network: { ...config.network },
    search: {
      topics: [...config.search.topics],
      name_patterns: [...config.search.name_patterns],
    },
  };
  if (config.auth.github_token) map.auth = { github_token: config.auth.github_token };
  if (config.device.path) map.device = { path: config.device.path };
  return map;
}

function ensureConfigDir(): void {
  if (!existsSync(CONFIG_DIR)) {
    mkdirSync(CONFIG_DIR, { recursive: true });
  }
}

export function getConfig(): Config {
  if (!existsSync(CONFIG_PATH)) return defaultConfig();
  const raw = readFileSync(CONFIG_PATH, "utf-8");
  let parsed: TOML.JsonMap;
  try {
    parsed = TOML.parse(raw);
  } catch (err) {
    throw new CliError(`Config error: ${CONFIG_PATH} is not valid TOML (${err instanceof Error ? err.message : String(err)})`, {
      code: EXIT_USAGE,
    });
  }
  return validateConfig(parsed);
}

export function saveConfig(config: Config): void {
  ensureConfigDir();
  writeFileSync(CONFIG_PATH, TOML.stringify(toToml(config)), "utf-8");
}

/** GITHUB_TOKEN in the environment wins over the stored token. */
export function getToken(): string | undefined {
  const fromEnv = process.env.GITHUB_TOKEN;
  if (fromEnv) return fromEnv;
  return getConfig().auth.github_token;
}

export function setToken(token: string): void {
  const config = getConfig();
  config.auth = { ...config.auth, github_token: token };
  saveConfig(config);
}

export function getDevicePath(): string | undefined {
  return getConfig().device.path;
}

export function setDevicePath(path: string): void {
  const config = getConfig();
  config.device = { path };
  saveConfig(config);
}

export function getNetworkConfig(): NetworkConfig {
  return getConfig().network;
}

export function getSearchConfig(): SearchConfig {
  return getConfig().search;
}
