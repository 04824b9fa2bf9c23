/** Load and manage configuration from ~/.config/clickup-import/config.toml. */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseToml } from "smol-toml";
import { ConfigurationError } from "./errors.js";
import type { Config } from "./types.js";

const CONFIG_DIR = join(homedir(), ".config", "clickup-import");
export const CONFIG_PATH = join(CONFIG_DIR, "config.toml");

export const DEFAULT_BASE_URL = "https://api.clickup.com/api/v2";

function defaults(): Config {
  return {
    clickup: { api_token: "", list_id: "", base_url: DEFAULT_BASE_URL },
  };
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadConfig(path: string = CONFIG_PATH): Config {
  const cfg = defaults();

  if (!existsSync(path)) {
    return cfg;
  }

  let userCfg: Record<string, unknown>;
  try {
    userCfg = parseToml(readFileSync(path, "utf-8"));
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Cannot read config file ${path}: ${msg}`);
  }

  const section = userCfg.clickup;
  if (isTable(section)) {
    for (const key of Object.keys(cfg.clickup) as (keyof Config["clickup"])[]) {
      const value = section[key];
      if (typeof value === "string") cfg.clickup[key] = value;
    }
  }

  return cfg;
}

export function configExists(path: string = CONFIG_PATH): boolean {
  return existsSync(path);
}

export function createDefaultConfig(
  apiToken: string = "",
  path: string = CONFIG_PATH,
): string {
  mkdirSync(dirname(path), { recursive: true });

  const content = `[clickup]
api_token = ${JSON.stringify(apiToken)}
list_id = ""
# base_url = "${DEFAULT_BASE_URL}"
`;

  writeFileSync(path, content, "utf-8");
  return path;
}

export interface Settings {
  token: string;
  listId: string;
  baseUrl: string;
}

/**
 * Pick each setting from the command line, then the environment, then the
 * config file. Missing token or list id is a ConfigurationError.
 */
export function resolveSettings(
  cli: { apiToken?: string; listId?: string },
  env: NodeJS.ProcessEnv,
  config: Config,
): Settings {
  const token = cli.apiToken || env.CLICKUP_API_TOKEN || config.clickup.api_token;
  if (!token) {
    throw new ConfigurationError(
      "API token is required. Provide it via --api-token, the CLICKUP_API_TOKEN " +
        "environment variable, or api_token in the config file.",
    );
  }

  const listId = cli.listId || env.CLICKUP_LIST_ID || config.clickup.list_id;
  if (!listId) {
    throw new ConfigurationError(
      "List ID is required. Provide it via --list-id, the CLICKUP_LIST_ID " +
        "environment variable, or list_id in the config file.",
    );
  }

  return { token, listId, baseUrl: config.clickup.base_url || DEFAULT_BASE_URL };
}
