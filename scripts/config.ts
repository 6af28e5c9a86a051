import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { ConfigError, isNotFound, ValidationError } from "./types/errors.ts";
import { isObject, isString, isStringArray } from "./types/guards.ts";
import { logger } from "./logger.ts";
import { getConfigWarnings } from "./config/resolve.ts";
import type { HearthConfigSchema } from "./config/schema.ts";

export const DEFAULT_CONFIG_PATH = "./hearth.config.yml";

function section(
  obj: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) {
    throw new ValidationError(`'${key}' must be a mapping.`, key);
  }
  return value;
}

function stringField(
  obj: Record<string, unknown> | undefined,
  key: string,
  field: string,
): string | undefined {
  const value = obj?.[key];
  if (value === undefined || value === null) return undefined;
  if (!isString(value)) {
    throw new ValidationError(`'${field}' must be a string.`, field);
  }
  return value;
}

/**
 * Checks the parsed YAML document against the config schema.
 */
export function parseConfig(value: unknown): HearthConfigSchema {
  if (value === undefined || value === null) return {};
  if (!isObject(value)) {
    throw new ValidationError("The config file must be a mapping.");
  }

  const paths = section(value, "paths");
  const network = section(value, "network");
  const curseforge = section(value, "curseforge");
  const java = section(value, "java");
  const player = section(value, "player");

  const javaArgs = java?.args;
  if (javaArgs !== undefined && javaArgs !== null && !isStringArray(javaArgs)) {
    throw new ValidationError("'java.args' must be a list of strings.", "java.args");
  }

  for (const warning of getConfigWarnings(value)) logger.warn(warning);

  return {
    paths: {
      data_home: stringField(paths, "data_home", "paths.data_home"),
      downloads_dir: stringField(paths, "downloads_dir", "paths.downloads_dir"),
    },
    network: { user_agent: stringField(network, "user_agent", "network.user_agent") },
    curseforge: { api_key: stringField(curseforge, "api_key", "curseforge.api_key") },
    java: {
      path: stringField(java, "path", "java.path"),
      args: isStringArray(javaArgs) ? javaArgs : undefined,
    },
    player: {
      name: stringField(player, "name", "player.name"),
      uuid: stringField(player, "uuid", "player.uuid"),
    },
  };
}

/**
 * Loads `hearth.config.yml`. A missing file is an empty config.
 */
export async function loadConfig(path = DEFAULT_CONFIG_PATH): Promise<HearthConfigSchema> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) return {};
    throw new ConfigError(`Failed to read config ${path}.`, error);
  }

  try {
    return parseConfig(parse(text));
  } catch (error) {
    throw new ConfigError(`Invalid config ${path}.`, error);
  }
}
