/**
 * Config resolution: config file > environment > defaults.
 */
import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_USER_AGENT } from "../launcher/utils.ts";
import { DEFAULTS, type HearthConfigSchema, type ResolvedConfig } from "./schema.ts";

export type Env = Record<string, string | undefined>;

/**
 * First non-empty string.
 */
function coalesceString(
  ...values: Array<string | undefined | null>
): string | undefined {
  for (const value of values) {
    if (value === undefined || value === null || value === "") continue;
    return value;
  }
  return undefined;
}

/**
 * Resolves the data directory.
 */
export function resolveDataHome(
  config: HearthConfigSchema,
  env: Env,
  home: string,
): string {
  const xdg = coalesceString(env.XDG_DATA_HOME);
  return coalesceString(
    config.paths?.data_home,
    env.HEARTH_DATA_HOME,
    xdg && join(xdg, DEFAULTS.DATA_DIR_NAME),
  ) ?? join(home, ".local", "share", DEFAULTS.DATA_DIR_NAME);
}

/**
 * Applies environment values and defaults.
 */
export function resolveConfig(
  config: HearthConfigSchema,
  env: Env = process.env,
  home: string = env.HOME ?? homedir(),
): ResolvedConfig {
  const dataHome = resolveDataHome(config, env, home);
  return {
    paths: {
      dataHome,
      assetsDir: join(dataHome, "assets"),
      librariesDir: join(dataHome, "libraries"),
      cacheDir: join(dataHome, "cache"),
      downloadsDir: coalesceString(config.paths?.downloads_dir, env.XDG_DOWNLOAD_DIR) ??
        join(home, DEFAULTS.DOWNLOADS_DIR_NAME),
    },
    network: {
      userAgent: coalesceString(config.network?.user_agent) ?? DEFAULT_USER_AGENT,
    },
    curseforge: {
      apiKey: coalesceString(config.curseforge?.api_key, env.CURSE_API_KEY),
    },
    java: {
      path: coalesceString(config.java?.path) ?? DEFAULTS.JAVA_PATH,
      args: config.java?.args ?? [],
    },
    player: {
      name: coalesceString(config.player?.name) ?? DEFAULTS.PLAYER_NAME,
      uuid: coalesceString(config.player?.uuid) ?? DEFAULTS.PLAYER_UUID,
    },
  };
}

const KNOWN_SECTIONS = new Set(["paths", "network", "curseforge", "java", "player"]);

/**
 * Warnings for keys the schema does not know.
 */
export function getConfigWarnings(raw: Record<string, unknown>): string[] {
  return Object.keys(raw)
    .filter((key) => !KNOWN_SECTIONS.has(key))
    .map((key) => `Unknown config section '${key}' is ignored.`);
}
