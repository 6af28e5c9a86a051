/**
 * Config schema and defaults.
 */

/**
 * Defaults.
 */
export const DEFAULTS = {
  // paths
  DATA_DIR_NAME: "hearth",
  DOWNLOADS_DIR_NAME: "Downloads",

  // Java
  JAVA_PATH: "java",

  // offline profile
  PLAYER_NAME: "Player",
  PLAYER_UUID: "00000000-0000-0000-0000-000000000000",
} as const;

/**
 * Paths section.
 */
export type PathsConfig = {
  data_home?: string;
  downloads_dir?: string;
};

/**
 * Network section.
 */
export type NetworkConfig = {
  user_agent?: string;
};

export type CurseForgeConfig = {
  api_key?: string;
};

/**
 * Java section.
 */
export type JavaConfig = {
  path?: string;
  args?: string[];
};

/**
 * Offline player profile.
 */
export type PlayerConfig = {
  name?: string;
  uuid?: string;
};

/**
 * Everything `hearth.config.yml` may contain.
 */
export type HearthConfigSchema = {
  paths?: PathsConfig;
  network?: NetworkConfig;
  curseforge?: CurseForgeConfig;
  java?: JavaConfig;
  player?: PlayerConfig;
};

/**
 * Config with every default applied.
 */
export type ResolvedConfig = {
  paths: {
    dataHome: string;
    assetsDir: string;
    librariesDir: string;
    cacheDir: string;
    downloadsDir: string;
  };
  network: {
    userAgent: string;
  };
  curseforge: {
    apiKey?: string;
  };
  java: {
    path: string;
    args: string[];
  };
  player: {
    name: string;
    uuid: string;
  };
};
