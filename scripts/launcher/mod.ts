import { spawn } from "node:child_process";
import { copyFile } from "node:fs/promises";
import { basename, join } from "node:path";
import fse from "fs-extra";
import { AppError } from "../types/errors.ts";
import { logger } from "../logger.ts";
import type { ResolvedConfig } from "../config/schema.ts";
import type { Instance } from "../instance/instance.ts";
import { silentProgress, type ProgressSink } from "../terminal/progress.ts";
import { AssetStore } from "./assets.ts";
import { VersionCatalog } from "./catalog.ts";
import { composeLaunch, type LaunchVariables } from "./launch.ts";
import { clientJarPath, loaderLibraryPath } from "./maven.ts";
import { createHttpClient, type HttpClient } from "./utils.ts";
import type { RuleContext } from "./types.ts";

export const LAUNCHER_NAME = "hearth";
export const LAUNCHER_VERSION = "0.1.0";

export type LauncherServices = {
  client: HttpClient;
  catalog: VersionCatalog;
  store: AssetStore;
};

export function createLauncherServices(
  config: ResolvedConfig,
  options: { client?: HttpClient; ruleContext?: RuleContext } = {},
): LauncherServices {
  const client = options.client ?? createHttpClient(config.network.userAgent);
  const { assetsDir, librariesDir, cacheDir } = config.paths;
  return {
    client,
    catalog: new VersionCatalog({ client, cacheDir, assetsDir }),
    store: new AssetStore({
      client,
      assetsDir,
      librariesDir,
      cacheDir,
      ruleContext: options.ruleContext,
    }),
  };
}

export type GameCommand = {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
};

export type LaunchOptions = {
  services: LauncherServices;
  config: ResolvedConfig;
  sink?: ProgressSink;
};

/**
 * Resolves and downloads everything the instance needs, then returns the
 * JVM command line without running it.
 */
export async function prepareLaunch(
  instance: Instance,
  options: LaunchOptions,
): Promise<GameCommand> {
  const { catalog, store } = options.services;
  const sink = options.sink ?? silentProgress;
  const { config } = options;

  const gameManifest = await catalog.resolveGameManifest(instance.mcVersion);
  const assetManifest = await catalog.resolveAssetManifest(gameManifest);
  const loaderManifest = instance.modLoader
    ? await catalog.resolveLoaderManifest(instance.modLoader)
    : undefined;

  await store.downloadAssets(assetManifest, sink);
  await store.downloadLibraries(gameManifest, sink);
  if (loaderManifest) await store.downloadLoaderLibraries(loaderManifest, sink);

  let resourcesDir: string | undefined;
  if (assetManifest.virtual) {
    resourcesDir = store.virtualAssetsDir(gameManifest.assetIndex.id);
  } else if (assetManifest.map_to_resources) {
    resourcesDir = instance.resourcesDir;
  }
  if (resourcesDir) await store.copyResources(assetManifest, resourcesDir, sink);

  await store.extractNatives(gameManifest, instance.nativesDir, sink);
  await fse.ensureDir(instance.gameDir);

  let mainJar = instance.customJar ?? clientJarPath(gameManifest.id);
  const dist = loaderManifest?.dist;
  if (loaderManifest && dist?.kind === "legacy") {
    if (!instance.customJar) {
      mainJar = await store.makeModdedJar(gameManifest.id, loaderManifest.version, dist.jarMods);
    }
    // FML tries to download these at startup and fails unless they exist
    if (dist.fmlLibs?.length) {
      await fse.ensureDir(instance.fmlLibsDir);
      for (const library of dist.fmlLibs) {
        const source = store.libraryPath(loaderLibraryPath(library));
        await copyFile(source, join(instance.fmlLibsDir, basename(source)));
      }
    }
  }

  const { name, uuid } = config.player;
  const variables: LaunchVariables = {
    version_name: instance.mcVersion,
    version_type: gameManifest.type,
    game_directory: instance.gameDir,
    assets_root: store.assetsDir,
    assets_index_name: gameManifest.assetIndex.id,
    natives_directory: instance.nativesDir,
    user_type: "msa",
    clientid: "",
    auth_access_token: "0",
    auth_session: `token:0:${uuid}`,
    auth_player_name: name,
    auth_uuid: uuid,
    launcher_name: LAUNCHER_NAME,
    launcher_version: LAUNCHER_VERSION,
    user_properties: "{}",
  };
  if (resourcesDir) variables.game_assets = resourcesDir;

  const plan = composeLaunch({
    gameManifest,
    loaderManifest,
    mainJar,
    librariesDir: store.librariesDir,
    ruleContext: store.ruleContext,
    variables,
  });

  const { manifest } = instance;
  return {
    command: manifest.java_path ?? config.java.path,
    args: [...(manifest.java_args ?? config.java.args), ...plan.args],
    cwd: instance.gameDir,
    env: manifest.java_env ?? {},
  };
}

/**
 * Runs the game in the foreground and resolves with its exit code.
 */
export function runGame(game: GameCommand): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(game.command, game.args, {
      cwd: game.cwd,
      env: { ...process.env, ...game.env },
      stdio: "inherit",
    });
    child.once("error", (error) => {
      reject(new AppError(`Failed to start ${game.command}.`, error));
    });
    child.once("exit", (code) => resolve(code ?? 1));
  });
}

export async function launchInstance(
  instance: Instance,
  options: LaunchOptions,
): Promise<number> {
  const game = await prepareLaunch(instance, options);
  logger.step(`Launching ${instance.name} (${instance.mcVersion})`);
  logger.debug(`${game.command} ${game.args.join(" ")}`);
  return await runGame(game);
}
