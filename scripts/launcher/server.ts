import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import fse from "fs-extra";
import { AppError } from "../types/errors.ts";
import { logger } from "../logger.ts";
import type { ResolvedConfig } from "../config/schema.ts";
import type { ServerInstance } from "../instance/server-instance.ts";
import { silentProgress, type ProgressSink } from "../terminal/progress.ts";
import { type GameCommand, type LauncherServices, runGame } from "./mod.ts";
import { hostOsName } from "./rules.ts";
import type { LoaderName, ModLoader, OsName } from "./types.ts";

export const SERVER_JAR = "server.jar";
export const EULA_FILE = "eula.txt";
export const USER_JVM_ARGS_FILE = "user_jvm_args.txt";

type LoaderArtifact = {
  maven: string;
  group: string;
  artifact: string;
  installFlag: string;
  /** Forge versions its artifacts by `<minecraft>-<forge>`. */
  version(mcVersion: string, loaderVersion: string): string;
};

const LOADER_ARTIFACTS: Record<LoaderName, LoaderArtifact> = {
  forge: {
    maven: "https://maven.minecraftforge.net",
    group: "net/minecraftforge",
    artifact: "forge",
    installFlag: "--installServer",
    version: (mcVersion, loaderVersion) => `${mcVersion}-${loaderVersion}`,
  },
  neoforge: {
    maven: "https://maven.neoforged.net/releases",
    group: "net/neoforged",
    artifact: "neoforge",
    installFlag: "--install-server",
    version: (_mcVersion, loaderVersion) => loaderVersion,
  },
};

export function serverInstallerUrl(loader: ModLoader, mcVersion: string): string {
  const { maven, group, artifact, version } = LOADER_ARTIFACTS[loader.name];
  const v = version(mcVersion, loader.version);
  return `${maven}/${group}/${artifact}/${v}/${artifact}-${v}-installer.jar`;
}

export function serverInstallerFlag(loader: ModLoader): string {
  return LOADER_ARTIFACTS[loader.name].installFlag;
}

/** The JVM arguments file the loader installer writes under `libraries/`. */
export function serverArgsFile(loader: ModLoader, mcVersion: string, osName: OsName): string {
  const { group, artifact, version } = LOADER_ARTIFACTS[loader.name];
  const file = osName === "windows" ? "win_args.txt" : "unix_args.txt";
  return `libraries/${group}/${artifact}/${version(mcVersion, loader.version)}/${file}`;
}

export type ServerArgsOptions = {
  javaArgs: readonly string[];
  userJvmArgs: boolean;
  osName: OsName;
};

export function composeServerArgs(
  server: { mcVersion: string; modLoader?: ModLoader },
  options: ServerArgsOptions,
): string[] {
  const args = [...options.javaArgs];
  if (options.userJvmArgs) args.push(`@${USER_JVM_ARGS_FILE}`);
  if (server.modLoader) {
    args.push(`@${serverArgsFile(server.modLoader, server.mcVersion, options.osName)}`);
  } else {
    args.push("-jar", SERVER_JAR);
  }
  args.push("nogui");
  return args;
}

export type ServerInstallOptions = {
  services: LauncherServices;
  config: ResolvedConfig;
  sink?: ProgressSink;
  /** Runs the loader installer; spawns it in the foreground by default. */
  run?: (command: GameCommand) => Promise<number>;
};

/**
 * Populates the server directory: the vanilla server jar, or whatever the
 * mod loader's installer lays down in `--installServer` mode.
 */
export async function installServer(
  instance: ServerInstance,
  options: ServerInstallOptions,
): Promise<void> {
  const { catalog, store } = options.services;
  const sink = options.sink ?? silentProgress;
  await fse.ensureDir(instance.serverDir);

  const loader = instance.modLoader;
  if (!loader) {
    const manifest = await catalog.resolveGameManifest(instance.mcVersion);
    await store.downloadServerJar(manifest, join(instance.serverDir, SERVER_JAR), sink);
    return;
  }

  const installer = await store.downloadInstaller(
    serverInstallerUrl(loader, instance.mcVersion),
    sink,
  );
  const command: GameCommand = {
    command: instance.manifest.java_path ?? options.config.java.path,
    args: ["-jar", installer, serverInstallerFlag(loader)],
    cwd: instance.serverDir,
    env: instance.manifest.java_env ?? {},
  };
  logger.step(`Running the ${loader.name} ${loader.version} server installer`);
  const code = await (options.run ?? runGame)(command);
  if (code !== 0) {
    throw new AppError(`The ${loader.name} installer exited with code ${code}.`);
  }
}

/**
 * Accepts the EULA when the server directory has none yet and returns the
 * command line that starts the server.
 */
export async function prepareServerLaunch(
  instance: ServerInstance,
  options: { config: ResolvedConfig; osName?: OsName },
): Promise<GameCommand> {
  const { serverDir, manifest } = instance;
  await fse.ensureDir(serverDir);

  const eula = join(serverDir, EULA_FILE);
  if (!(await fse.pathExists(eula))) {
    logger.warn(`Accepting the Minecraft EULA in ${eula}`);
    await writeFile(eula, "eula=true\n");
  }

  const args = composeServerArgs(instance, {
    javaArgs: manifest.java_args ?? options.config.java.args,
    userJvmArgs: await fse.pathExists(join(serverDir, USER_JVM_ARGS_FILE)),
    osName: options.osName ?? hostOsName(),
  });
  return {
    command: manifest.java_path ?? options.config.java.path,
    args,
    cwd: serverDir,
    env: manifest.java_env ?? {},
  };
}

export async function launchServer(
  instance: ServerInstance,
  config: ResolvedConfig,
): Promise<number> {
  const server = await prepareServerLaunch(instance, { config });
  logger.step(`Starting server ${instance.name} (${instance.mcVersion})`);
  logger.debug(`${server.command} ${server.args.join(" ")}`);
  return await runGame(server);
}
