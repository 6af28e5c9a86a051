import { readFile, writeFile } from "node:fs/promises";
import { basename, isAbsolute, join, resolve } from "node:path";
import fse from "fs-extra";
import { InstanceNotFoundError, MalformedDataError } from "../types/errors.ts";
import {
  expectNumber,
  expectObject,
  expectString,
  isObject,
  isString,
  isStringArray,
  optionalString,
} from "../types/guards.ts";
import { logger } from "../logger.ts";
import { isLoaderName } from "../launcher/decode.ts";
import type { ModLoader } from "../launcher/types.ts";

export const MANIFEST_FILE = "manifest.json";
const DEFAULT_GAME_DIR = "minecraft";

export type ModpackId =
  | { type: "curseforge"; mod_id: number; version: number }
  | { type: "ftb"; pack_id: number; version: number }
  | { type: "curse_zip"; file_name: string };

export type InstanceModpack = {
  id: ModpackId;
  /** Installed files, relative to the game directory. */
  files: string[];
};

export type InstanceManifestData = {
  mc_version: string;
  /** Relative to the instance directory. */
  game_dir: string;
  java_path?: string;
  java_args?: string[];
  java_env?: Record<string, string>;
  mod_loader?: ModLoader;
  /** Alternate client jar, relative to the instance directory. */
  custom_jar?: string;
  modpack?: InstanceModpack;
};

export function decodeModpackId(value: unknown): ModpackId {
  const obj = expectObject(value, "modpack id");
  const type = expectString(obj, "type", "modpack id");
  switch (type) {
    case "curseforge":
      return {
        type,
        mod_id: expectNumber(obj, "mod_id", "modpack id"),
        version: expectNumber(obj, "version", "modpack id"),
      };
    case "ftb":
      return {
        type,
        pack_id: expectNumber(obj, "pack_id", "modpack id"),
        version: expectNumber(obj, "version", "modpack id"),
      };
    case "curse_zip":
      return { type, file_name: expectString(obj, "file_name", "modpack id") };
    default:
      throw new MalformedDataError(`Unknown modpack id type ${type}.`, type);
  }
}

export function decodeModLoader(value: unknown): ModLoader {
  const obj = expectObject(value, "mod loader");
  const name = expectString(obj, "name", "mod loader");
  if (!isLoaderName(name)) {
    throw new MalformedDataError(`Unknown mod loader ${name}.`, name);
  }
  return { name, version: expectString(obj, "version", "mod loader") };
}

export type JavaSettings = Pick<InstanceManifestData, "java_path" | "java_args" | "java_env">;

/** Java settings of a stored manifest; non-string env values are dropped. */
export function decodeJavaSettings(obj: Record<string, unknown>): JavaSettings {
  const settings: JavaSettings = {};
  const javaPath = optionalString(obj, "java_path");
  if (javaPath) settings.java_path = javaPath;
  if (isStringArray(obj.java_args)) settings.java_args = obj.java_args;
  if (isObject(obj.java_env)) {
    settings.java_env = Object.fromEntries(
      Object.entries(obj.java_env).filter((entry): entry is [string, string] =>
        isString(entry[1])
      ),
    );
  }
  return settings;
}

export function decodeModpack(value: unknown): InstanceModpack | undefined {
  if (!isObject(value)) return undefined;
  const files = value.files;
  return {
    id: decodeModpackId(value.id),
    files: isStringArray(files) ? files : [],
  };
}

/**
 * Deletes `oldFiles` missing from `newFiles`, relative to `rootDir`. Files
 * already gone are ignored. Returns the removed paths.
 */
export async function removeStaleFiles(
  rootDir: string,
  oldFiles: readonly string[],
  newFiles: readonly string[],
): Promise<string[]> {
  const keep = new Set(newFiles);
  const removed: string[] = [];
  for (const file of oldFiles) {
    if (keep.has(file)) continue;
    await fse.remove(join(rootDir, file));
    removed.push(file);
  }
  return removed;
}

/**
 * Decodes a stored manifest. Manifests that still carry `forge_version`
 * come back with `migrated` set.
 */
export function decodeInstanceManifest(
  value: unknown,
): { data: InstanceManifestData; migrated: boolean } {
  const obj = expectObject(value, "instance manifest");
  const data: InstanceManifestData = {
    mc_version: expectString(obj, "mc_version", "instance manifest"),
    game_dir: optionalString(obj, "game_dir") ?? DEFAULT_GAME_DIR,
    ...decodeJavaSettings(obj),
  };
  const customJar = optionalString(obj, "custom_jar");
  if (customJar) data.custom_jar = customJar;

  let migrated = false;
  if (obj.mod_loader !== undefined && obj.mod_loader !== null) {
    data.mod_loader = decodeModLoader(obj.mod_loader);
  } else if (isString(obj.forge_version)) {
    data.mod_loader = { name: "forge", version: obj.forge_version };
    migrated = true;
  }

  const modpack = decodeModpack(obj.modpack);
  if (modpack) data.modpack = modpack;
  return { data, migrated };
}

export type CreateInstanceOptions = {
  mcVersion: string;
  modLoader?: ModLoader;
  gameDir?: string;
};

/**
 * An instance directory and its `manifest.json`. Changes are kept in memory
 * until `saveIfDirty`.
 */
export class Instance {
  #data: InstanceManifestData;
  #dirty = false;

  private constructor(readonly dir: string, data: InstanceManifestData) {
    this.#data = data;
  }

  static manifestPath(dir: string): string {
    return join(dir, MANIFEST_FILE);
  }

  static async exists(dir: string): Promise<boolean> {
    return await fse.pathExists(Instance.manifestPath(dir));
  }

  static async create(dir: string, options: CreateInstanceOptions): Promise<Instance> {
    const absDir = resolve(dir);
    await fse.ensureDir(absDir);
    const data: InstanceManifestData = {
      mc_version: options.mcVersion,
      game_dir: options.gameDir ?? DEFAULT_GAME_DIR,
    };
    if (options.modLoader) data.mod_loader = options.modLoader;
    const instance = new Instance(absDir, data);
    instance.#dirty = true;
    await instance.saveIfDirty();
    return instance;
  }

  static async load(dir: string): Promise<Instance> {
    const absDir = resolve(dir);
    if (!(await Instance.exists(absDir))) {
      throw new InstanceNotFoundError(basename(absDir), absDir);
    }
    const manifestPath = Instance.manifestPath(absDir);
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(manifestPath, "utf8"));
    } catch (error) {
      throw new MalformedDataError(`Failed to read ${manifestPath}.`, undefined, error);
    }
    const { data, migrated } = decodeInstanceManifest(raw);
    const instance = new Instance(absDir, data);
    if (migrated) {
      logger.debug(`Migrating forge_version in ${manifestPath}`);
      instance.#dirty = true;
    }
    return instance;
  }

  get name(): string {
    return basename(this.dir);
  }

  get manifest(): Readonly<InstanceManifestData> {
    return this.#data;
  }

  get mcVersion(): string {
    return this.#data.mc_version;
  }

  get modLoader(): ModLoader | undefined {
    return this.#data.mod_loader;
  }

  get modpack(): InstanceModpack | undefined {
    return this.#data.modpack;
  }

  get gameDir(): string {
    return join(this.dir, this.#data.game_dir);
  }

  get nativesDir(): string {
    return join(this.dir, "natives");
  }

  get resourcesDir(): string {
    return join(this.gameDir, "resources");
  }

  /** Where legacy FML looks for its libraries. */
  get fmlLibsDir(): string {
    return join(this.gameDir, "lib");
  }

  get modsDir(): string {
    return join(this.gameDir, "mods");
  }

  get customJar(): string | undefined {
    const jar = this.#data.custom_jar;
    if (!jar) return undefined;
    return isAbsolute(jar) ? jar : join(this.dir, jar);
  }

  setVersions(mcVersion: string, modLoader?: ModLoader): void {
    this.#data.mc_version = mcVersion;
    if (modLoader) {
      this.#data.mod_loader = modLoader;
    } else {
      delete this.#data.mod_loader;
    }
    this.#dirty = true;
  }

  setModpack(modpack: InstanceModpack): void {
    this.#data.modpack = { id: modpack.id, files: [...new Set(modpack.files)] };
    this.#dirty = true;
  }

  /**
   * Deletes files of the previous modpack install that `newFiles` does not
   * contain. Returns the removed paths.
   */
  async removeOldModpackFiles(newFiles: readonly string[]): Promise<string[]> {
    return await removeStaleFiles(this.gameDir, this.#data.modpack?.files ?? [], newFiles);
  }

  async saveIfDirty(): Promise<void> {
    if (!this.#dirty) return;
    const content = JSON.stringify(this.#data, null, 2) + "\n";
    await fse.ensureDir(this.dir);
    await writeFile(Instance.manifestPath(this.dir), content);
    this.#dirty = false;
  }
}
