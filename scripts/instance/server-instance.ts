import { readFile, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import fse from "fs-extra";
import { InstanceNotFoundError, MalformedDataError } from "../types/errors.ts";
import { expectObject, expectString, optionalString } from "../types/guards.ts";
import type { ModLoader } from "../launcher/types.ts";
import {
  decodeJavaSettings,
  decodeModLoader,
  decodeModpack,
  type InstanceModpack,
  type JavaSettings,
  MANIFEST_FILE,
  removeStaleFiles,
} from "./instance.ts";

const DEFAULT_SERVER_DIR = "server";

export type ServerManifestData = JavaSettings & {
  mc_version: string;
  /** Relative to the instance directory. */
  server_dir: string;
  mod_loader?: ModLoader;
  modpack?: InstanceModpack;
};

export function decodeServerManifest(value: unknown): ServerManifestData {
  const obj = expectObject(value, "server manifest");
  const data: ServerManifestData = {
    mc_version: expectString(obj, "mc_version", "server manifest"),
    server_dir: optionalString(obj, "server_dir") ?? DEFAULT_SERVER_DIR,
    ...decodeJavaSettings(obj),
  };
  if (obj.mod_loader !== undefined && obj.mod_loader !== null) {
    data.mod_loader = decodeModLoader(obj.mod_loader);
  }
  const modpack = decodeModpack(obj.modpack);
  if (modpack) data.modpack = modpack;
  return data;
}

/**
 * A dedicated server instance: `manifest.json` beside the server directory
 * the server jar or mod loader installer populates.
 */
export class ServerInstance {
  #data: ServerManifestData;
  #dirty = false;

  private constructor(readonly dir: string, data: ServerManifestData) {
    this.#data = data;
  }

  static manifestPath(dir: string): string {
    return join(dir, MANIFEST_FILE);
  }

  static async exists(dir: string): Promise<boolean> {
    return await fse.pathExists(ServerInstance.manifestPath(dir));
  }

  /** Writes the manifest and creates the server directory. */
  static async create(
    dir: string,
    options: { mcVersion: string; modLoader?: ModLoader },
  ): Promise<ServerInstance> {
    const data: ServerManifestData = {
      mc_version: options.mcVersion,
      server_dir: DEFAULT_SERVER_DIR,
    };
    if (options.modLoader) data.mod_loader = options.modLoader;
    const instance = new ServerInstance(resolve(dir), data);
    instance.#dirty = true;
    await instance.saveIfDirty();
    await fse.ensureDir(instance.serverDir);
    return instance;
  }

  static async load(dir: string): Promise<ServerInstance> {
    const absDir = resolve(dir);
    if (!(await ServerInstance.exists(absDir))) {
      throw new InstanceNotFoundError(basename(absDir), absDir);
    }
    const manifestPath = ServerInstance.manifestPath(absDir);
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(manifestPath, "utf8"));
    } catch (error) {
      throw new MalformedDataError(`Failed to read ${manifestPath}.`, undefined, error);
    }
    return new ServerInstance(absDir, decodeServerManifest(raw));
  }

  get name(): string {
    return basename(this.dir);
  }

  get manifest(): Readonly<ServerManifestData> {
    return this.#data;
  }

  get mcVersion(): string {
    return this.#data.mc_version;
  }

  get modLoader(): ModLoader | undefined {
    return this.#data.mod_loader;
  }

  get serverDir(): string {
    return join(this.dir, this.#data.server_dir);
  }

  /** Modpack files install into the server directory. */
  get gameDir(): string {
    return this.serverDir;
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

  async removeOldModpackFiles(newFiles: readonly string[]): Promise<string[]> {
    return await removeStaleFiles(this.serverDir, this.#data.modpack?.files ?? [], newFiles);
  }

  async saveIfDirty(): Promise<void> {
    if (!this.#dirty) return;
    await fse.ensureDir(this.dir);
    await writeFile(
      ServerInstance.manifestPath(this.dir),
      JSON.stringify(this.#data, null, 2) + "\n",
    );
    this.#dirty = false;
  }
}
