import { copyFile, mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, posix } from "node:path";
import fse from "fs-extra";
import { CatalogMismatchError, MalformedDataError } from "../types/errors.ts";
import { logger } from "../logger.ts";
import { silentProgress, type ProgressSink, withProgress } from "../terminal/progress.ts";
import { downloadFile, type HttpClient } from "../launcher/utils.ts";
import type { CurseClient } from "./curseforge.ts";
import { getMinecraftVersion, getModLoader } from "./decode.ts";
import { installOverrides, withCurseForgeZip } from "./pack-zip.ts";
import type {
  CatalogReference,
  CurseForgeFile,
  CurseForgeMod,
  FileCategory,
  FileDownload,
  InstallResult,
  ModpackAsset,
  ModpackDescriptor,
  ModpackVersionManifest,
} from "./types.ts";

/** Asset file type of a nested pack archive. */
export const NESTED_PACK_TYPE = "cf-extract";

const CATEGORY_BY_CLASS_ID: ReadonlyMap<number, FileCategory> = new Map([
  [6, "mod"],
  [12, "resourcepack"],
  [6552, "shaderpack"],
  [6945, "datapack"],
]);

export const CATEGORY_DIRS: Record<FileCategory, string> = {
  mod: "mods",
  resourcepack: "resourcepacks",
  shaderpack: "shaderpacks",
  datapack: "config/openloader/data",
};

export function categoryForClassId(classId: number): FileCategory {
  const category = CATEGORY_BY_CLASS_ID.get(classId);
  if (!category) {
    throw new MalformedDataError(`Unsupported CurseForge class id ${classId}.`, String(classId));
  }
  return category;
}

/**
 * Pairs a catalog file with its mod. Files without a download URL point the
 * user at the mod's download page instead.
 */
export function toFileDownload(file: CurseForgeFile, mod: CurseForgeMod): FileDownload {
  return {
    modId: file.modId,
    fileId: file.id,
    fileName: file.fileName,
    fileSize: file.fileLength,
    category: categoryForClassId(mod.classId),
    canAutoDownload: file.downloadUrl !== undefined,
    url: file.downloadUrl ?? `${mod.websiteUrl}/download/${file.id}`,
  };
}

/**
 * Describes a modpacks.ch or FTB version for installation. Server installs
 * leave out client-only files.
 */
export function descriptorFromModpacksCh(
  manifest: ModpackVersionManifest,
  options: { isServer: boolean; packName?: string },
): ModpackDescriptor {
  const files = manifest.files
    .filter((file) => !(options.isServer && file.clientonly))
    .flatMap((file): (ModpackAsset | CatalogReference)[] => {
      if (file.url !== undefined) {
        return [{
          kind: "asset",
          name: file.name,
          path: file.path,
          url: file.url,
          size: file.size,
          fileType: file.type,
          clientOnly: file.clientonly,
          serverOnly: file.serveronly,
          optional: file.optional,
        }];
      }
      if (file.curseforge) {
        return [{
          kind: "catalog",
          projectId: file.curseforge.project,
          fileId: file.curseforge.file,
          required: !file.optional,
        }];
      }
      logger.debug(`Skipping ${file.name}: no url and no catalog reference.`);
      return [];
    });

  return {
    name: options.packName ?? manifest.name,
    version: manifest.name,
    mcVersion: getMinecraftVersion(manifest),
    modLoader: getModLoader(manifest),
    files,
  };
}

export type InstallerOptions = {
  destDir: string;
  client: HttpClient;
  curseClient: CurseClient;
};

/**
 * Installs modpack files into a game directory. Existing files are never
 * downloaded again or verified.
 */
export class Installer {
  readonly destDir: string;
  readonly #client: HttpClient;
  readonly #curseClient: CurseClient;

  constructor(options: InstallerOptions) {
    this.destDir = options.destDir;
    this.#client = options.client;
    this.#curseClient = options.curseClient;
  }

  categoryDir(category: FileCategory): string {
    return join(this.destDir, CATEGORY_DIRS[category]);
  }

  relativeFilePath(file: FileDownload): string {
    return posix.join(CATEGORY_DIRS[file.category], file.fileName);
  }

  filePath(file: FileDownload): string {
    return join(this.categoryDir(file.category), file.fileName);
  }

  /**
   * Returns every installed file relative to the game dir, and the catalog
   * files that have to be downloaded by hand.
   */
  async install(
    pack: ModpackDescriptor,
    sink: ProgressSink = silentProgress,
  ): Promise<InstallResult> {
    const installedFiles: string[] = [];

    if (pack.overridesDir) {
      installedFiles.push(...await installOverrides(pack.overridesDir, this.destDir));
    }

    const assets = pack.files.filter((file): file is ModpackAsset => file.kind === "asset");
    installedFiles.push(...await this.#installAssets(assets, sink));

    const references = pack.files.filter((file): file is CatalogReference =>
      file.kind === "catalog"
    );
    return await this.#downloadCatalogFiles(
      references.map((ref) => ref.fileId),
      references.map((ref) => ref.projectId),
      installedFiles,
      sink,
    );
  }

  /** Installs one catalog file; returns it when it must be fetched by hand. */
  async installCatalogFile(
    modId: number,
    fileId: number,
    sink: ProgressSink = silentProgress,
  ): Promise<FileDownload[] | undefined> {
    const result = await this.#downloadCatalogFiles([fileId], [modId], [], sink);
    return result.blocked;
  }

  /** Copies a manually downloaded file into its category directory. */
  async installFile(file: FileDownload, srcPath: string): Promise<void> {
    await fse.ensureDir(this.categoryDir(file.category));
    await copyFile(srcPath, this.filePath(file));
  }

  async #installAssets(
    assets: readonly ModpackAsset[],
    sink: ProgressSink,
  ): Promise<string[]> {
    const installed: string[] = [];
    await withProgress(sink, "Downloading assets", assets.length, async () => {
      for (const [index, asset] of assets.entries()) {
        sink.advance(index + 1);
        if (asset.fileType === NESTED_PACK_TYPE) {
          installed.push(...await this.#installNestedPack(asset));
          continue;
        }

        const destination = join(this.destDir, asset.path, asset.name);
        if (!(await fse.pathExists(destination))) {
          await downloadFile(this.#client, asset.url, destination);
        }
        installed.push(posix.join(asset.path, asset.name));
      }
    });
    return installed;
  }

  async #installNestedPack(asset: ModpackAsset): Promise<string[]> {
    const workDir = await mkdtemp(join(tmpdir(), "hearth-nested-"));
    try {
      const zipPath = join(workDir, asset.name);
      await downloadFile(this.#client, asset.url, zipPath);
      return await withCurseForgeZip(zipPath, (zip) => zip.installOverrides(this.destDir));
    } finally {
      await fse.remove(workDir);
    }
  }

  async #downloadCatalogFiles(
    fileIds: readonly number[],
    modIds: readonly number[],
    installedFiles: string[],
    sink: ProgressSink,
  ): Promise<InstallResult> {
    const files = await this.#curseClient.getFiles(fileIds);
    const mods = await this.#curseClient.getMods(modIds);
    if (files.length !== mods.length) {
      throw new CatalogMismatchError(files.length, mods.length);
    }

    files.sort((a, b) => a.modId - b.modId);
    mods.sort((a, b) => a.id - b.id);
    const fileDownloads = files.map((file, index) => toFileDownload(file, mods[index]));

    const downloads = fileDownloads.filter((file) => file.canAutoDownload);
    const blocked = fileDownloads.filter((file) => !file.canAutoDownload);

    // blocked mods still need somewhere to go
    await fse.ensureDir(this.categoryDir("mod"));

    await withProgress(sink, "Downloading mods", downloads.length, async () => {
      for (const [index, file] of downloads.entries()) {
        sink.advance(index + 1);
        const destination = this.filePath(file);
        if (await fse.pathExists(destination)) continue;
        await downloadFile(this.#client, file.url, destination);
      }
    });

    installedFiles.push(...fileDownloads.map((file) => this.relativeFilePath(file)));
    return blocked.length ? { installedFiles, blocked } : { installedFiles };
  }
}
