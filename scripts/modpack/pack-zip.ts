import { mkdtemp, readdir, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, posix } from "node:path";
import fse from "fs-extra";
import { FileError } from "../types/errors.ts";
import { extractZip } from "../launcher/utils.ts";
import { decodeCurseForgePackManifest, packModLoader } from "./decode.ts";
import type { CurseForgePackManifest, ModpackDescriptor } from "./types.ts";

const MANIFEST_FILE = "manifest.json";

/**
 * Relative paths, with `/` separators, of every file below `dir`, sorted
 * by name within each directory.
 */
export async function listFiles(dir: string, prefix = ""): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(join(dir, prefix), { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const relative = prefix ? posix.join(prefix, entry.name) : entry.name;
    if (entry.isDirectory()) {
      files.push(...await listFiles(dir, relative));
    } else {
      files.push(relative);
    }
  }
  return files;
}

/**
 * Copies `overridesDir` over `destDir` and returns the copied paths. A
 * missing overrides directory fails the install.
 */
export async function installOverrides(
  overridesDir: string,
  destDir: string,
): Promise<string[]> {
  try {
    await fse.ensureDir(destDir);
    await fse.copy(overridesDir, destDir, { overwrite: true });
    return await listFiles(overridesDir);
  } catch (error) {
    throw new FileError(`Failed to copy overrides from ${overridesDir}.`, overridesDir, error);
  }
}

/**
 * A CurseForge pack archive unpacked into a private temp directory.
 */
export class CurseForgeZip {
  private constructor(
    readonly manifest: CurseForgePackManifest,
    readonly dir: string,
  ) {}

  static async open(zipPath: string): Promise<CurseForgeZip> {
    const dir = await mkdtemp(join(tmpdir(), "hearth-pack-"));
    try {
      extractZip(zipPath, dir);
      const manifestPath = join(dir, MANIFEST_FILE);
      if (!(await fse.pathExists(manifestPath))) {
        throw new FileError(`${zipPath} has no ${MANIFEST_FILE}.`, zipPath);
      }
      const text = await readFile(manifestPath, "utf8");
      return new CurseForgeZip(decodeCurseForgePackManifest(JSON.parse(text)), dir);
    } catch (error) {
      await fse.remove(dir);
      throw error;
    }
  }

  get overridesDir(): string {
    return join(this.dir, this.manifest.overrides);
  }

  /** Copies the overrides over `gameDir`, replacing existing files. */
  async installOverrides(gameDir: string): Promise<string[]> {
    return await installOverrides(this.overridesDir, gameDir);
  }

  async dispose(): Promise<void> {
    await fse.remove(this.dir);
  }
}

/**
 * Opens `zipPath` for the duration of `fn`; the temp directory is removed
 * however `fn` exits.
 */
export async function withCurseForgeZip<T>(
  zipPath: string,
  fn: (zip: CurseForgeZip) => Promise<T>,
): Promise<T> {
  const zip = await CurseForgeZip.open(zipPath);
  try {
    return await fn(zip);
  } finally {
    await zip.dispose();
  }
}

export function descriptorFromCurseForgeZip(zip: CurseForgeZip): ModpackDescriptor {
  const { manifest } = zip;
  return {
    name: manifest.name,
    version: manifest.version,
    author: manifest.author,
    mcVersion: manifest.minecraft.version,
    modLoader: packModLoader(manifest),
    files: manifest.files.map((file) => ({
      kind: "catalog",
      projectId: file.projectID,
      fileId: file.fileID,
      required: file.required,
    })),
    overridesDir: zip.overridesDir,
  };
}
