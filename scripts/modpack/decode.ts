/**
 * Decoders for CurseForge and modpacks.ch responses.
 */
import { InvalidModLoaderIdError, MalformedDataError } from "../types/errors.ts";
import {
  expectArray,
  expectNumber,
  expectObject,
  expectString,
  isNumber,
  isObject,
  optionalBoolean,
  optionalNumber,
  optionalString,
} from "../types/guards.ts";
import { isLoaderName } from "../launcher/decode.ts";
import type { ModLoader } from "../launcher/types.ts";
import type {
  CurseForgeFile,
  CurseForgeMod,
  CurseForgePackManifest,
  FingerprintMatches,
  ModpackManifest,
  ModpackSearch,
  ModpackTarget,
  ModpackVersionFile,
  ModpackVersionManifest,
} from "./types.ts";

/** Unwraps the `{ data }` envelope of every CurseForge response. */
export function curseData(value: unknown): unknown {
  return expectObject(value, "CurseForge response").data;
}

export function decodeCurseForgeFile(value: unknown): CurseForgeFile {
  const obj = expectObject(value, "CurseForge file");
  return {
    id: expectNumber(obj, "id", "CurseForge file"),
    modId: expectNumber(obj, "modId", "CurseForge file"),
    fileName: expectString(obj, "fileName", "CurseForge file"),
    fileLength: optionalNumber(obj, "fileLength") ?? 0,
    downloadUrl: optionalString(obj, "downloadUrl") || undefined,
    fileFingerprint: optionalNumber(obj, "fileFingerprint"),
  };
}

export function decodeCurseForgeMod(value: unknown): CurseForgeMod {
  const obj = expectObject(value, "CurseForge mod");
  const links = expectObject(obj.links, "CurseForge mod links");
  return {
    id: expectNumber(obj, "id", "CurseForge mod"),
    slug: expectString(obj, "slug", "CurseForge mod"),
    classId: expectNumber(obj, "classId", "CurseForge mod"),
    websiteUrl: expectString(links, "websiteUrl", "CurseForge mod links"),
  };
}

export function decodeFingerprintMatches(value: unknown): FingerprintMatches {
  const obj = expectObject(value, "fingerprint matches");
  return {
    exactMatches: expectArray(obj.exactMatches, "exactMatches").map((raw) => {
      const match = expectObject(raw, "fingerprint match");
      return {
        id: expectNumber(match, "id", "fingerprint match"),
        file: decodeCurseForgeFile(match.file),
      };
    }),
    exactFingerprints: expectArray(obj.exactFingerprints ?? [], "exactFingerprints")
      .filter(isNumber),
  };
}

/**
 * Parses a CurseForge mod loader id such as `forge-47.2.0`.
 */
export function parseModLoaderId(id: string): ModLoader {
  const separator = id.indexOf("-");
  if (separator <= 0 || separator === id.length - 1) {
    throw new InvalidModLoaderIdError(id);
  }
  const name = id.slice(0, separator);
  if (!isLoaderName(name)) throw new InvalidModLoaderIdError(id);
  return { name, version: id.slice(separator + 1) };
}

export function decodeCurseForgePackManifest(value: unknown): CurseForgePackManifest {
  const obj = expectObject(value, "pack manifest");
  const minecraft = expectObject(obj.minecraft, "pack manifest minecraft");
  return {
    name: expectString(obj, "name", "pack manifest"),
    version: expectString(obj, "version", "pack manifest"),
    author: optionalString(obj, "author") ?? "",
    minecraft: {
      version: expectString(minecraft, "version", "pack manifest minecraft"),
      modLoaders: expectArray(minecraft.modLoaders ?? [], "modLoaders").map((raw) => {
        const loader = expectObject(raw, "mod loader");
        return {
          id: expectString(loader, "id", "mod loader"),
          primary: optionalBoolean(loader, "primary") ?? false,
        };
      }),
    },
    files: expectArray(obj.files, "pack manifest files").map((raw) => {
      const file = expectObject(raw, "pack file");
      return {
        projectID: expectNumber(file, "projectID", "pack file"),
        fileID: expectNumber(file, "fileID", "pack file"),
        required: optionalBoolean(file, "required") ?? true,
      };
    }),
    overrides: optionalString(obj, "overrides") ?? "overrides",
  };
}

/** The primary loader of a pack zip, if it names one. */
export function packModLoader(manifest: CurseForgePackManifest): ModLoader | undefined {
  const primary = manifest.minecraft.modLoaders.find((loader) => loader.primary);
  return primary ? parseModLoaderId(primary.id) : undefined;
}

function decodeTarget(value: unknown): ModpackTarget {
  const obj = expectObject(value, "modpack target");
  return {
    id: expectNumber(obj, "id", "modpack target"),
    name: expectString(obj, "name", "modpack target"),
    version: expectString(obj, "version", "modpack target"),
    type: expectString(obj, "type", "modpack target"),
  };
}

export function decodeModpackManifest(value: unknown): ModpackManifest {
  const obj = expectObject(value, "modpack");
  return {
    id: expectNumber(obj, "id", "modpack"),
    name: expectString(obj, "name", "modpack"),
    synopsis: optionalString(obj, "synopsis") ?? "",
    type: optionalString(obj, "type") ?? "",
    versions: expectArray(obj.versions, "modpack versions").map((raw) => {
      const version = expectObject(raw, "modpack version");
      return {
        id: expectNumber(version, "id", "modpack version"),
        name: expectString(version, "name", "modpack version"),
        type: optionalString(version, "type") ?? "",
        updated: optionalNumber(version, "updated") ?? 0,
        targets: expectArray(version.targets ?? [], "targets").map(decodeTarget),
      };
    }),
  };
}

function decodeVersionFile(value: unknown): ModpackVersionFile {
  const obj = expectObject(value, "modpack file");
  const curseforge = isObject(obj.curseforge)
    ? {
      project: expectNumber(obj.curseforge, "project", "modpack file curseforge"),
      file: expectNumber(obj.curseforge, "file", "modpack file curseforge"),
    }
    : undefined;
  return {
    id: expectNumber(obj, "id", "modpack file"),
    name: expectString(obj, "name", "modpack file"),
    type: optionalString(obj, "type") ?? "",
    path: optionalString(obj, "path") ?? "",
    // An empty url means the file is not directly downloadable.
    url: optionalString(obj, "url") || undefined,
    sha1: optionalString(obj, "sha1") ?? "",
    size: optionalNumber(obj, "size") ?? 0,
    clientonly: optionalBoolean(obj, "clientonly") ?? false,
    serveronly: optionalBoolean(obj, "serveronly") ?? false,
    optional: optionalBoolean(obj, "optional") ?? false,
    curseforge,
  };
}

export function decodeModpackVersionManifest(value: unknown): ModpackVersionManifest {
  const obj = expectObject(value, "modpack version");
  return {
    id: expectNumber(obj, "id", "modpack version"),
    parent: optionalNumber(obj, "parent") ?? 0,
    name: expectString(obj, "name", "modpack version"),
    type: optionalString(obj, "type") ?? "",
    files: expectArray(obj.files, "modpack files").map(decodeVersionFile),
    targets: expectArray(obj.targets ?? [], "targets").map(decodeTarget),
  };
}

export function decodeModpackSearch(value: unknown): ModpackSearch {
  const obj = expectObject(value, "modpack search");
  return {
    packs: expectArray(obj.packs ?? [], "packs").filter(isNumber),
    curseforge: expectArray(obj.curseforge ?? [], "curseforge").filter(isNumber),
    total: optionalNumber(obj, "total") ?? 0,
    limit: optionalNumber(obj, "limit") ?? 0,
  };
}

export function getMinecraftVersion(manifest: ModpackVersionManifest): string {
  const target = manifest.targets.find((t) => t.name === "minecraft");
  if (!target) {
    throw new MalformedDataError(
      `Modpack version ${manifest.id} does not target a Minecraft version.`,
    );
  }
  return target.version;
}

export function getModLoader(manifest: ModpackVersionManifest): ModLoader | undefined {
  const target = manifest.targets.find((t) => t.type === "modloader");
  if (!target) return undefined;
  if (!isLoaderName(target.name)) {
    throw new InvalidModLoaderIdError(`${target.name}-${target.version}`);
  }
  return { name: target.name, version: target.version };
}
