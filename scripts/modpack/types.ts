import type { ModLoader } from "../launcher/types.ts";

/** A file fetched straight from its URL into `path` under the game dir. */
export type ModpackAsset = {
  kind: "asset";
  name: string;
  path: string;
  url: string;
  size: number;
  /** `cf-extract` marks a nested pack archive whose overrides are merged. */
  fileType: string;
  clientOnly: boolean;
  serverOnly: boolean;
  optional: boolean;
};

/** A file resolved through the CurseForge catalog. */
export type CatalogReference = {
  kind: "catalog";
  projectId: number;
  fileId: number;
  required: boolean;
};

export type ModpackFile = ModpackAsset | CatalogReference;

export type ModpackDescriptor = {
  name: string;
  version: string;
  author?: string;
  mcVersion?: string;
  modLoader?: ModLoader;
  files: ModpackFile[];
  /** Absolute directory copied wholesale into the game dir. */
  overridesDir?: string;
};

export type FileCategory = "mod" | "resourcepack" | "shaderpack" | "datapack";

export type FileDownload = {
  modId: number;
  fileId: number;
  fileName: string;
  fileSize: number;
  category: FileCategory;
  canAutoDownload: boolean;
  /** Direct download URL, or the catalog page for a manual download. */
  url: string;
};

export type InstallResult = {
  installedFiles: string[];
  blocked?: FileDownload[];
};

export type CurseForgeFile = {
  id: number;
  modId: number;
  fileName: string;
  fileLength: number;
  downloadUrl?: string;
  fileFingerprint?: number;
};

export type CurseForgeMod = {
  id: number;
  slug: string;
  classId: number;
  websiteUrl: string;
};

export type FingerprintMatch = {
  id: number;
  file: CurseForgeFile;
};

export type FingerprintMatches = {
  exactMatches: FingerprintMatch[];
  exactFingerprints: number[];
};

export type CurseForgePackManifest = {
  name: string;
  version: string;
  author: string;
  minecraft: {
    version: string;
    modLoaders: { id: string; primary: boolean }[];
  };
  files: { projectID: number; fileID: number; required: boolean }[];
  overrides: string;
};

export type ModpackTarget = {
  id: number;
  name: string;
  version: string;
  type: string;
};

export type ModpackVersionSummary = {
  id: number;
  name: string;
  type: string;
  updated: number;
  targets: ModpackTarget[];
};

/** `modpack/{id}` on modpacks.ch and the FTB API. */
export type ModpackManifest = {
  id: number;
  name: string;
  synopsis: string;
  type: string;
  versions: ModpackVersionSummary[];
};

export type ModpackVersionFile = {
  id: number;
  name: string;
  type: string;
  path: string;
  url?: string;
  sha1: string;
  size: number;
  clientonly: boolean;
  serveronly: boolean;
  optional: boolean;
  curseforge?: { project: number; file: number };
};

/** `modpack/{id}/{version}` on modpacks.ch and the FTB API. */
export type ModpackVersionManifest = {
  id: number;
  parent: number;
  name: string;
  type: string;
  files: ModpackVersionFile[];
  targets: ModpackTarget[];
};

export type ModpackSearch = {
  packs: number[];
  curseforge: number[];
  total: number;
  limit: number;
};
