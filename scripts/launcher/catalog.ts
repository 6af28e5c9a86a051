import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import fse from "fs-extra";
import semver from "semver";
import { LoaderVersionNotFoundError, VersionNotFoundError } from "../types/errors.ts";
import { logger } from "../logger.ts";
import {
  decodeAssetManifest,
  decodeGameManifest,
  decodeLoaderIndex,
  decodeLoaderManifest,
  decodeVersionManifest,
} from "./decode.ts";
import { parseLenientVersion, SENTINEL_VERSION } from "./dedup.ts";
import { applyLibraryOverrides, populateFmlLibraries } from "./overrides.ts";
import { fetchJson, fetchText, type HttpClient } from "./utils.ts";
import type {
  AssetManifest,
  GameManifest,
  LoaderIndex,
  LoaderManifest,
  LoaderName,
  ModLoader,
  ModLoaderVersion,
  VersionManifestEntry,
} from "./types.ts";

export const VERSION_MANIFEST_URL =
  "https://piston-meta.mojang.com/mc/game/version_manifest_v2.json";

export const LOADER_INDEX_URLS: Record<LoaderName, string> = {
  forge: "https://meta.prismlauncher.org/v1/net.minecraftforge/index.json",
  neoforge: "https://meta.prismlauncher.org/v1/net.neoforged/index.json",
};

const MINECRAFT_UID = "net.minecraft";

export type VersionCatalogOptions = {
  client: HttpClient;
  cacheDir: string;
  assetsDir: string;
};

/**
 * Resolves game, loader and asset manifests with a cache-then-fetch policy.
 *
 * Cached documents are stored verbatim and never rewritten; delete the
 * file to force a refetch.
 */
export class VersionCatalog {
  readonly #client: HttpClient;
  readonly #cacheDir: string;
  readonly #assetsDir: string;

  constructor(options: VersionCatalogOptions) {
    this.#client = options.client;
    this.#cacheDir = options.cacheDir;
    this.#assetsDir = options.assetsDir;
  }

  get versionsDir(): string {
    return join(this.#cacheDir, "versions");
  }

  get indexesDir(): string {
    return join(this.#assetsDir, "indexes");
  }

  async listGameVersions(): Promise<VersionManifestEntry[]> {
    const manifest = decodeVersionManifest(
      await fetchJson(this.#client, VERSION_MANIFEST_URL),
    );
    return manifest.versions;
  }

  async resolveGameManifest(versionId: string): Promise<GameManifest> {
    const text = await this.#cached(
      join(this.versionsDir, `${versionId}.json`),
      async () => {
        const versions = await this.listGameVersions();
        const entry = versions.find((version) => version.id === versionId);
        if (!entry) throw new VersionNotFoundError(versionId);
        return await fetchText(this.#client, entry.url);
      },
    );
    return applyLibraryOverrides(decodeGameManifest(JSON.parse(text)));
  }

  async resolveLoaderManifest(modLoader: ModLoader): Promise<LoaderManifest> {
    const text = await this.#cached(
      join(this.versionsDir, `${modLoader.name}_${modLoader.version}.json`),
      async () => {
        const indexUrl = LOADER_INDEX_URLS[modLoader.name];
        const index = await this.#fetchLoaderIndex(modLoader.name);
        if (!index.versions.some((entry) => entry.version === modLoader.version)) {
          throw new LoaderVersionNotFoundError(modLoader.name, modLoader.version);
        }
        return await fetchText(
          this.#client,
          indexUrl.replace("index.json", `${modLoader.version}.json`),
        );
      },
    );
    return populateFmlLibraries(decodeLoaderManifest(JSON.parse(text)));
  }

  async resolveAssetManifest(gameManifest: GameManifest): Promise<AssetManifest> {
    const { id, url } = gameManifest.assetIndex;
    const text = await this.#cached(
      join(this.indexesDir, `${id}.json`),
      () => fetchText(this.#client, url),
    );
    return decodeAssetManifest(JSON.parse(text));
  }

  /**
   * Loader versions built for `mcVersion`, newest first.
   */
  async listLoaderVersions(
    mcVersion: string,
    loader: LoaderName,
  ): Promise<ModLoaderVersion[]> {
    const index = await this.#fetchLoaderIndex(loader);
    const sentinel = new semver.SemVer(SENTINEL_VERSION);
    return index.versions
      .filter((entry) =>
        entry.requires.some((req) =>
          req.uid === MINECRAFT_UID && req.equals === mcVersion
        )
      )
      .map((entry) => ({
        entry: { version: entry.version, recommended: entry.recommended },
        parsed: parseLenientVersion(entry.version) ?? sentinel,
      }))
      .sort((a, b) => semver.compare(b.parsed, a.parsed))
      .map(({ entry }) => entry);
  }

  async #fetchLoaderIndex(loader: LoaderName): Promise<LoaderIndex> {
    return decodeLoaderIndex(
      await fetchJson(this.#client, LOADER_INDEX_URLS[loader]),
    );
  }

  async #cached(path: string, fetchDocument: () => Promise<string>): Promise<string> {
    if (await fse.pathExists(path)) {
      return await readFile(path, "utf8");
    }
    const text = await fetchDocument();
    await fse.ensureFile(path);
    await writeFile(path, text);
    logger.debug(`Cached ${path}`);
    return text;
  }
}
