import { copyFile, mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import fse from "fs-extra";
import { LibraryResolutionError, ServerNotFoundError } from "../types/errors.ts";
import { type ProgressSink, withProgress } from "../terminal/progress.ts";
import { clientJarPath, loaderLibraryPath, loaderLibraryUrl } from "./maven.ts";
import { hostRuleContext, libraryMatches } from "./rules.ts";
import { createZip, downloadFile, extractZip, type HttpClient } from "./utils.ts";
import type {
  Artifact,
  AssetManifest,
  GameManifest,
  Library,
  LoaderLibrary,
  LoaderManifest,
  RuleContext,
} from "./types.ts";

const RESOURCES_URL = "https://resources.download.minecraft.net";

type PendingDownload = {
  path: string;
  url: string;
};

/**
 * The natives classifier artifact of `library` for the host OS, if the
 * library declares natives at all.
 */
export function nativesArtifact(
  library: Library,
  ctx: RuleContext,
): Artifact | undefined {
  if (!library.natives) return undefined;

  const key = library.natives[ctx.osName];
  if (key === undefined) {
    throw new LibraryResolutionError(
      `Library ${library.name} has no natives for ${ctx.osName}.`,
      library.name,
    );
  }
  const classifiers = library.downloads.classifiers;
  if (!classifiers) {
    throw new LibraryResolutionError(
      `Library ${library.name} declares natives but no classifiers.`,
      library.name,
    );
  }
  const artifact = classifiers[key];
  if (!artifact) {
    throw new LibraryResolutionError(
      `Library ${library.name} has no classifier ${key}.`,
      library.name,
    );
  }
  return artifact;
}

export function artifactsForDownload(
  library: Library,
  ctx: RuleContext,
): Artifact[] {
  const artifacts = [library.downloads.artifact, nativesArtifact(library, ctx)]
    .filter((artifact): artifact is Artifact => artifact !== undefined);
  if (!artifacts.length) {
    throw new LibraryResolutionError(
      `Library ${library.name} has nothing to download.`,
      library.name,
    );
  }
  return artifacts;
}

export function loaderDownloads(manifest: LoaderManifest): LoaderLibrary[] {
  const { dist } = manifest;
  switch (dist.kind) {
    case "legacy":
      return [...dist.jarMods, ...(dist.fmlLibs ?? [])];
    case "current":
      return [...dist.libraries, ...(dist.mavenFiles ?? [])];
  }
}

export type AssetStoreOptions = {
  client: HttpClient;
  assetsDir: string;
  librariesDir: string;
  cacheDir: string;
  ruleContext?: RuleContext;
};

/**
 * Content-addressed asset objects and the shared library tree.
 *
 * A file that exists is never downloaded again and never verified.
 */
export class AssetStore {
  readonly #client: HttpClient;
  readonly assetsDir: string;
  readonly librariesDir: string;
  readonly cacheDir: string;
  readonly ruleContext: RuleContext;

  constructor(options: AssetStoreOptions) {
    this.#client = options.client;
    this.assetsDir = options.assetsDir;
    this.librariesDir = options.librariesDir;
    this.cacheDir = options.cacheDir;
    this.ruleContext = options.ruleContext ?? hostRuleContext();
  }

  get objectsDir(): string {
    return join(this.assetsDir, "objects");
  }

  virtualAssetsDir(assetIndexId: string): string {
    return join(this.assetsDir, "virtual", assetIndexId);
  }

  objectPath(hash: string): string {
    return join(this.objectsDir, hash.slice(0, 2), hash);
  }

  libraryPath(relativePath: string): string {
    return join(this.librariesDir, relativePath);
  }

  async downloadAssets(manifest: AssetManifest, sink: ProgressSink): Promise<void> {
    const downloads = Object.values(manifest.objects).map(({ hash }) => ({
      path: this.objectPath(hash),
      url: `${RESOURCES_URL}/${hash.slice(0, 2)}/${hash}`,
    }));
    await this.#downloadAll("Downloading assets", downloads, sink);
  }

  async downloadLibraries(manifest: GameManifest, sink: ProgressSink): Promise<void> {
    const downloads: PendingDownload[] = [{
      path: this.libraryPath(clientJarPath(manifest.id)),
      url: manifest.downloads.client.url,
    }];
    for (const library of manifest.libraries) {
      if (!libraryMatches(library, this.ruleContext)) continue;
      for (const artifact of artifactsForDownload(library, this.ruleContext)) {
        downloads.push({ path: this.libraryPath(artifact.path), url: artifact.url });
      }
    }
    await this.#downloadAll("Downloading libraries", downloads, sink);
  }

  async downloadLoaderLibraries(
    manifest: LoaderManifest,
    sink: ProgressSink,
  ): Promise<void> {
    const downloads = loaderDownloads(manifest).map((library) => ({
      path: this.libraryPath(loaderLibraryPath(library)),
      url: loaderLibraryUrl(library),
    }));
    await this.#downloadAll("Downloading mod loader libraries", downloads, sink);
  }

  /**
   * Copies objects to their logical paths for `virtual` and
   * `map_to_resources` asset indexes. Existing files are kept.
   */
  async copyResources(
    manifest: AssetManifest,
    targetDir: string,
    sink: ProgressSink,
  ): Promise<void> {
    const entries = Object.entries(manifest.objects);
    await withProgress(sink, "Copying resources", entries.length, async () => {
      for (const [index, [path, object]] of entries.entries()) {
        const resourcePath = join(targetDir, path);
        if (!(await fse.pathExists(resourcePath))) {
          await fse.ensureDir(dirname(resourcePath));
          await copyFile(this.objectPath(object.hash), resourcePath);
        }
        sink.advance(index + 1);
      }
    });
  }

  /**
   * Unpacks every matching natives jar into `targetDir`. The directory is
   * not cleared first.
   */
  async extractNatives(
    manifest: GameManifest,
    targetDir: string,
    sink: ProgressSink,
  ): Promise<void> {
    const natives = manifest.libraries
      .filter((library) => libraryMatches(library, this.ruleContext))
      .map((library) => nativesArtifact(library, this.ruleContext))
      .filter((artifact): artifact is Artifact => artifact !== undefined);

    await fse.ensureDir(targetDir);
    await withProgress(sink, "Extracting native jars", natives.length, async () => {
      for (const [index, artifact] of natives.entries()) {
        extractZip(this.libraryPath(artifact.path), targetDir);
        sink.advance(index + 1);
      }
    });
  }

  moddedJarPath(loaderVersion: string): string {
    return join(this.cacheDir, `minecraft+forge-${loaderVersion}.jar`);
  }

  /**
   * Builds the client jar patched with legacy jar mods, once per loader
   * version. Later jar mods overwrite earlier entries.
   */
  async makeModdedJar(
    versionId: string,
    loaderVersion: string,
    jarMods: readonly LoaderLibrary[],
  ): Promise<string> {
    const moddedJar = this.moddedJarPath(loaderVersion);
    if (await fse.pathExists(moddedJar)) return moddedJar;

    const workDir = await mkdtemp(join(tmpdir(), "hearth-jar-"));
    try {
      extractZip(this.libraryPath(clientJarPath(versionId)), workDir);
      await fse.remove(join(workDir, "META-INF"));
      for (const jarMod of jarMods) {
        extractZip(this.libraryPath(loaderLibraryPath(jarMod)), workDir);
      }
      await fse.ensureDir(dirname(moddedJar));
      createZip(workDir, moddedJar);
    } finally {
      await fse.remove(workDir);
    }
    return moddedJar;
  }

  /** Downloads the dedicated server jar, replacing `destination`. */
  async downloadServerJar(
    manifest: GameManifest,
    destination: string,
    sink: ProgressSink,
  ): Promise<void> {
    const server = manifest.downloads.server;
    if (!server) throw new ServerNotFoundError(manifest.id);
    await fse.remove(destination);
    await this.#downloadAll("Downloading server jar", [{ path: destination, url: server.url }], sink);
  }

  installerPath(url: string): string {
    return join(this.cacheDir, "installers", basename(new URL(url).pathname));
  }

  /** Fetches a mod loader installer jar into the cache, once. */
  async downloadInstaller(url: string, sink: ProgressSink): Promise<string> {
    const path = this.installerPath(url);
    await this.#downloadAll("Downloading mod loader installer", [{ path, url }], sink);
    return path;
  }

  async #downloadAll(
    label: string,
    downloads: readonly PendingDownload[],
    sink: ProgressSink,
  ): Promise<void> {
    await withProgress(sink, label, downloads.length, async () => {
      for (const [index, { path, url }] of downloads.entries()) {
        sink.advance(index + 1);
        if (await fse.pathExists(path)) continue;
        await downloadFile(this.#client, url, path);
      }
    });
  }
}
