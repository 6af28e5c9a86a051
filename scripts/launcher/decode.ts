/**
 * Decoders for the launcher metadata documents.
 *
 * Upstream JSON is validated structurally; only the fields the launcher
 * consumes are checked, everything else is dropped.
 */
import { MalformedDataError } from "../types/errors.ts";
import {
  expectArray,
  expectNumber,
  expectObject,
  expectString,
  isObject,
  isString,
  isStringArray,
  optionalBoolean,
  optionalNumber,
  optionalString,
} from "../types/guards.ts";
import { logger } from "../logger.ts";
import type {
  Argument,
  Artifact,
  AssetIndex,
  AssetManifest,
  Download,
  GameManifest,
  Library,
  LoaderArtifact,
  LoaderDist,
  LoaderIndex,
  LoaderLibrary,
  LoaderManifest,
  LoaderName,
  LoaderRequirement,
  OsName,
  Rule,
  VersionManifest,
} from "./types.ts";

const OS_NAMES: readonly OsName[] = ["linux", "windows", "osx"];

function isOsName(value: string): value is OsName {
  return OS_NAMES.some((name) => name === value);
}

const LOADER_NAMES: readonly LoaderName[] = ["forge", "neoforge"];

export function isLoaderName(value: string): value is LoaderName {
  return LOADER_NAMES.some((name) => name === value);
}

export function decodeVersionManifest(value: unknown): VersionManifest {
  const obj = expectObject(value, "version manifest");
  const latest = expectObject(obj.latest, "version manifest latest");
  return {
    latest: {
      release: expectString(latest, "release", "latest"),
      snapshot: expectString(latest, "snapshot", "latest"),
    },
    versions: expectArray(obj.versions, "versions").map((raw) => {
      const entry = expectObject(raw, "version entry");
      return {
        id: expectString(entry, "id", "version entry"),
        type: expectString(entry, "type", "version entry"),
        url: expectString(entry, "url", "version entry"),
        time: optionalString(entry, "time") ?? "",
        releaseTime: optionalString(entry, "releaseTime") ?? "",
        sha1: optionalString(entry, "sha1"),
        complianceLevel: optionalNumber(entry, "complianceLevel"),
      };
    }),
  };
}

function decodeDownload(value: unknown, what: string): Download {
  const obj = expectObject(value, what);
  return {
    sha1: expectString(obj, "sha1", what),
    size: expectNumber(obj, "size", what),
    url: expectString(obj, "url", what),
  };
}

function decodeArtifact(value: unknown, what: string): Artifact {
  const obj = expectObject(value, what);
  return { path: expectString(obj, "path", what), ...decodeDownload(obj, what) };
}

export function decodeRule(value: unknown): Rule {
  const obj = expectObject(value, "rule");
  const action = obj.action;
  if (action !== "allow" && action !== "disallow") {
    throw new MalformedDataError(`Unknown rule action: ${String(action)}`);
  }
  const rule: Rule = { action };
  if (isObject(obj.os)) {
    rule.os = {
      name: optionalString(obj.os, "name"),
      version: optionalString(obj.os, "version"),
      arch: optionalString(obj.os, "arch"),
    };
  }
  if (isObject(obj.features)) {
    const features: Record<string, boolean> = {};
    for (const [key, flag] of Object.entries(obj.features)) {
      features[key] = flag === true;
    }
    rule.features = features;
  }
  return rule;
}

function decodeRules(value: unknown): Rule[] | undefined {
  if (value === undefined) return undefined;
  return expectArray(value, "rules").map(decodeRule);
}

export function decodeLibrary(value: unknown): Library {
  const obj = expectObject(value, "library");
  const name = expectString(obj, "name", "library");
  const downloads = isObject(obj.downloads) ? obj.downloads : {};
  const library: Library = { name, downloads: {} };

  if (downloads.artifact !== undefined) {
    library.downloads.artifact = decodeArtifact(
      downloads.artifact,
      `${name} artifact`,
    );
  }
  if (isObject(downloads.classifiers)) {
    const classifiers: Record<string, Artifact> = {};
    for (const [key, raw] of Object.entries(downloads.classifiers)) {
      classifiers[key] = decodeArtifact(raw, `${name} classifier ${key}`);
    }
    library.downloads.classifiers = classifiers;
  }
  if (isObject(obj.natives)) {
    const natives: Partial<Record<OsName, string>> = {};
    for (const [os, key] of Object.entries(obj.natives)) {
      if (isOsName(os) && isString(key)) natives[os] = key;
    }
    library.natives = natives;
  }
  const rules = decodeRules(obj.rules);
  if (rules) library.rules = rules;
  if (isObject(obj.extract) && isStringArray(obj.extract.exclude)) {
    library.extract = { exclude: obj.extract.exclude };
  }
  return library;
}

function decodeArgument(value: unknown): Argument {
  if (isString(value)) return value;
  const obj = expectObject(value, "argument");
  const argValue = obj.value;
  if (!isString(argValue) && !isStringArray(argValue)) {
    throw new MalformedDataError("Argument value must be a string or list.");
  }
  return { rules: decodeRules(obj.rules) ?? [], value: argValue };
}

function decodeAssetIndex(value: unknown): AssetIndex {
  const obj = expectObject(value, "assetIndex");
  return {
    id: expectString(obj, "id", "assetIndex"),
    sha1: expectString(obj, "sha1", "assetIndex"),
    size: expectNumber(obj, "size", "assetIndex"),
    totalSize: optionalNumber(obj, "totalSize") ?? 0,
    url: expectString(obj, "url", "assetIndex"),
  };
}

export function decodeGameManifest(value: unknown): GameManifest {
  const obj = expectObject(value, "game manifest");
  const id = expectString(obj, "id", "game manifest");
  const downloads = expectObject(obj.downloads, "downloads");

  const manifest: GameManifest = {
    id,
    type: optionalString(obj, "type") ?? "release",
    mainClass: expectString(obj, "mainClass", "game manifest"),
    libraries: expectArray(obj.libraries, "libraries").map(decodeLibrary),
    assetIndex: decodeAssetIndex(obj.assetIndex),
    assets: optionalString(obj, "assets") ?? "legacy",
    downloads: { client: decodeDownload(downloads.client, "client download") },
    releaseTime: optionalString(obj, "releaseTime"),
  };
  if (downloads.server !== undefined) {
    manifest.downloads.server = decodeDownload(downloads.server, "server download");
  }
  if (isObject(obj.javaVersion)) {
    manifest.javaVersion = {
      component: expectString(obj.javaVersion, "component", "javaVersion"),
      majorVersion: expectNumber(obj.javaVersion, "majorVersion", "javaVersion"),
    };
  }

  const legacyArgs = optionalString(obj, "minecraftArguments");
  if (isObject(obj.arguments)) {
    manifest.arguments = {
      game: Array.isArray(obj.arguments.game)
        ? obj.arguments.game.map(decodeArgument)
        : [],
      jvm: Array.isArray(obj.arguments.jvm)
        ? obj.arguments.jvm.map(decodeArgument)
        : [],
    };
    if (legacyArgs !== undefined) {
      logger.warn(
        `Game manifest ${id} carries both argument forms; using structured arguments.`,
      );
    }
  } else if (legacyArgs !== undefined) {
    manifest.minecraftArguments = legacyArgs;
  } else {
    throw new MalformedDataError(
      `Game manifest ${id} has neither arguments nor minecraftArguments.`,
      id,
    );
  }
  return manifest;
}

export function decodeAssetManifest(value: unknown): AssetManifest {
  const obj = expectObject(value, "asset manifest");
  const rawObjects = expectObject(obj.objects, "asset objects");
  const objects: AssetManifest["objects"] = {};
  for (const [path, raw] of Object.entries(rawObjects)) {
    const entry = expectObject(raw, `asset ${path}`);
    objects[path] = {
      hash: expectString(entry, "hash", `asset ${path}`),
      size: expectNumber(entry, "size", `asset ${path}`),
    };
  }
  return {
    objects,
    virtual: optionalBoolean(obj, "virtual"),
    map_to_resources: optionalBoolean(obj, "map_to_resources"),
  };
}

function decodeRequirements(value: unknown): LoaderRequirement[] {
  if (value === undefined) return [];
  return expectArray(value, "requires").map((raw) => {
    const obj = expectObject(raw, "requirement");
    return {
      uid: expectString(obj, "uid", "requirement"),
      equals: optionalString(obj, "equals"),
      suggests: optionalString(obj, "suggests"),
    };
  });
}

function decodeLoaderArtifact(value: unknown, what: string): LoaderArtifact {
  const obj = expectObject(value, what);
  return {
    path: optionalString(obj, "path"),
    sha1: expectString(obj, "sha1", what),
    size: expectNumber(obj, "size", what),
    url: expectString(obj, "url", what),
  };
}

/**
 * A loader library is the `downloads` form when it carries a `downloads`
 * object, otherwise the maven `url` form.
 */
export function decodeLoaderLibrary(value: unknown): LoaderLibrary {
  const obj = expectObject(value, "loader library");
  const name = expectString(obj, "name", "loader library");
  if (isObject(obj.downloads)) {
    return {
      kind: "downloads",
      name,
      downloads: {
        artifact: decodeLoaderArtifact(obj.downloads.artifact, `${name} artifact`),
      },
    };
  }
  return { kind: "url", name, url: optionalString(obj, "url") };
}

function decodeLoaderLibraries(value: unknown, what: string): LoaderLibrary[] {
  return expectArray(value, what).map(decodeLoaderLibrary);
}

function decodeLoaderDist(obj: Record<string, unknown>): LoaderDist {
  if (obj.jarMods !== undefined) {
    return {
      kind: "legacy",
      jarMods: decodeLoaderLibraries(obj.jarMods, "jarMods"),
      fmlLibs: obj.fml_libs === undefined
        ? undefined
        : decodeLoaderLibraries(obj.fml_libs, "fml_libs"),
    };
  }
  if (obj.libraries !== undefined && isString(obj.mainClass)) {
    return {
      kind: "current",
      libraries: decodeLoaderLibraries(obj.libraries, "libraries"),
      mainClass: obj.mainClass,
      mavenFiles: obj.mavenFiles === undefined
        ? undefined
        : decodeLoaderLibraries(obj.mavenFiles, "mavenFiles"),
      minecraftArguments: optionalString(obj, "minecraftArguments"),
    };
  }
  throw new MalformedDataError(
    "Loader manifest has neither jarMods nor libraries with a mainClass.",
  );
}

export function decodeLoaderManifest(value: unknown): LoaderManifest {
  const obj = expectObject(value, "loader manifest");
  const traits = obj["+traits"];
  const tweakers = obj["+tweakers"];
  return {
    uid: expectString(obj, "uid", "loader manifest"),
    name: expectString(obj, "name", "loader manifest"),
    version: expectString(obj, "version", "loader manifest"),
    releaseTime: optionalString(obj, "releaseTime"),
    requires: decodeRequirements(obj.requires),
    traits: isStringArray(traits) ? traits : undefined,
    tweakers: isStringArray(tweakers) ? tweakers : undefined,
    dist: decodeLoaderDist(obj),
  };
}

export function decodeLoaderIndex(value: unknown): LoaderIndex {
  const obj = expectObject(value, "loader index");
  return {
    uid: expectString(obj, "uid", "loader index"),
    name: optionalString(obj, "name") ?? "",
    versions: expectArray(obj.versions, "loader versions").map((raw) => {
      const entry = expectObject(raw, "loader version");
      return {
        version: expectString(entry, "version", "loader version"),
        recommended: optionalBoolean(entry, "recommended") ?? false,
        releaseTime: optionalString(entry, "releaseTime"),
        requires: decodeRequirements(entry.requires),
        sha256: optionalString(entry, "sha256"),
      };
    }),
  };
}
