import { readFileSync } from "node:fs";
import semver from "semver";
import { MalformedDataError } from "../types/errors.ts";
import {
  expectArray,
  expectObject,
  expectString,
  isObject,
} from "../types/guards.ts";
import { decodeLibrary, decodeLoaderLibrary } from "./decode.ts";
import { parseLenientVersion } from "./dedup.ts";
import { parseLibraryName } from "./maven.ts";
import type { GameManifest, Library, LoaderLibrary, LoaderManifest } from "./types.ts";

const MINECRAFT_UID = "net.minecraft";

type LibraryOverrides = {
  group: string;
  range: string;
  replacements: Map<string, Library>;
};

type FmlLibrarySet = {
  range: string;
  libraries: LoaderLibrary[];
};

type FmlLibraries = {
  sets: FmlLibrarySet[];
  deobfuscation: Map<string, LoaderLibrary>;
};

function readDataFile(name: string): unknown {
  const text = readFileSync(new URL(`./data/${name}`, import.meta.url), "utf8");
  const value: unknown = JSON.parse(text);
  return value;
}

function loadLibraryOverrides(): LibraryOverrides {
  const obj = expectObject(readDataFile("library-overrides.json"), "library overrides");
  const replacements = new Map<string, Library>();
  for (const [artifact, raw] of Object.entries(expectObject(obj.replacements, "replacements"))) {
    replacements.set(artifact, decodeLibrary(raw));
  }
  return {
    group: expectString(obj, "group", "library overrides"),
    range: expectString(obj, "range", "library overrides"),
    replacements,
  };
}

function loadFmlLibraries(): FmlLibraries {
  const obj = expectObject(readDataFile("fml-libraries.json"), "fml libraries");
  const sets = expectArray(obj.sets, "fml library sets").map((raw) => {
    const set = expectObject(raw, "fml library set");
    return {
      range: expectString(set, "range", "fml library set"),
      libraries: expectArray(set.libraries, "fml libraries").map(decodeLoaderLibrary),
    };
  });
  const deobfuscation = new Map<string, LoaderLibrary>();
  if (isObject(obj.deobfuscation)) {
    for (const [version, raw] of Object.entries(obj.deobfuscation)) {
      deobfuscation.set(version, decodeLoaderLibrary(raw));
    }
  }
  return { sets, deobfuscation };
}

let libraryOverrides: LibraryOverrides | undefined;
let fmlLibraries: FmlLibraries | undefined;

function getLibraryOverrides(): LibraryOverrides {
  libraryOverrides ??= loadLibraryOverrides();
  return libraryOverrides;
}

function getFmlLibraries(): FmlLibraries {
  fmlLibraries ??= loadFmlLibraries();
  return fmlLibraries;
}

/**
 * Replaces log4j libraries inside the vulnerable range with the pinned
 * release. Every library name must have at least three coordinates.
 */
export function applyLibraryOverrides(manifest: GameManifest): GameManifest {
  const { group, range, replacements } = getLibraryOverrides();
  const libraries = manifest.libraries.map((library) => {
    const coordinate = parseLibraryName(library.name);
    if (coordinate.group !== group) return library;

    const version = parseLenientVersion(coordinate.version);
    if (!version) {
      throw new MalformedDataError(
        `Unable to parse log4j version '${coordinate.version}' of ${library.name}`,
        coordinate.version,
      );
    }
    const replacement = replacements.get(coordinate.artifact);
    if (replacement && semver.satisfies(version, range)) return replacement;
    return library;
  });
  return { ...manifest, libraries };
}

export function requiredMinecraftVersion(manifest: LoaderManifest): string {
  const requirement = manifest.requires.find((req) => req.uid === MINECRAFT_UID);
  if (!requirement?.equals) {
    throw new MalformedDataError(
      `Loader manifest ${manifest.uid} ${manifest.version} does not name a Minecraft version.`,
    );
  }
  return requirement.equals;
}

/**
 * Libraries legacy FML expects to find on disk, for a Minecraft version.
 * Empty outside the 1.3.2 to 1.5.x releases.
 */
export function fmlLibrariesFor(mcVersion: string): LoaderLibrary[] {
  const version = parseLenientVersion(mcVersion);
  if (!version) return [];
  const { sets, deobfuscation } = getFmlLibraries();
  const set = sets.find((candidate) => semver.satisfies(version, candidate.range));
  if (!set) return [];

  const extra = deobfuscation.get(mcVersion);
  return extra ? [...set.libraries, extra] : [...set.libraries];
}

export function populateFmlLibraries(manifest: LoaderManifest): LoaderManifest {
  if (manifest.dist.kind !== "legacy") return manifest;
  const libraries = fmlLibrariesFor(requiredMinecraftVersion(manifest));
  if (!libraries.length) return manifest;
  return { ...manifest, dist: { ...manifest.dist, fmlLibs: libraries } };
}
