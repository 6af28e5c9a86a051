import { InvalidLibraryNameError } from "../types/errors.ts";
import type { LoaderArtifact, LoaderLibrary } from "./types.ts";

const DEFAULT_LIBRARY_REPOSITORY = "https://libraries.minecraft.net";

export type MavenCoordinate = {
  group: string;
  artifact: string;
  version: string;
  classifier?: string;
};

export function parseLibraryName(name: string): MavenCoordinate {
  const [group, artifact, version, classifier] = name.split(":");
  if (!group || !artifact || version === undefined) {
    throw new InvalidLibraryNameError(name);
  }
  return { group, artifact, version, classifier };
}

/**
 * `group:artifact:version[:classifier]` to its repository-relative jar path.
 */
export function libraryNameToPath(name: string): string {
  const { group, artifact, version, classifier } = parseLibraryName(name);
  const suffix = classifier === undefined ? "" : `-${classifier}`;
  return [
    ...group.split("."),
    artifact,
    version,
    `${artifact}-${version}${suffix}.jar`,
  ].join("/");
}

export function clientJarPath(versionId: string): string {
  return `com/mojang/minecraft/${versionId}/minecraft-${versionId}-client.jar`;
}

function artifactPath(artifact: LoaderArtifact): string {
  if (artifact.path) return artifact.path;
  // some loader artifacts only carry a url
  const pathname = new URL(artifact.url).pathname;
  if (pathname.startsWith("/maven/")) return pathname.slice("/maven/".length);
  return pathname.replace(/^\//, "");
}

export function loaderLibraryPath(library: LoaderLibrary): string {
  switch (library.kind) {
    case "downloads":
      return artifactPath(library.downloads.artifact);
    case "url":
      return libraryNameToPath(library.name);
  }
}

export function loaderLibraryUrl(library: LoaderLibrary): string {
  switch (library.kind) {
    case "downloads":
      return library.downloads.artifact.url;
    case "url": {
      const base = (library.url ?? DEFAULT_LIBRARY_REPOSITORY).replace(/\/+$/, "");
      return `${base}/${loaderLibraryPath(library)}`;
    }
  }
}
