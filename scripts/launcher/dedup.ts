import semver, { type SemVer } from "semver";
import { InvalidLibraryPathError } from "../types/errors.ts";

/** Substituted for versions that cannot be parsed, so they always win. */
export const SENTINEL_VERSION = "9.9.9";

const CORE_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?((?:\.\d+)*)(.*)$/;
const IDENTIFIERS_PATTERN = /^[0-9A-Za-z.-]+$/;

/**
 * Parses version strings that are close to semver: missing minor or patch
 * components, a fourth numeric component (kept as build metadata), and
 * qualifiers without a leading `-` (`2.0beta9`, `14.0_rc3`).
 */
export function parseLenientVersion(text: string): SemVer | undefined {
  const [core, build] = text.trim().replace(/^v/i, "").split("+", 2);
  const match = core.match(CORE_PATTERN);
  if (!match) return undefined;

  const [, major, minor = "0", patch = "0", extra, rest] = match;
  let normalized = `${Number(major)}.${Number(minor)}.${Number(patch)}`;

  if (rest) {
    const pre = rest.replace(/^[-_.]/, "");
    if (!IDENTIFIERS_PATTERN.test(pre)) return undefined;
    normalized += `-${pre}`;
  }

  const buildParts = [extra.replace(/^\./, ""), build].filter((part) =>
    part !== undefined && part !== ""
  );
  if (buildParts.length) normalized += `+${buildParts.join(".")}`;

  return semver.parse(normalized) ?? undefined;
}

function versionOrSentinel(text: string): SemVer {
  return parseLenientVersion(text) ?? new semver.SemVer(SENTINEL_VERSION);
}

export type DedupKey = {
  artifactId: string;
  version: SemVer;
};

/**
 * Splits `<rest>/<version>/<file>` from the right. Everything before the
 * version segment identifies the artifact.
 */
export function dedupKey(path: string): DedupKey {
  const fileSlash = path.lastIndexOf("/");
  const versionSlash = fileSlash > 0 ? path.lastIndexOf("/", fileSlash - 1) : -1;
  if (fileSlash < 0 || versionSlash < 0) {
    throw new InvalidLibraryPathError(path);
  }
  return {
    artifactId: path.slice(0, versionSlash),
    version: versionOrSentinel(path.slice(versionSlash + 1, fileSlash)),
  };
}

/**
 * Keeps the highest version of every artifact. Paths containing `natives`
 * are passed through since they share coordinates with their companion jar.
 */
export function dedupLibraries(paths: readonly string[]): string[] {
  const natives: string[] = [];
  const kept = new Map<string, { version: SemVer; path: string }>();

  for (const path of paths) {
    if (path.includes("natives")) {
      natives.push(path);
      continue;
    }
    const { artifactId, version } = dedupKey(path);
    const existing = kept.get(artifactId);
    if (!existing || semver.compare(existing.version, version) <= 0) {
      kept.set(artifactId, { version, path });
    }
  }

  return [...[...kept.values()].map((entry) => entry.path), ...natives];
}
