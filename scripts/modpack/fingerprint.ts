import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { CurseClient } from "./curseforge.ts";

const MULTIPLEX = 1540483477;
const SEED = 1;

function isWhitespace(byte: number): boolean {
  return byte === 9 || byte === 10 || byte === 13 || byte === 32;
}

/**
 * CurseForge's file fingerprint: 32-bit MurmurHash2 over the bytes with
 * tab, LF, CR and space removed.
 */
export function curseforgeFingerprint(bytes: Uint8Array): number {
  let length = 0;
  for (const byte of bytes) {
    if (!isWhitespace(byte)) length++;
  }

  let hash = (SEED ^ length) >>> 0;
  let word = 0;
  let shift = 0;
  for (const byte of bytes) {
    if (isWhitespace(byte)) continue;
    word = (word | (byte << shift)) >>> 0;
    shift += 8;
    if (shift === 32) {
      const k = Math.imul(word, MULTIPLEX);
      const mixed = Math.imul(k ^ (k >>> 24), MULTIPLEX);
      hash = Math.imul(hash, MULTIPLEX) ^ mixed;
      word = 0;
      shift = 0;
    }
  }

  if (shift > 0) hash = Math.imul(hash ^ word, MULTIPLEX);

  const final = Math.imul(hash ^ (hash >>> 13), MULTIPLEX);
  return (final ^ (final >>> 15)) >>> 0;
}

export type IdentifiedMod = {
  fileName: string;
  modId: number;
  fileId: number;
};

export type IdentifyResult = {
  mods: IdentifiedMod[];
  unmatched: { fileName: string; fingerprint: number }[];
};

/**
 * Maps every file in `modsDir` to its catalog mod by fingerprint.
 */
export async function identifyMods(
  modsDir: string,
  curseClient: CurseClient,
): Promise<IdentifyResult> {
  const entries = await readdir(modsDir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const hashes: { fileName: string; fingerprint: number }[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const data = await readFile(join(modsDir, entry.name));
    hashes.push({ fileName: entry.name, fingerprint: curseforgeFingerprint(data) });
  }

  const results = await curseClient.getFingerprints(hashes.map((h) => h.fingerprint));
  const result: IdentifyResult = { mods: [], unmatched: [] };
  for (const hash of hashes) {
    const match = results.exactMatches.find((m) =>
      m.file.fileFingerprint === hash.fingerprint
    );
    if (match) {
      result.mods.push({
        fileName: hash.fileName,
        modId: match.file.modId,
        fileId: match.file.id,
      });
    } else {
      result.unmatched.push(hash);
    }
  }
  return result;
}
