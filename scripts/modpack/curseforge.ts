import { expectArray } from "../types/guards.ts";
import { postJson, type HttpClient } from "../launcher/utils.ts";
import {
  curseData,
  decodeCurseForgeFile,
  decodeCurseForgeMod,
  decodeFingerprintMatches,
} from "./decode.ts";
import type { CurseForgeFile, CurseForgeMod, FingerprintMatches } from "./types.ts";

export const CURSE_API_URL = "https://api.curseforge.com/v1/";

/** CurseForge game id of Minecraft. */
const MINECRAFT_GAME_ID = 432;

export type CurseClientOptions = {
  client: HttpClient;
  apiKey: string;
  baseUrl?: string;
};

/**
 * Batch queries against the CurseForge catalog. Empty id lists never reach
 * the API, which rejects them.
 */
export class CurseClient {
  readonly #client: HttpClient;
  readonly #apiKey: string;
  readonly #baseUrl: string;

  constructor(options: CurseClientOptions) {
    this.#client = options.client;
    this.#apiKey = options.apiKey;
    this.#baseUrl = options.baseUrl ?? CURSE_API_URL;
  }

  /**
   * File metadata, with repeated entries for the same mod dropped. The
   * catalog occasionally answers with duplicates.
   */
  async getFiles(fileIds: readonly number[]): Promise<CurseForgeFile[]> {
    if (!fileIds.length) return [];
    const data = await this.#post("mods/files", { fileIds });
    const files = expectArray(data, "files").map(decodeCurseForgeFile);

    const seen = new Set<number>();
    return files.filter((file) => {
      if (seen.has(file.modId)) return false;
      seen.add(file.modId);
      return true;
    });
  }

  async getMods(modIds: readonly number[]): Promise<CurseForgeMod[]> {
    if (!modIds.length) return [];
    const data = await this.#post("mods", { modIds });
    return expectArray(data, "mods").map(decodeCurseForgeMod);
  }

  async getFingerprints(fingerprints: readonly number[]): Promise<FingerprintMatches> {
    if (!fingerprints.length) return { exactMatches: [], exactFingerprints: [] };
    const data = await this.#post(`fingerprints/${MINECRAFT_GAME_ID}`, { fingerprints });
    return decodeFingerprintMatches(data);
  }

  async #post(path: string, body: unknown): Promise<unknown> {
    const response = await postJson(this.#client, `${this.#baseUrl}${path}`, body, {
      "x-api-key": this.#apiKey,
    });
    return curseData(response);
  }
}
