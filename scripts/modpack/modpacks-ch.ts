import { fetchJson, type HttpClient } from "../launcher/utils.ts";
import { type ProgressSink, silentProgress, withProgress } from "../terminal/progress.ts";
import {
  decodeModpackManifest,
  decodeModpackSearch,
  decodeModpackVersionManifest,
} from "./decode.ts";
import type { ModpackManifest, ModpackSearch, ModpackVersionManifest } from "./types.ts";

export const MODPACKS_CH_URL = "https://api.modpacks.ch/public/";
export const FTB_PACK_API_URL = "https://api.feed-the-beast.com/v1/modpacks/modpack/";

export type SearchHit = {
  provider: "ftb" | "curseforge";
  pack: ModpackManifest;
};

/** The search endpoint caps results at this many packs. */
export const MAX_SEARCH_LIMIT = 50;

/**
 * FTB and CurseForge pack metadata. FTB packs come from the FTB API
 * directly; its `clientonly` flags build working server packs where
 * modpacks.ch's do not.
 */
export class ModpacksClient {
  readonly #client: HttpClient;

  constructor(client: HttpClient) {
    this.#client = client;
  }

  async getFtbPack(packId: number): Promise<ModpackManifest> {
    return decodeModpackManifest(
      await fetchJson(this.#client, `${FTB_PACK_API_URL}${packId}`),
    );
  }

  async getFtbPackVersion(packId: number, versionId: number): Promise<ModpackVersionManifest> {
    return decodeModpackVersionManifest(
      await fetchJson(this.#client, `${FTB_PACK_API_URL}${packId}/${versionId}`),
    );
  }

  async getCursePack(packId: number): Promise<ModpackManifest> {
    return decodeModpackManifest(
      await fetchJson(this.#client, `${MODPACKS_CH_URL}curseforge/${packId}`),
    );
  }

  async getCursePackVersion(
    packId: number,
    versionId: number,
  ): Promise<ModpackVersionManifest> {
    return decodeModpackVersionManifest(
      await fetchJson(this.#client, `${MODPACKS_CH_URL}curseforge/${packId}/${versionId}`),
    );
  }

  async searchPacks(term: string, limit = MAX_SEARCH_LIMIT): Promise<ModpackSearch> {
    const capped = Math.min(Math.max(limit, 1), MAX_SEARCH_LIMIT);
    const url = `${MODPACKS_CH_URL}modpack/search/${capped}?term=${encodeURIComponent(term)}`;
    return decodeModpackSearch(await fetchJson(this.#client, url));
  }

  /**
   * Runs a search and fetches the metadata of every hit, FTB packs first.
   */
  async searchPackManifests(
    term: string,
    limit = MAX_SEARCH_LIMIT,
    sink: ProgressSink = silentProgress,
  ): Promise<SearchHit[]> {
    const search = await this.searchPacks(term, limit);
    const ids = [
      ...search.packs.map((id) => ({ provider: "ftb" as const, id })),
      ...search.curseforge.map((id) => ({ provider: "curseforge" as const, id })),
    ];
    const hits: SearchHit[] = [];
    await withProgress(sink, "Retrieving search results", ids.length, async () => {
      for (const [index, { provider, id }] of ids.entries()) {
        const pack = provider === "ftb" ? await this.getFtbPack(id) : await this.getCursePack(id);
        hits.push({ provider, pack });
        sink.advance(index + 1);
      }
    });
    return hits;
  }
}
