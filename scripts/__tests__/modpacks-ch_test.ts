import { test } from "node:test";
import assert from "node:assert/strict";
import { FTB_PACK_API_URL, MODPACKS_CH_URL, ModpacksClient } from "../modpack/modpacks-ch.ts";
import { getMinecraftVersion, getModLoader } from "../modpack/decode.ts";
import { InvalidModLoaderIdError, MalformedDataError, NetworkError } from "../types/errors.ts";
import { createStubClient, jsonResponse, notFoundResponse } from "../../tests/helpers/http-stub.ts";

const pack = {
  id: 7,
  name: "Test Pack",
  synopsis: "A pack for tests",
  type: "FTB",
  versions: [
    { id: 70, name: "1.0.0", type: "Release", updated: 1700000000, targets: [] },
    { id: 71, name: "1.1.0", type: "Release", updated: 1710000000 },
  ],
};

const version = {
  id: 71,
  parent: 7,
  name: "1.1.0",
  type: "Release",
  files: [{ id: 1, name: "a.jar", path: "./mods/", url: "", clientonly: true }],
  targets: [
    { id: 1, name: "minecraft", version: "1.20.1", type: "game" },
    { id: 2, name: "neoforge", version: "47.1.79", type: "modloader" },
  ],
};

test("getFtbPack - reads pack metadata from the FTB API", async () => {
  const client = createStubClient({ [`${FTB_PACK_API_URL}7`]: jsonResponse(pack) });

  const manifest = await new ModpacksClient(client).getFtbPack(7);

  assert.equal(manifest.name, "Test Pack");
  assert.deepEqual(manifest.versions.map((v) => [v.id, v.updated]), [
    [70, 1700000000],
    [71, 1710000000],
  ]);
});

test("getFtbPackVersion - decodes files and targets", async () => {
  const client = createStubClient({ [`${FTB_PACK_API_URL}7/71`]: jsonResponse(version) });

  const manifest = await new ModpacksClient(client).getFtbPackVersion(7, 71);

  assert.deepEqual(manifest.files[0], {
    id: 1,
    name: "a.jar",
    type: "",
    path: "./mods/",
    url: undefined,
    sha1: "",
    size: 0,
    clientonly: true,
    serveronly: false,
    optional: false,
    curseforge: undefined,
  });
  assert.equal(getMinecraftVersion(manifest), "1.20.1");
  assert.deepEqual(getModLoader(manifest), { name: "neoforge", version: "47.1.79" });
});

test("getCursePackVersion - uses the modpacks.ch curseforge route", async () => {
  const client = createStubClient({
    [`${MODPACKS_CH_URL}curseforge/7/71`]: jsonResponse(version),
  });

  const manifest = await new ModpacksClient(client).getCursePackVersion(7, 71);

  assert.equal(manifest.id, 71);
});

test("getCursePack - missing packs surface as network errors", async () => {
  const client = createStubClient({ [`${MODPACKS_CH_URL}curseforge/8`]: notFoundResponse() });

  await assert.rejects(new ModpacksClient(client).getCursePack(8), (error: unknown) => {
    assert.ok(error instanceof NetworkError);
    assert.equal(error.statusCode, 404);
    return true;
  });
});

test("searchPacks - clamps the limit and encodes the term", async () => {
  const client = createStubClient({
    [`${MODPACKS_CH_URL}modpack/search/50?term=all%20the%20mods`]: jsonResponse({
      packs: [1, 2],
      curseforge: [3],
      total: 3,
      limit: 50,
    }),
    [`${MODPACKS_CH_URL}modpack/search/1?term=x`]: jsonResponse({ packs: [] }),
  });
  const modpacks = new ModpacksClient(client);

  const result = await modpacks.searchPacks("all the mods", 100);
  const empty = await modpacks.searchPacks("x", 0);

  assert.deepEqual(result, { packs: [1, 2], curseforge: [3], total: 3, limit: 50 });
  assert.deepEqual(empty, { packs: [], curseforge: [], total: 0, limit: 0 });
});

test("searchPackManifests - fetches every hit, FTB packs first", async () => {
  const client = createStubClient({
    [`${MODPACKS_CH_URL}modpack/search/5?term=tech`]: jsonResponse({
      packs: [7],
      curseforge: [9],
      total: 2,
      limit: 5,
    }),
    [`${FTB_PACK_API_URL}7`]: jsonResponse(pack),
    [`${MODPACKS_CH_URL}curseforge/9`]: jsonResponse({ ...pack, id: 9, name: "Curse Pack" }),
  });
  const events: string[] = [];

  const hits = await new ModpacksClient(client).searchPackManifests("tech", 5, {
    begin: (label, total) => events.push(`begin ${label} ${total}`),
    advance: (current) => events.push(`advance ${current}`),
    end: () => events.push("end"),
  });

  assert.deepEqual(hits.map((hit) => [hit.provider, hit.pack.id, hit.pack.name]), [
    ["ftb", 7, "Test Pack"],
    ["curseforge", 9, "Curse Pack"],
  ]);
  assert.deepEqual(events, [
    "begin Retrieving search results 2",
    "advance 1",
    "advance 2",
    "end",
  ]);
});

test("getMinecraftVersion - a version without a game target is malformed", () => {
  assert.throws(
    () => getMinecraftVersion({ id: 1, parent: 0, name: "x", type: "", files: [], targets: [] }),
    MalformedDataError,
  );
});

test("getModLoader - unsupported loaders are rejected", () => {
  assert.throws(
    () =>
      getModLoader({
        id: 1,
        parent: 0,
        name: "x",
        type: "",
        files: [],
        targets: [{ id: 1, name: "fabric", version: "0.15.0", type: "modloader" }],
      }),
    InvalidModLoaderIdError,
  );
});
