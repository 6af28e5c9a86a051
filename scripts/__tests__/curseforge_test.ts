import { test } from "node:test";
import assert from "node:assert/strict";
import { CURSE_API_URL, CurseClient } from "../modpack/curseforge.ts";
import {
  decodeCurseForgePackManifest,
  packModLoader,
  parseModLoaderId,
} from "../modpack/decode.ts";
import { InvalidModLoaderIdError } from "../types/errors.ts";
import { createStubClient, jsonResponse } from "../../tests/helpers/http-stub.ts";

test("getFiles - posts the ids and drops repeated mods", async () => {
  const client = createStubClient({
    [`${CURSE_API_URL}mods/files`]: jsonResponse({
      data: [
        { id: 10, modId: 1, fileName: "a.jar", fileLength: 5, downloadUrl: "https://edge.test/a.jar" },
        { id: 11, modId: 1, fileName: "a-old.jar", fileLength: 4, downloadUrl: "https://edge.test/a-old.jar" },
        { id: 20, modId: 2, fileName: "b.jar", fileLength: 7, downloadUrl: null },
      ],
    }),
  });
  const curse = new CurseClient({ client, apiKey: "test-secret" });

  const files = await curse.getFiles([10, 20]);

  assert.deepEqual(files, [
    {
      id: 10,
      modId: 1,
      fileName: "a.jar",
      fileLength: 5,
      downloadUrl: "https://edge.test/a.jar",
      fileFingerprint: undefined,
    },
    {
      id: 20,
      modId: 2,
      fileName: "b.jar",
      fileLength: 7,
      downloadUrl: undefined,
      fileFingerprint: undefined,
    },
  ]);
  const [request] = client.requests;
  assert.equal(request.method, "POST");
  assert.equal(request.body, '{"fileIds":[10,20]}');
  assert.equal(request.headers.get("x-api-key"), "test-secret");
  assert.equal(request.headers.get("content-type"), "application/json");
});

test("getFiles - empty id lists never reach the API", async () => {
  const client = createStubClient({});
  const curse = new CurseClient({ client, apiKey: "test-secret" });

  assert.deepEqual(await curse.getFiles([]), []);
  assert.deepEqual(await curse.getMods([]), []);
  assert.deepEqual(await curse.getFingerprints([]), { exactMatches: [], exactFingerprints: [] });
  assert.equal(client.requests.length, 0);
});

test("getMods - reads the website url from links", async () => {
  const client = createStubClient({
    "https://curse.test/v1/mods": jsonResponse({
      data: [{
        id: 1,
        slug: "jei",
        classId: 6,
        links: { websiteUrl: "https://www.curseforge.com/minecraft/mc-mods/jei" },
      }],
    }),
  });
  const curse = new CurseClient({
    client,
    apiKey: "test-secret",
    baseUrl: "https://curse.test/v1/",
  });

  const mods = await curse.getMods([1]);

  assert.deepEqual(mods, [{
    id: 1,
    slug: "jei",
    classId: 6,
    websiteUrl: "https://www.curseforge.com/minecraft/mc-mods/jei",
  }]);
  assert.equal(client.requests[0].body, '{"modIds":[1]}');
});

test("parseModLoaderId - splits at the first dash", () => {
  assert.deepEqual(parseModLoaderId("forge-47.2.0"), { name: "forge", version: "47.2.0" });
  assert.deepEqual(parseModLoaderId("neoforge-20.4.80-beta"), {
    name: "neoforge",
    version: "20.4.80-beta",
  });
});

test("parseModLoaderId - rejects malformed or unsupported ids", () => {
  assert.throws(() => parseModLoaderId("forge"), InvalidModLoaderIdError);
  assert.throws(() => parseModLoaderId("forge-"), InvalidModLoaderIdError);
  assert.throws(() => parseModLoaderId("-47.2.0"), InvalidModLoaderIdError);
  assert.throws(() => parseModLoaderId("fabric-0.15.0"), InvalidModLoaderIdError);
});

test("decodeCurseForgePackManifest - fills defaults", () => {
  const manifest = decodeCurseForgePackManifest({
    name: "Test Pack",
    version: "1.0.0",
    minecraft: {
      version: "1.20.1",
      modLoaders: [{ id: "forge-47.1.0" }, { id: "forge-47.2.0", primary: true }],
    },
    files: [{ projectID: 1, fileID: 10 }, { projectID: 2, fileID: 20, required: false }],
  });

  assert.equal(manifest.author, "");
  assert.equal(manifest.overrides, "overrides");
  assert.deepEqual(manifest.files, [
    { projectID: 1, fileID: 10, required: true },
    { projectID: 2, fileID: 20, required: false },
  ]);
  assert.deepEqual(packModLoader(manifest), { name: "forge", version: "47.2.0" });
});
