import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import fse from "fs-extra";
import { LOADER_INDEX_URLS, VERSION_MANIFEST_URL, VersionCatalog } from "../launcher/catalog.ts";
import { decodeGameManifest } from "../launcher/decode.ts";
import { applyLibraryOverrides } from "../launcher/overrides.ts";
import { LoaderVersionNotFoundError, VersionNotFoundError } from "../types/errors.ts";
import { type TestContext, setupTestContext } from "../../tests/helpers/test-context.ts";
import { createStubClient, jsonResponse, textResponse } from "../../tests/helpers/http-stub.ts";
import {
  ASSET_INDEX_URL,
  forgeIndex,
  legacyLoaderManifest,
  LOG4J_CORE_JAR,
  META_URL,
  modernGameManifest,
  versionManifest,
} from "./fixtures/manifests.ts";

let ctx: TestContext;

beforeEach(async () => {
  ctx = await setupTestContext();
});

afterEach(async () => {
  await ctx.cleanup();
});

function createCatalog() {
  const client = createStubClient({
    [VERSION_MANIFEST_URL]: jsonResponse(versionManifest()),
    [`${META_URL}/v1/1.20.1.json`]: textResponse(JSON.stringify(modernGameManifest())),
    [ASSET_INDEX_URL]: textResponse(JSON.stringify({
      objects: { "icons/icon_16x16.png": { hash: "bdf48ef6b5d0d23bbb02e17d04865216179f510a", size: 3665 } },
    })),
    [LOADER_INDEX_URLS.forge]: jsonResponse(forgeIndex()),
    "https://meta.prismlauncher.org/v1/net.minecraftforge/7.8.1.738.json": textResponse(
      JSON.stringify(legacyLoaderManifest()),
    ),
  });
  const catalog = new VersionCatalog({
    client,
    cacheDir: ctx.path("cache"),
    assetsDir: ctx.path("assets"),
  });
  return { client, catalog };
}

test("resolveGameManifest - fetches once and then reads the cache", async () => {
  const { client, catalog } = createCatalog();

  const first = await catalog.resolveGameManifest("1.20.1");
  const second = await catalog.resolveGameManifest("1.20.1");

  assert.equal(first.id, "1.20.1");
  assert.deepEqual(second, first);
  assert.equal(client.count(VERSION_MANIFEST_URL), 1);
  assert.equal(client.count(`${META_URL}/v1/1.20.1.json`), 1);
  assert.equal(await fse.pathExists(ctx.path("cache", "versions", "1.20.1.json")), true);
});

test("resolveGameManifest - stores the upstream document verbatim", async () => {
  const { catalog } = createCatalog();

  await catalog.resolveGameManifest("1.20.1");

  const cached = await fse.readFile(ctx.path("cache", "versions", "1.20.1.json"), "utf8");
  assert.equal(cached, JSON.stringify(modernGameManifest()));
});

test("resolveGameManifest - replaces vulnerable log4j libraries", async () => {
  const { catalog } = createCatalog();

  const manifest = await catalog.resolveGameManifest("1.20.1");

  const names = manifest.libraries.map((library) => library.name);
  assert.equal(names.includes("org.apache.logging.log4j:log4j-core:2.8.1"), false);
  assert.equal(names[4], "org.apache.logging.log4j:log4j-core:2.17.1");
  assert.equal(
    manifest.libraries[4].downloads.artifact?.path,
    "org/apache/logging/log4j/log4j-core/2.17.1/log4j-core-2.17.1.jar",
  );
});

test("applyLibraryOverrides - log4j releases outside the vulnerable range are kept", () => {
  const manifest = decodeGameManifest(modernGameManifest());
  const log4j = manifest.libraries[4];
  const withVersion = (version: string) => ({
    ...manifest,
    libraries: [{ ...log4j, name: `org.apache.logging.log4j:log4j-core:${version}` }],
  });

  for (const version of ["2.18.0", "2.17.1", "2.0.0"]) {
    const patched = applyLibraryOverrides(withVersion(version));
    assert.equal(patched.libraries[0].name, `org.apache.logging.log4j:log4j-core:${version}`);
    assert.equal(patched.libraries[0].downloads.artifact?.path, LOG4J_CORE_JAR);
  }
});

test("resolveGameManifest - unknown versions fail", async () => {
  const { catalog } = createCatalog();

  await assert.rejects(catalog.resolveGameManifest("0.0.1"), VersionNotFoundError);
});

test("resolveAssetManifest - caches the index under assets/indexes", async () => {
  const { client, catalog } = createCatalog();
  const game = await catalog.resolveGameManifest("1.20.1");

  const assets = await catalog.resolveAssetManifest(game);
  await catalog.resolveAssetManifest(game);

  assert.deepEqual(Object.keys(assets.objects), ["icons/icon_16x16.png"]);
  assert.equal(client.count(ASSET_INDEX_URL), 1);
  assert.equal(await fse.pathExists(ctx.path("assets", "indexes", "5.json")), true);
});

test("listLoaderVersions - filters by Minecraft version, newest first", async () => {
  const { catalog } = createCatalog();

  const versions = await catalog.listLoaderVersions("1.20.1", "forge");

  assert.deepEqual(versions, [
    { version: "47.10.0", recommended: true },
    { version: "47.2.20", recommended: false },
    { version: "47.2.0", recommended: false },
  ]);
});

test("resolveLoaderManifest - adds the FML libraries of legacy Forge", async () => {
  const { catalog } = createCatalog();

  const manifest = await catalog.resolveLoaderManifest({ name: "forge", version: "7.8.1.738" });

  assert.equal(manifest.dist.kind, "legacy");
  if (manifest.dist.kind === "legacy") {
    const names = manifest.dist.fmlLibs?.map((library) => library.name);
    assert.deepEqual(names, [
      "fmllibs:argo-small:3.2",
      "fmllibs:guava:14.0:rc3",
      "fmllibs:asm-all:4.1",
      "fmllibs:bcprov-jdk15on:148",
      "fmllibs:scala-library",
      "fmllibs:deobfuscation_data:1.5.2",
    ]);
  }
  assert.equal(
    await fse.pathExists(ctx.path("cache", "versions", "forge_7.8.1.738.json")),
    true,
  );
});

test("resolveLoaderManifest - unknown loader versions fail", async () => {
  const { catalog } = createCatalog();

  await assert.rejects(
    catalog.resolveLoaderManifest({ name: "forge", version: "1.0.0" }),
    LoaderVersionNotFoundError,
  );
});
