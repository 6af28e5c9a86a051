import { test } from "node:test";
import assert from "node:assert/strict";
import {
  decodeAssetManifest,
  decodeGameManifest,
  decodeLibrary,
  decodeLoaderIndex,
  decodeLoaderManifest,
  decodeRule,
  isLoaderName,
} from "../launcher/decode.ts";
import { setLogLevel } from "../logger.ts";
import { MalformedDataError } from "../types/errors.ts";
import {
  currentLoaderManifest,
  forgeIndex,
  legacyGameManifest,
  legacyLoaderManifest,
  modernGameManifest,
} from "./fixtures/manifests.ts";

setLogLevel("silent");

test("decodeGameManifest - reads structured arguments", () => {
  const manifest = decodeGameManifest(modernGameManifest());

  assert.equal(manifest.id, "1.20.1");
  assert.equal(manifest.libraries.length, 5);
  assert.equal(manifest.arguments?.game.length, 5);
  assert.equal(manifest.arguments?.jvm.length, 4);
  assert.equal(manifest.minecraftArguments, undefined);
  assert.deepEqual(manifest.arguments?.jvm[0], {
    rules: [{ action: "allow", os: { name: "osx", version: undefined, arch: undefined } }],
    value: ["-XstartOnFirstThread"],
  });
});

test("decodeGameManifest - reads legacy argument strings", () => {
  const manifest = decodeGameManifest(legacyGameManifest());

  assert.equal(manifest.arguments, undefined);
  assert.equal(
    manifest.minecraftArguments,
    "${auth_player_name}  ${auth_session} --gameDir ${game_directory}",
  );
});

test("decodeGameManifest - structured arguments win when both forms exist", () => {
  const manifest = decodeGameManifest({
    ...modernGameManifest(),
    minecraftArguments: "--username ${auth_player_name}",
  });

  assert.equal(manifest.minecraftArguments, undefined);
  assert.equal(manifest.arguments?.game[0], "--username");
});

test("decodeGameManifest - rejects a manifest without arguments", () => {
  const { arguments: _, ...rest } = modernGameManifest();

  assert.throws(() => decodeGameManifest(rest), MalformedDataError);
});

test("decodeGameManifest - rejects a missing required field", () => {
  const { mainClass: _, ...rest } = modernGameManifest();

  assert.throws(() => decodeGameManifest(rest), MalformedDataError);
});

test("decodeLibrary - keeps only known natives platforms", () => {
  const library = decodeLibrary({
    name: "org.lwjgl.lwjgl:lwjgl-platform:2.9.0",
    downloads: {},
    natives: { linux: "natives-linux", solaris: "natives-solaris" },
  });

  assert.deepEqual(library.natives, { linux: "natives-linux" });
  assert.deepEqual(library.downloads, {});
});

test("decodeRule - rejects unknown actions", () => {
  assert.throws(() => decodeRule({ action: "maybe" }), MalformedDataError);
});

test("decodeRule - coerces feature flags to booleans", () => {
  const rule = decodeRule({ action: "allow", features: { has_custom_resolution: "yes" } });

  assert.deepEqual(rule, { action: "allow", features: { has_custom_resolution: false } });
});

test("decodeAssetManifest - reads flags and objects", () => {
  const manifest = decodeAssetManifest({
    virtual: true,
    objects: { "sounds/a.ogg": { hash: "ab01", size: 3 } },
  });

  assert.deepEqual(manifest, {
    objects: { "sounds/a.ogg": { hash: "ab01", size: 3 } },
    virtual: true,
    map_to_resources: undefined,
  });
});

test("decodeLoaderManifest - libraries and mainClass make a current dist", () => {
  const manifest = decodeLoaderManifest(currentLoaderManifest());

  assert.equal(manifest.dist.kind, "current");
  if (manifest.dist.kind === "current") {
    assert.equal(manifest.dist.mainClass, "net.minecraft.launchwrapper.Launch");
    assert.equal(manifest.dist.libraries[0].kind, "downloads");
    assert.deepEqual(manifest.dist.libraries[1], {
      kind: "url",
      name: "net.minecraft:launchwrapper:1.12",
      url: "https://libraries.minecraft.net/",
    });
  }
});

test("decodeLoaderManifest - jarMods make a legacy dist", () => {
  const manifest = decodeLoaderManifest(legacyLoaderManifest());

  assert.equal(manifest.dist.kind, "legacy");
  assert.deepEqual(manifest.tweakers, ["cpw.mods.fml.common.launcher.FMLTweaker"]);
  assert.deepEqual(manifest.requires, [
    { uid: "net.minecraft", equals: "1.5.2", suggests: undefined },
  ]);
});

test("decodeLoaderManifest - rejects a manifest with neither dist form", () => {
  assert.throws(
    () => decodeLoaderManifest({ uid: "net.minecraftforge", name: "Forge", version: "1" }),
    MalformedDataError,
  );
});

test("decodeLoaderIndex - defaults recommended to false", () => {
  const index = decodeLoaderIndex(forgeIndex());

  assert.equal(index.versions.length, 5);
  assert.equal(index.versions[0].recommended, false);
  assert.equal(index.versions[1].recommended, true);
});

test("isLoaderName - accepts forge and neoforge only", () => {
  assert.equal(isLoaderName("forge"), true);
  assert.equal(isLoaderName("neoforge"), true);
  assert.equal(isLoaderName("fabric"), false);
});
