import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import fse from "fs-extra";
import { Instance } from "../scripts/instance/instance.ts";
import { reconcileInstall } from "../scripts/instance/reconcile.ts";
import { CurseClient } from "../scripts/modpack/curseforge.ts";
import { Installer } from "../scripts/modpack/installer.ts";
import type { ModpackAsset, ModpackDescriptor } from "../scripts/modpack/types.ts";
import { type TestContext, setupTestContext } from "./helpers/test-context.ts";
import { createStubClient, textResponse } from "./helpers/http-stub.ts";

let ctx: TestContext;

beforeEach(async () => {
  ctx = await setupTestContext();
});

afterEach(async () => {
  await ctx.cleanup();
});

function jar(name: string): ModpackAsset {
  return {
    kind: "asset",
    name,
    path: "mods",
    url: `https://cdn.test/${name}`,
    size: 1,
    fileType: "mod",
    clientOnly: false,
    serverOnly: false,
    optional: false,
  };
}

function pack(names: string[]): ModpackDescriptor {
  return {
    name: "Test Pack",
    version: "2.0.0",
    mcVersion: "1.20.1",
    modLoader: { name: "neoforge", version: "47.1.79" },
    files: names.map(jar),
  };
}

async function setup() {
  const instance = await Instance.create(ctx.path("inst"), { mcVersion: "1.19.2" });
  const client = createStubClient({
    "https://cdn.test/A.jar": textResponse("A"),
    "https://cdn.test/B.jar": textResponse("B"),
    "https://cdn.test/C.jar": textResponse("C"),
    "https://cdn.test/D.jar": textResponse("D"),
  });
  const installer = new Installer({
    destDir: instance.gameDir,
    client,
    curseClient: new CurseClient({ client, apiKey: "test-secret" }),
  });
  return { instance, installer, client };
}

test("reconcileInstall - removes files the new version no longer ships", async () => {
  const { instance, installer, client } = await setup();
  await reconcileInstall(instance, installer, pack(["A.jar", "B.jar", "C.jar"]), {
    type: "ftb",
    pack_id: 7,
    version: 70,
  });

  const result = await reconcileInstall(instance, installer, pack(["B.jar", "C.jar", "D.jar"]), {
    type: "ftb",
    pack_id: 7,
    version: 71,
  });

  assert.deepEqual(result, {
    installedFiles: ["mods/B.jar", "mods/C.jar", "mods/D.jar"],
    removedFiles: ["mods/A.jar"],
  });
  assert.equal(await fse.pathExists(ctx.path("inst", "minecraft", "mods", "A.jar")), false);
  assert.equal(await fse.readFile(ctx.path("inst", "minecraft", "mods", "D.jar"), "utf8"), "D");
  assert.equal(client.count("https://cdn.test/B.jar"), 1);
});

test("reconcileInstall - records the pack in the manifest", async () => {
  const { instance, installer } = await setup();

  await reconcileInstall(instance, installer, pack(["A.jar"]), {
    type: "curse_zip",
    file_name: "pack.zip",
  });

  const saved = JSON.parse(await fse.readFile(ctx.path("inst", "manifest.json"), "utf8"));
  assert.deepEqual(saved, {
    mc_version: "1.20.1",
    game_dir: "minecraft",
    mod_loader: { name: "neoforge", version: "47.1.79" },
    modpack: {
      id: { type: "curse_zip", file_name: "pack.zip" },
      files: ["mods/A.jar"],
    },
  });
  const reloaded = await Instance.load(ctx.path("inst"));
  assert.deepEqual(reloaded.modpack?.files, ["mods/A.jar"]);
});

test("reconcileInstall - a first install removes nothing", async () => {
  const { instance, installer } = await setup();
  await ctx.createFile("inst/minecraft/mods/user-added.jar", "mine");

  const result = await reconcileInstall(instance, installer, pack(["A.jar"]), {
    type: "curseforge",
    mod_id: 1,
    version: 2,
  });

  assert.deepEqual(result.removedFiles, []);
  assert.equal(await fse.pathExists(ctx.path("inst", "minecraft", "mods", "user-added.jar")), true);
});
