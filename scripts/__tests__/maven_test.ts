import { test } from "node:test";
import assert from "node:assert/strict";
import {
  clientJarPath,
  libraryNameToPath,
  loaderLibraryPath,
  loaderLibraryUrl,
  parseLibraryName,
} from "../launcher/maven.ts";
import { InvalidLibraryNameError } from "../types/errors.ts";

test("libraryNameToPath - expands group dots into directories", () => {
  assert.equal(
    libraryNameToPath("org.ow2.asm:asm:9.5"),
    "org/ow2/asm/asm/9.5/asm-9.5.jar",
  );
});

test("libraryNameToPath - appends the classifier", () => {
  assert.equal(
    libraryNameToPath("net.minecraftforge:forge:1.12.2-14.23.5.2860:universal"),
    "net/minecraftforge/forge/1.12.2-14.23.5.2860/forge-1.12.2-14.23.5.2860-universal.jar",
  );
});

test("parseLibraryName - rejects names without a version", () => {
  assert.throws(() => parseLibraryName("org.ow2.asm:asm"), InvalidLibraryNameError);
  assert.throws(() => parseLibraryName(":asm:1.0"), InvalidLibraryNameError);
});

test("clientJarPath - lives under the mojang group", () => {
  assert.equal(clientJarPath("1.20.1"), "com/mojang/minecraft/1.20.1/minecraft-1.20.1-client.jar");
});

test("loaderLibraryUrl - joins the repository and the maven path", () => {
  const library = {
    kind: "url" as const,
    name: "net.minecraftforge:forge:1.7.10-10.13.4.1614-1.7.10:universal",
    url: "https://maven.minecraftforge.net/",
  };

  assert.equal(
    loaderLibraryUrl(library),
    "https://maven.minecraftforge.net/net/minecraftforge/forge/1.7.10-10.13.4.1614-1.7.10/forge-1.7.10-10.13.4.1614-1.7.10-universal.jar",
  );
});

test("loaderLibraryUrl - falls back to the default repository", () => {
  const library = { kind: "url" as const, name: "com.google.guava:guava:17.0" };

  assert.equal(
    loaderLibraryUrl(library),
    "https://libraries.minecraft.net/com/google/guava/guava/17.0/guava-17.0.jar",
  );
});

test("loaderLibraryPath - prefers the artifact path", () => {
  const library = {
    kind: "downloads" as const,
    name: "net.neoforged:neoforge:20.4.80",
    downloads: {
      artifact: {
        path: "net/neoforged/neoforge/20.4.80/neoforge-20.4.80-universal.jar",
        sha1: "0",
        size: 1,
        url: "https://maven.neoforged.net/releases/net/neoforged/neoforge/20.4.80/neoforge-20.4.80-universal.jar",
      },
    },
  };

  assert.equal(
    loaderLibraryPath(library),
    "net/neoforged/neoforge/20.4.80/neoforge-20.4.80-universal.jar",
  );
});

test("loaderLibraryPath - derives the path from a /maven/ url", () => {
  const library = {
    kind: "downloads" as const,
    name: "cpw.mods:securejarhandler:2.1.10",
    downloads: {
      artifact: {
        sha1: "0",
        size: 1,
        url: "https://maven.example.test/maven/cpw/mods/securejarhandler/2.1.10/securejarhandler-2.1.10.jar",
      },
    },
  };

  assert.equal(
    loaderLibraryPath(library),
    "cpw/mods/securejarhandler/2.1.10/securejarhandler-2.1.10.jar",
  );
});
