/**
 * Upstream-shaped metadata documents for launcher tests.
 */

export const LIBRARIES_URL = "https://libraries.test";
export const META_URL = "https://meta.test";

function artifact(path: string) {
  return { path, sha1: "0", size: 1, url: `${LIBRARIES_URL}/${path}` };
}

export const ASM_JAR = "org/ow2/asm/asm/9.3/asm-9.3.jar";
export const LWJGL_JAR = "org/lwjgl/lwjgl/3.3.1/lwjgl-3.3.1.jar";
export const LWJGL_NATIVES_LINUX = "org/lwjgl/lwjgl/3.3.1/lwjgl-3.3.1-natives-linux.jar";
export const LWJGL_NATIVES_MACOS = "org/lwjgl/lwjgl/3.3.1/lwjgl-3.3.1-natives-macos.jar";
export const LOG4J_CORE_JAR = "org/apache/logging/log4j/log4j-core/2.8.1/log4j-core-2.8.1.jar";
export const CLIENT_JAR_URL = `${META_URL}/client.jar`;
export const ASSET_INDEX_URL = `${META_URL}/indexes/5.json`;

export function modernGameManifest() {
  return {
    id: "1.20.1",
    type: "release",
    mainClass: "net.minecraft.client.main.Main",
    arguments: {
      game: [
        "--username",
        "${auth_player_name}",
        "--version",
        "${version_name}",
        {
          rules: [{ action: "allow", features: { is_demo_user: true } }],
          value: "--demo",
        },
      ],
      jvm: [
        {
          rules: [{ action: "allow", os: { name: "osx" } }],
          value: ["-XstartOnFirstThread"],
        },
        "-Djava.library.path=${natives_directory}",
        "-cp",
        "${classpath}",
      ],
    },
    libraries: [
      { name: "org.ow2.asm:asm:9.3", downloads: { artifact: artifact(ASM_JAR) } },
      { name: "org.lwjgl:lwjgl:3.3.1", downloads: { artifact: artifact(LWJGL_JAR) } },
      {
        name: "org.lwjgl:lwjgl:3.3.1:natives-linux",
        downloads: { artifact: artifact(LWJGL_NATIVES_LINUX) },
        rules: [{ action: "allow", os: { name: "linux" } }],
      },
      {
        name: "org.lwjgl:lwjgl:3.3.1:natives-macos",
        downloads: { artifact: artifact(LWJGL_NATIVES_MACOS) },
        rules: [{ action: "allow", os: { name: "osx" } }],
      },
      {
        name: "org.apache.logging.log4j:log4j-core:2.8.1",
        downloads: { artifact: artifact(LOG4J_CORE_JAR) },
      },
    ],
    assetIndex: { id: "5", sha1: "0", size: 1, totalSize: 2, url: ASSET_INDEX_URL },
    assets: "5",
    downloads: { client: { sha1: "0", size: 1, url: CLIENT_JAR_URL } },
  };
}

export const PLATFORM_NATIVES_LINUX =
  "org/lwjgl/lwjgl/lwjgl-platform/2.9.0/lwjgl-platform-2.9.0-natives-linux.jar";
export const LWJGL2_JAR = "org/lwjgl/lwjgl/lwjgl/2.9.0/lwjgl-2.9.0.jar";

export function legacyGameManifest() {
  return {
    id: "1.5.2",
    type: "release",
    mainClass: "net.minecraft.client.Minecraft",
    minecraftArguments: "${auth_player_name}  ${auth_session} --gameDir ${game_directory}",
    libraries: [
      { name: "org.lwjgl.lwjgl:lwjgl:2.9.0", downloads: { artifact: artifact(LWJGL2_JAR) } },
      {
        name: "org.lwjgl.lwjgl:lwjgl-platform:2.9.0",
        downloads: {
          classifiers: { "natives-linux": artifact(PLATFORM_NATIVES_LINUX) },
        },
        natives: { linux: "natives-linux" },
        extract: { exclude: ["META-INF/"] },
      },
    ],
    assetIndex: { id: "pre-1.6", sha1: "0", size: 1, url: `${META_URL}/indexes/pre-1.6.json` },
    assets: "pre-1.6",
    downloads: { client: { sha1: "0", size: 1, url: `${META_URL}/client-1.5.2.jar` } },
  };
}

export const FORGE_1122_JAR =
  "net/minecraftforge/forge/1.12.2-14.23.5.2860/forge-1.12.2-14.23.5.2860.jar";

export function currentLoaderManifest() {
  return {
    uid: "net.minecraftforge",
    name: "Forge",
    version: "14.23.5.2860",
    requires: [{ uid: "net.minecraft", equals: "1.12.2" }],
    mainClass: "net.minecraft.launchwrapper.Launch",
    minecraftArguments:
      "--username ${auth_player_name} --tweakClass net.minecraftforge.fml.common.launcher.FMLTweaker",
    libraries: [
      {
        name: "net.minecraftforge:forge:1.12.2-14.23.5.2860",
        downloads: { artifact: artifact(FORGE_1122_JAR) },
      },
      { name: "net.minecraft:launchwrapper:1.12", url: "https://libraries.minecraft.net/" },
    ],
  };
}

export function legacyLoaderManifest() {
  return {
    uid: "net.minecraftforge",
    name: "Forge",
    version: "7.8.1.738",
    requires: [{ uid: "net.minecraft", equals: "1.5.2" }],
    "+tweakers": ["cpw.mods.fml.common.launcher.FMLTweaker"],
    jarMods: [
      {
        name: "net.minecraftforge:forge:1.5.2-7.8.1.738:universal",
        url: "https://maven.minecraftforge.net/",
      },
    ],
  };
}

export function forgeIndex() {
  const entry = (version: string, mc: string, recommended = false) => ({
    version,
    recommended,
    requires: [{ uid: "net.minecraft", equals: mc }],
  });
  return {
    uid: "net.minecraftforge",
    name: "Forge",
    versions: [
      entry("47.2.0", "1.20.1"),
      entry("47.10.0", "1.20.1", true),
      entry("47.2.20", "1.20.1"),
      entry("43.3.0", "1.19.2"),
      entry("7.8.1.738", "1.5.2"),
    ],
  };
}

export function versionManifest() {
  return {
    latest: { release: "1.20.1", snapshot: "1.20.1" },
    versions: [
      {
        id: "1.20.1",
        type: "release",
        url: `${META_URL}/v1/1.20.1.json`,
        time: "2023-06-12T00:00:00+00:00",
        releaseTime: "2023-06-12T00:00:00+00:00",
      },
    ],
  };
}
