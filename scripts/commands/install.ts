import { basename, join } from "node:path";
import { parseArgs } from "node:util";
import { confirm, isCancel, log, select } from "@clack/prompts";
import type { Command } from "../command.ts";
import { Instance, type ModpackId } from "../instance/instance.ts";
import { reconcileInstall } from "../instance/reconcile.ts";
import { ServerInstance } from "../instance/server-instance.ts";
import { installServer } from "../launcher/server.ts";
import { getMinecraftVersion, getModLoader } from "../modpack/decode.ts";
import { DownloadWatcher } from "../modpack/download-watcher.ts";
import { descriptorFromModpacksCh, type Installer } from "../modpack/installer.ts";
import { MAX_SEARCH_LIMIT } from "../modpack/modpacks-ch.ts";
import { descriptorFromCurseForgeZip, withCurseForgeZip } from "../modpack/pack-zip.ts";
import type { FileDownload, ModpackManifest, ModpackVersionManifest } from "../modpack/types.ts";
import { AppError, ValidationError } from "../types/errors.ts";
import { type CommandContext, loadContext } from "./context.ts";

type InstallTarget = Instance | ServerInstance;

const sameLoader = (a: InstallTarget["modLoader"], b: InstallTarget["modLoader"]) =>
  a?.name === b?.name && a?.version === b?.version;

function parseId(value: string | undefined, what: string): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Expected a numeric ${what}, got '${value ?? ""}'.`, what);
  }
  return id;
}

function latestVersionId(manifest: ModpackManifest): number {
  const latest = [...manifest.versions].sort((a, b) => b.updated - a.updated)[0];
  if (!latest) throw new ValidationError(`Modpack ${manifest.name} has no versions.`);
  return latest.id;
}

/**
 * Waits for the user to fetch blocked files into the downloads directory,
 * then moves each one into place. Ctrl-C stops waiting.
 */
async function completeManualDownloads(
  installer: Installer,
  blocked: readonly FileDownload[],
  downloadsDir: string,
): Promise<void> {
  log.warn(`${blocked.length} file(s) must be downloaded by hand into ${downloadsDir}:`);
  for (const file of blocked) log.message(`${file.fileName}\n${file.url}`);

  const watcher = await DownloadWatcher.create(downloadsDir, blocked.map((f) => f.fileName));
  const session = watcher.watch();
  const onInterrupt = () => session.cancel();
  process.once("SIGINT", onInterrupt);
  try {
    for await (const message of session.messages) {
      if (message.type === "file-complete") {
        log.info(`Found ${basename(message.path)}`);
      } else if (message.type === "error") {
        throw new AppError("Watching the downloads directory failed.", message.error);
      }
    }
  } finally {
    process.off("SIGINT", onInterrupt);
  }

  for (const file of blocked) {
    if (!watcher.isFileComplete(file.fileName)) continue;
    await installer.installFile(file, join(downloadsDir, file.fileName));
  }
  const pending = watcher.pending();
  if (pending.length) log.warn(`Still missing: ${pending.join(", ")}`);
}

async function finish(
  context: CommandContext,
  installer: Installer,
  instance: InstallTarget,
  blocked: FileDownload[] | undefined,
): Promise<void> {
  if (blocked?.length) {
    await completeManualDownloads(installer, blocked, context.config.paths.downloadsDir);
  }
  log.success(`Installed into ${instance.name}`);
}

/**
 * Installs a modpacks.ch version. A server instance gets the pack's server
 * files, and its server is reinstalled when the pack moves it to another
 * Minecraft or mod loader version.
 */
async function installVersion(
  context: CommandContext,
  instance: InstallTarget,
  pack: ModpackManifest,
  manifest: ModpackVersionManifest,
  id: ModpackId,
): Promise<void> {
  const isServer = instance instanceof ServerInstance;
  const { mcVersion, modLoader } = instance;
  const installer = context.installer(instance.gameDir);
  const descriptor = descriptorFromModpacksCh(manifest, { isServer, packName: pack.name });
  log.step(`Installing ${pack.name} ${manifest.name}`);
  const result = await reconcileInstall(instance, installer, descriptor, id, context.progress);
  if (result.removedFiles.length) {
    log.info(`Removed ${result.removedFiles.length} file(s) of the previous install.`);
  }
  if (
    instance instanceof ServerInstance &&
    (instance.mcVersion !== mcVersion || !sameLoader(instance.modLoader, modLoader))
  ) {
    await installServer(instance, {
      services: context.services,
      config: context.config,
      sink: context.progress,
    });
  }
  await finish(context, installer, instance, result.blocked);
}

async function loadTarget(dir: string, isServer: boolean): Promise<InstallTarget> {
  return isServer ? await ServerInstance.load(dir) : await Instance.load(dir);
}

async function installModpackVersion(
  args: string[],
  fetchPack: (context: CommandContext, packId: number) => Promise<ModpackManifest>,
  fetchVersion: (
    context: CommandContext,
    packId: number,
    versionId: number,
  ) => Promise<ModpackVersionManifest>,
  toId: (packId: number, versionId: number) => ModpackId,
): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: { server: { type: "boolean", default: false } },
  });
  const [dir, packArg, versionArg] = positionals;
  if (!dir) throw new ValidationError("Missing instance directory.", "dir");
  const packId = parseId(packArg, "pack id");

  const context = await loadContext();
  const instance = await loadTarget(dir, values.server === true);
  const pack = await fetchPack(context, packId);
  const versionId = versionArg ? parseId(versionArg, "version id") : latestVersionId(pack);
  const manifest = await fetchVersion(context, packId, versionId);

  await installVersion(
    context,
    instance,
    pack,
    manifest,
    toId(packId, versionId),
  );
}

const zipCmd: Command = {
  name: "zip",
  description: "Install a CurseForge modpack zip: install zip <dir> <zip_file>",
  handler: async (args: string[]) => {
    const [dir, zipFile] = args;
    if (!dir || !zipFile) throw new ValidationError("Usage: install zip <dir> <zip_file>");

    const context = await loadContext();
    const instance = await Instance.load(dir);
    const installer = context.installer(instance.gameDir);
    const result = await withCurseForgeZip(zipFile, async (zip) => {
      log.step(`Installing ${zip.manifest.name} ${zip.manifest.version}`);
      return await reconcileInstall(
        instance,
        installer,
        descriptorFromCurseForgeZip(zip),
        { type: "curse_zip", file_name: basename(zipFile) },
        context.progress,
      );
    });
    await finish(context, installer, instance, result.blocked);
  },
};

const ftbCmd: Command = {
  name: "ftb",
  description: "Install an FTB modpack: install ftb <dir> <pack_id> [version_id] [--server]",
  handler: (args: string[]) =>
    installModpackVersion(
      args,
      (context, packId) => context.modpacks.getFtbPack(packId),
      (context, packId, versionId) => context.modpacks.getFtbPackVersion(packId, versionId),
      (packId, versionId) => ({ type: "ftb", pack_id: packId, version: versionId }),
    ),
};

const curseCmd: Command = {
  name: "curse",
  description:
    "Install a CurseForge modpack via modpacks.ch: install curse <dir> <pack_id> [version_id] [--server]",
  handler: (args: string[]) =>
    installModpackVersion(
      args,
      (context, packId) => context.modpacks.getCursePack(packId),
      (context, packId, versionId) => context.modpacks.getCursePackVersion(packId, versionId),
      (packId, versionId) => ({ type: "curseforge", mod_id: packId, version: versionId }),
    ),
};

const fileCmd: Command = {
  name: "file",
  description: "Install a single CurseForge file: install file <dir> <mod_id> <file_id>",
  handler: async (args: string[]) => {
    const [dir, modArg, fileArg] = args;
    if (!dir) throw new ValidationError("Missing instance directory.", "dir");
    const modId = parseId(modArg, "mod id");
    const fileId = parseId(fileArg, "file id");

    const context = await loadContext();
    const instance = await Instance.load(dir);
    const installer = context.installer(instance.gameDir);
    const blocked = await installer.installCatalogFile(modId, fileId, context.progress);
    await finish(context, installer, instance, blocked);
  },
};

/** Versions newest first, labelled for the picker. */
function versionOptions(pack: ModpackManifest) {
  return [...pack.versions]
    .sort((a, b) => b.updated - a.updated)
    .map((version) => ({ value: version.id, label: version.name, hint: version.type }));
}

const searchCmd: Command = {
  name: "search",
  description:
    "Search modpacks.ch and install the chosen pack: install search <dir> <term> [--limit <n>] [--server]",
  handler: async (args: string[]) => {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        limit: { type: "string" },
        server: { type: "boolean", default: false },
      },
    });
    const [dir, ...words] = positionals;
    const term = words.join(" ");
    if (!dir || !term) throw new ValidationError("Usage: install search <dir> <term>");
    const limit = values.limit === undefined ? MAX_SEARCH_LIMIT : parseId(values.limit, "limit");

    const context = await loadContext();
    const hits = await context.modpacks.searchPackManifests(term, limit, context.progress);
    if (!hits.length) {
      log.warn(`No modpacks match '${term}'.`);
      return;
    }

    const hitIndex = await select<{ value: number; label: string; hint: string }[], number>({
      message: "Select modpack",
      options: hits.map((hit, index) => ({
        value: index,
        label: hit.pack.name,
        hint: hit.provider,
      })),
    });
    if (isCancel(hitIndex)) {
      log.warn("Cancelled.");
      return;
    }
    const { provider, pack } = hits[hitIndex];

    const options = versionOptions(pack);
    if (!options.length) throw new ValidationError(`Modpack ${pack.name} has no versions.`);
    const versionId = await select({
      message: "Select modpack version",
      initialValue: options[0].value,
      options,
    });
    if (isCancel(versionId)) {
      log.warn("Cancelled.");
      return;
    }

    const manifest = provider === "ftb"
      ? await context.modpacks.getFtbPackVersion(pack.id, versionId)
      : await context.modpacks.getCursePackVersion(pack.id, versionId);
    const id: ModpackId = provider === "ftb"
      ? { type: "ftb", pack_id: pack.id, version: versionId }
      : { type: "curseforge", mod_id: pack.id, version: versionId };

    const isServer = values.server === true;
    let instance: InstallTarget;
    if (await Instance.exists(dir)) {
      const proceed = await confirm({
        message: `${dir} is already an instance. Install the pack there?`,
      });
      if (isCancel(proceed) || !proceed) {
        log.warn("Cancelled.");
        return;
      }
      instance = await loadTarget(dir, isServer);
    } else {
      const versions = {
        mcVersion: getMinecraftVersion(manifest),
        modLoader: getModLoader(manifest),
      };
      if (isServer) {
        const server = await ServerInstance.create(dir, versions);
        await installServer(server, {
          services: context.services,
          config: context.config,
          sink: context.progress,
        });
        instance = server;
      } else {
        instance = await Instance.create(dir, versions);
      }
    }

    await installVersion(context, instance, pack, manifest, id);
  },
};

const cmd: Command = {
  name: "install",
  description: "Install a modpack or a single mod into an instance",
  subcommands: [zipCmd, ftbCmd, curseCmd, fileCmd, searchCmd],
  handler: async () => {
    log.info(
      "Usage: install <zip|ftb|curse|file|search> ...\n" +
        cmd.subcommands?.map((sub) => `  ${sub.description}`).join("\n"),
    );
  },
};

export default cmd;
