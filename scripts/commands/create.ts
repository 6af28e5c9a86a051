import { parseArgs } from "node:util";
import { isCancel, log, select } from "@clack/prompts";
import type { Command } from "../command.ts";
import { Instance } from "../instance/instance.ts";
import { isLoaderName } from "../launcher/decode.ts";
import type { LoaderName, ModLoader } from "../launcher/types.ts";
import type { VersionCatalog } from "../launcher/catalog.ts";
import { ValidationError } from "../types/errors.ts";
import { loadContext } from "./context.ts";

const USAGE = "create <dir> <mc_version> [--loader forge|neoforge] [--loader-version <version>]";

async function promptLoaderVersion(
  catalog: VersionCatalog,
  mcVersion: string,
  loader: LoaderName,
): Promise<string | undefined> {
  const versions = await catalog.listLoaderVersions(mcVersion, loader);
  if (!versions.length) {
    throw new ValidationError(`No ${loader} versions exist for Minecraft ${mcVersion}.`, "loader");
  }
  const initial = versions.find((v) => v.recommended) ?? versions[0];
  const choice = await select({
    message: `Select ${loader} version (* recommended)`,
    initialValue: initial.version,
    options: versions.map((v) => ({
      value: v.version,
      label: v.recommended ? `${v.version} *` : v.version,
    })),
  });
  return isCancel(choice) ? undefined : choice;
}

/**
 * Validates `--loader`/`--loader-version`, asking for the version when it is
 * missing. Resolves to undefined when the prompt is cancelled.
 */
export async function chooseModLoader(
  catalog: VersionCatalog,
  mcVersion: string,
  loader: string | undefined,
  loaderVersion: string | undefined,
): Promise<{ modLoader?: ModLoader } | undefined> {
  if (loader === undefined) return {};
  if (!isLoaderName(loader)) {
    throw new ValidationError(`Unknown mod loader ${loader}.`, "loader");
  }
  const version = loaderVersion ?? await promptLoaderVersion(catalog, mcVersion, loader);
  if (version === undefined) return undefined;
  const modLoader: ModLoader = { name: loader, version };
  await catalog.resolveLoaderManifest(modLoader);
  return { modLoader };
}

const cmd: Command = {
  name: "create",
  description: "Create a new instance",
  handler: async (args: string[]) => {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        loader: { type: "string" },
        "loader-version": { type: "string" },
      },
    });
    const [dir, mcVersion] = positionals;
    if (!dir || !mcVersion) throw new ValidationError(`Usage: ${USAGE}`);
    if (await Instance.exists(dir)) {
      throw new ValidationError(`An instance already exists at ${dir}.`, "dir");
    }

    const { services } = await loadContext();
    await services.catalog.resolveGameManifest(mcVersion);

    const choice = await chooseModLoader(
      services.catalog,
      mcVersion,
      values.loader,
      values["loader-version"],
    );
    if (!choice) {
      log.warn("Cancelled.");
      return;
    }
    const { modLoader } = choice;

    const instance = await Instance.create(dir, { mcVersion, modLoader });
    log.success(`Created instance ${instance.name} at ${instance.dir}`);
  },
};

export default cmd;
