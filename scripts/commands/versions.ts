import { parseArgs } from "node:util";
import { log } from "@clack/prompts";
import type { Command } from "../command.ts";
import { isLoaderName } from "../launcher/decode.ts";
import { ValidationError } from "../types/errors.ts";
import { loadContext } from "./context.ts";

const cmd: Command = {
  name: "versions",
  description: "List Minecraft releases, or loader versions: versions [--loader forge <mc_version>] [--all]",
  handler: async (args: string[]) => {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        loader: { type: "string" },
        all: { type: "boolean", default: false },
      },
    });
    const { services } = await loadContext();

    const loader = values.loader;
    if (loader !== undefined) {
      if (!isLoaderName(loader)) {
        throw new ValidationError(`Unknown mod loader ${loader}.`, "loader");
      }
      const [mcVersion] = positionals;
      if (!mcVersion) throw new ValidationError("Missing Minecraft version.", "mc_version");
      const versions = await services.catalog.listLoaderVersions(mcVersion, loader);
      log.message(
        versions.map((v) => v.recommended ? `${v.version} *` : v.version).join("\n") ||
          `No ${loader} versions for ${mcVersion}.`,
      );
      return;
    }

    const versions = await services.catalog.listGameVersions();
    const shown = values.all ? versions : versions.filter((v) => v.type === "release");
    log.message(shown.map((v) => `${v.id} (${v.type})`).join("\n"));
  },
};

export default cmd;
