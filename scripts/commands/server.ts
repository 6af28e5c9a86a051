import { parseArgs } from "node:util";
import { log } from "@clack/prompts";
import type { Command } from "../command.ts";
import { ServerInstance } from "../instance/server-instance.ts";
import { installServer, launchServer } from "../launcher/server.ts";
import { ValidationError } from "../types/errors.ts";
import { chooseModLoader } from "./create.ts";
import { loadContext } from "./context.ts";

const CREATE_USAGE =
  "server create <dir> <mc_version> [--loader forge|neoforge] [--loader-version <version>]";

const createCmd: Command = {
  name: "create",
  description: `Create a server instance and install its server: ${CREATE_USAGE}`,
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
    if (!dir || !mcVersion) throw new ValidationError(`Usage: ${CREATE_USAGE}`);
    if (await ServerInstance.exists(dir)) {
      throw new ValidationError(`An instance already exists at ${dir}.`, "dir");
    }

    const context = await loadContext();
    await context.services.catalog.resolveGameManifest(mcVersion);
    const choice = await chooseModLoader(
      context.services.catalog,
      mcVersion,
      values.loader,
      values["loader-version"],
    );
    if (!choice) {
      log.warn("Cancelled.");
      return;
    }

    const server = await ServerInstance.create(dir, { mcVersion, modLoader: choice.modLoader });
    await installServer(server, {
      services: context.services,
      config: context.config,
      sink: context.progress,
    });
    log.success(`Created server ${server.name} at ${server.dir}`);
  },
};

const installCmd: Command = {
  name: "install",
  description: "Reinstall the server jar or mod loader server: server install <dir>",
  handler: async (args: string[]) => {
    const [dir] = args;
    if (!dir) throw new ValidationError("Usage: server install <dir>", "dir");
    const context = await loadContext();
    const server = await ServerInstance.load(dir);
    await installServer(server, {
      services: context.services,
      config: context.config,
      sink: context.progress,
    });
    log.success(`Installed server files into ${server.serverDir}`);
  },
};

const launchCmd: Command = {
  name: "launch",
  description: "Start a server instance: server launch <dir>",
  handler: async (args: string[]) => {
    const [dir] = args;
    if (!dir) throw new ValidationError("Usage: server launch <dir>", "dir");
    const { config } = await loadContext();
    const server = await ServerInstance.load(dir);
    const code = await launchServer(server, config);
    if (code !== 0) {
      log.warn(`Server exited with code ${code}`);
      process.exitCode = code;
    }
  },
};

const cmd: Command = {
  name: "server",
  description: "Create, install and start dedicated server instances",
  subcommands: [createCmd, installCmd, launchCmd],
  handler: async () => {
    log.info(
      "Usage: server <create|install|launch> ...\n" +
        cmd.subcommands?.map((sub) => `  ${sub.description}`).join("\n"),
    );
  },
};

export default cmd;
