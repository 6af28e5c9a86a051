import { log } from "@clack/prompts";
import type { Command } from "../command.ts";
import { Instance } from "../instance/instance.ts";
import { launchInstance } from "../launcher/mod.ts";
import { ValidationError } from "../types/errors.ts";
import { loadContext } from "./context.ts";

const cmd: Command = {
  name: "launch",
  description: "Download instance assets and launch the game",
  handler: async (args: string[]) => {
    const [dir] = args;
    if (!dir) throw new ValidationError("Usage: launch <dir>", "dir");

    const context = await loadContext();
    const instance = await Instance.load(dir);
    // persists a migrated manifest
    await instance.saveIfDirty();

    const code = await launchInstance(instance, {
      services: context.services,
      config: context.config,
      sink: context.progress,
    });
    if (code !== 0) {
      log.warn(`Game exited with code ${code}`);
      process.exitCode = code;
    }
  },
};

export default cmd;
