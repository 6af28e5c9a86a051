import { log } from "@clack/prompts";
import type { Command } from "../command.ts";
import { Instance } from "../instance/instance.ts";
import { identifyMods } from "../modpack/fingerprint.ts";
import { ValidationError } from "../types/errors.ts";
import { loadContext } from "./context.ts";

const cmd: Command = {
  name: "identify",
  description: "Match the jars in an instance's mods folder to CurseForge mods",
  handler: async (args: string[]) => {
    const [dir] = args;
    if (!dir) throw new ValidationError("Usage: identify <dir>", "dir");

    const context = await loadContext();
    const instance = await Instance.load(dir);
    const { mods, unmatched } = await identifyMods(instance.modsDir, context.curseClient());

    for (const mod of mods) {
      log.message(`${mod.fileName}: mod ${mod.modId}, file ${mod.fileId}`);
    }
    if (unmatched.length) {
      log.warn(`No catalog match: ${unmatched.map((u) => u.fileName).join(", ")}`);
    }
  },
};

export default cmd;
