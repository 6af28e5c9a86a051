import { loadConfig } from "../config.ts";
import { resolveConfig } from "../config/resolve.ts";
import type { ResolvedConfig } from "../config/schema.ts";
import { createLauncherServices, type LauncherServices } from "../launcher/mod.ts";
import { ConfigError } from "../types/errors.ts";
import { CurseClient } from "../modpack/curseforge.ts";
import { Installer } from "../modpack/installer.ts";
import { ModpacksClient } from "../modpack/modpacks-ch.ts";
import { createConsoleProgress, type ProgressSink } from "../terminal/progress.ts";

export type CommandContext = {
  config: ResolvedConfig;
  services: LauncherServices;
  progress: ProgressSink;
  modpacks: ModpacksClient;
  curseClient(): CurseClient;
  installer(destDir: string): Installer;
};

export async function loadContext(): Promise<CommandContext> {
  const config = resolveConfig(await loadConfig(process.env.HEARTH_CONFIG));
  const services = createLauncherServices(config);

  const curseClient = () => {
    const apiKey = config.curseforge.apiKey;
    if (!apiKey) {
      throw new ConfigError(
        "A CurseForge API key is required. Set curseforge.api_key or CURSE_API_KEY.",
      );
    }
    return new CurseClient({ client: services.client, apiKey });
  };

  return {
    config,
    services,
    progress: createConsoleProgress(),
    modpacks: new ModpacksClient(services.client),
    curseClient,
    installer: (destDir) =>
      new Installer({ destDir, client: services.client, curseClient: curseClient() }),
  };
}
