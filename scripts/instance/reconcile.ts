import { silentProgress, type ProgressSink } from "../terminal/progress.ts";
import type { Installer } from "../modpack/installer.ts";
import type { FileDownload, ModpackDescriptor } from "../modpack/types.ts";
import type { ModLoader } from "../launcher/types.ts";
import type { InstanceModpack, ModpackId } from "./instance.ts";

/** What a modpack install needs from a client or server instance. */
export interface ModpackTarget {
  readonly gameDir: string;
  removeOldModpackFiles(newFiles: readonly string[]): Promise<string[]>;
  setVersions(mcVersion: string, modLoader?: ModLoader): void;
  setModpack(modpack: InstanceModpack): void;
  saveIfDirty(): Promise<void>;
}

export type ReconcileResult = {
  installedFiles: string[];
  removedFiles: string[];
  blocked?: FileDownload[];
};

/**
 * Installs `pack` over the instance, deletes what the previous install left
 * behind and records the new file set. Blocked downloads are handed back
 * for the manual download flow.
 */
export async function reconcileInstall(
  instance: ModpackTarget,
  installer: Installer,
  pack: ModpackDescriptor,
  id: ModpackId,
  sink: ProgressSink = silentProgress,
): Promise<ReconcileResult> {
  const result = await installer.install(pack, sink);
  const removedFiles = await instance.removeOldModpackFiles(result.installedFiles);

  if (pack.mcVersion) instance.setVersions(pack.mcVersion, pack.modLoader);
  instance.setModpack({ id, files: result.installedFiles });
  await instance.saveIfDirty();

  return { ...result, removedFiles };
}
