import { mkdir } from 'node:fs/promises';
import type { DaemonSettings } from './settings/settings.service';

/** Create the working directories up front so the first event never races on mkdir. */
export async function ensureBootstrapDirs(paths: DaemonSettings['paths']): Promise<void> {
  await mkdir(paths.downloadDir, { recursive: true });
  await mkdir(paths.extractDir, { recursive: true });
  await mkdir(paths.endedDir, { recursive: true });
}
