import { spawn } from 'node:child_process';
import { stat } from 'node:fs/promises';
import type { Preferences } from '@/config/preferences';
import { expandHome, isNotFoundError } from '@/utils/paths';

async function pathKind(path: string): Promise<'file' | 'other' | null> {
  try {
    const info = await stat(expandHome(path));
    return info.isFile() ? 'file' : 'other';
  } catch (error) {
    if (!isNotFoundError(error)) {
      console.warn(`[hello] Failed to inspect "${path}":`, error);
    }
    return null;
  }
}

/** Running from install media: the live marker exists and the installer is present. */
export async function detectLiveSession(
  preferences: Pick<Preferences, 'livePath' | 'installerPath'>
): Promise<boolean> {
  const [live, installer] = await Promise.all([
    pathKind(preferences.livePath),
    pathKind(preferences.installerPath),
  ]);
  return live !== null && installer === 'file';
}

/** Starts the installer detached so it outlives the welcome window. */
export function launchDetached(command: readonly string[]): Promise<void> {
  const [program, ...args] = command;
  if (!program) {
    return Promise.reject(new Error('Empty command'));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(program, args, { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
