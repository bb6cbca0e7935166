import {
  lstat,
  mkdir,
  readFile,
  realpath,
  rename,
  rm,
  stat,
  symlink,
  unlink,
  writeFile,
} from 'node:fs/promises';
import { dirname } from 'node:path';
import { APP_LAUNCH_DIRECTIVE } from '@/constants/appMeta';
import { errorCode, errorMessage, expandHome, isNotFoundError, tempSiblingPath } from '@/utils/paths';
import { toggleLaunchDirective } from './launchDirective';

export type AutostartOperation = 'inspect' | 'link' | 'unlink' | 'read-config' | 'write-config';

export interface AutostartFailure {
  operation: AutostartOperation;
  path: string;
  code: string | null;
  message: string;
}

export type AutostartResult =
  | {
      success: true;
      registered: boolean;
      linkChanged: boolean;
      configChanged: boolean;
    }
  | {
      success: false;
      error: AutostartFailure;
    };

export interface AutostartTargets {
  desktopEntryPath: string;
  autostartLinkPath: string;
  extraConfigPath?: string | null;
  launchDirective?: string;
}

class AutostartStepError extends Error {
  readonly failure: AutostartFailure;

  constructor(operation: AutostartOperation, path: string, cause: unknown) {
    super(errorMessage(cause));
    this.name = 'AutostartStepError';
    this.failure = {
      operation,
      path,
      code: errorCode(cause) ?? null,
      message: errorMessage(cause),
    };
  }
}

async function step<T>(operation: AutostartOperation, path: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new AutostartStepError(operation, path, error);
  }
}

async function readRegistration(linkPath: string): Promise<boolean> {
  try {
    await lstat(linkPath);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw error;
  }
}

/** Presence of the autostart link; a dangling link counts as registered. */
export async function isAutostartRegistered(linkPath: string): Promise<boolean> {
  try {
    return await readRegistration(expandHome(linkPath));
  } catch (error) {
    console.warn(`[autostart] Failed to inspect "${linkPath}":`, error);
    return false;
  }
}

async function syncLink(desired: boolean, desktopEntryPath: string, linkPath: string): Promise<boolean> {
  const registered = await step('inspect', linkPath, () => readRegistration(linkPath));

  if (desired && !registered) {
    await step('link', linkPath, async () => {
      await mkdir(dirname(linkPath), { recursive: true });
      await symlink(desktopEntryPath, linkPath);
    });
    return true;
  }
  if (!desired && registered) {
    await step('unlink', linkPath, () => unlink(linkPath));
    return true;
  }
  return false;
}

async function removeTempFile(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    console.warn(`[autostart] Failed to clean up "${path}":`, error);
  }
}

/** Writes `content` beside `path` and renames it over the original. */
async function replaceFile(path: string, content: string, mode: number): Promise<void> {
  const temp = tempSiblingPath(path);
  try {
    await writeFile(temp, content, { encoding: 'utf8', mode });
    await rename(temp, path);
  } catch (error) {
    await removeTempFile(temp);
    throw error;
  }
}

async function syncConfig(desired: boolean, configPath: string, directive: string): Promise<boolean> {
  const current = await step('read-config', configPath, async () => {
    try {
      // Rewrite the file a dotfile link points at, not the link.
      const target = await realpath(configPath);
      const [content, info] = await Promise.all([readFile(target, 'utf8'), stat(target)]);
      return { target, content, mode: info.mode & 0o777 };
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  });
  if (!current) return false;

  const next = toggleLaunchDirective(current.content, directive, desired);
  if (next === current.content) return false;

  await step('write-config', configPath, () => replaceFile(current.target, next, current.mode));
  return true;
}

/**
 * Brings the autostart link (and the optional window-manager config line)
 * in line with `desired`. Applying the same state twice changes nothing.
 * Filesystem errors resolve to a failure result instead of rejecting.
 */
export async function setAutostart(desired: boolean, targets: AutostartTargets): Promise<AutostartResult> {
  const linkPath = expandHome(targets.autostartLinkPath);
  const desktopEntryPath = expandHome(targets.desktopEntryPath);
  const configPath = targets.extraConfigPath ? expandHome(targets.extraConfigPath) : null;

  try {
    const linkChanged = await syncLink(desired, desktopEntryPath, linkPath);
    const configChanged = configPath
      ? await syncConfig(desired, configPath, targets.launchDirective ?? APP_LAUNCH_DIRECTIVE)
      : false;
    return { success: true, registered: desired, linkChanged, configChanged };
  } catch (error) {
    if (error instanceof AutostartStepError) {
      console.warn(
        `[autostart] ${error.failure.operation} failed for "${error.failure.path}": ${error.failure.message}`
      );
      return { success: false, error: error.failure };
    }
    throw error;
  }
}
