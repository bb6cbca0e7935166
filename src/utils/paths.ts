import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Expands `~` to the user's home directory. Only a leading `~` or `~/`
 * is expanded; `~user` forms are left untouched.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/** True for a single path segment: no separators, no `.`/`..`, no NUL. */
export function isFilenameSafe(name: string): boolean {
  if (!name || name === '.' || name === '..') return false;
  return !/[/\\\0]/.test(name);
}

/** Sibling path used for write-then-rename replacements. */
export function tempSiblingPath(path: string, suffix: string = String(process.pid)): string {
  const base = path.slice(dirname(path).length + 1);
  return join(dirname(path), `.${base}.${suffix}.tmp`);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  const code = errorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}
