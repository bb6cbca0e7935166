import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { APP_INSTALL_DIR, APP_NAME } from '@/constants/appMeta';
import type { LocaleCode } from '@/i18n/types';
import { errorMessage } from '@/utils/paths';

export const PREFERENCES_FILE = 'data/preferences.json';

export interface Preferences {
  defaultLocale: LocaleCode;
  localePath: string;
  pagesPath: string;
  savePath: string;
  autostartPath: string;
  desktopPath: string;
  windowManagerConfigPath: string;
  livePath: string;
  installerPath: string;
  installerCommand: string[];
  urls: Record<string, string>;
}

export class PreferencesError extends Error {
  readonly path: string;
  readonly key: string | null;

  constructor(message: string, path: string, key: string | null = null) {
    super(message);
    this.name = 'PreferencesError';
    this.path = path;
    this.key = key;
  }
}

export interface LoadPreferencesOptions {
  devMode: boolean;
  cwd: string;
  installDir?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((item) => typeof item === 'string');
}

function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((item) => typeof item === 'string' && item.length > 0)
  );
}

/** Validates a parsed preferences document. Every key is required. */
export function parsePreferences(value: unknown, path: string): Preferences {
  if (!isRecord(value)) {
    throw new PreferencesError(`Preferences at "${path}" must be a JSON object`, path);
  }
  const record: Record<string, unknown> = value;

  const readString = (key: string): string => {
    const item = record[key];
    if (typeof item !== 'string' || item.trim().length === 0) {
      throw new PreferencesError(`Missing or invalid preference "${key}"`, path, key);
    }
    return item;
  };

  const installerCommand = record.installerCommand;
  if (!isStringList(installerCommand)) {
    throw new PreferencesError(
      'Missing or invalid preference "installerCommand"',
      path,
      'installerCommand'
    );
  }
  const urls = record.urls;
  if (!isStringRecord(urls)) {
    throw new PreferencesError('Missing or invalid preference "urls"', path, 'urls');
  }

  return {
    defaultLocale: readString('defaultLocale'),
    localePath: readString('localePath'),
    pagesPath: readString('pagesPath'),
    savePath: readString('savePath'),
    autostartPath: readString('autostartPath'),
    desktopPath: readString('desktopPath'),
    windowManagerConfigPath: readString('windowManagerConfigPath'),
    livePath: readString('livePath'),
    installerPath: readString('installerPath'),
    installerCommand: [...installerCommand],
    urls: { ...urls },
  };
}

/** Points asset paths at the project checkout instead of the installed tree. */
export function applyDevOverrides(preferences: Preferences, cwd: string): Preferences {
  return {
    ...preferences,
    localePath: join(cwd, 'locale'),
    pagesPath: join(cwd, 'data', 'pages'),
    desktopPath: join(cwd, `${APP_NAME}.desktop`),
  };
}

export function preferencesFilePath({ devMode, cwd, installDir }: LoadPreferencesOptions): string {
  return join(devMode ? cwd : (installDir ?? APP_INSTALL_DIR), PREFERENCES_FILE);
}

export async function loadPreferences(options: LoadPreferencesOptions): Promise<Preferences> {
  const path = preferencesFilePath(options);

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new PreferencesError(`Cannot read preferences: ${errorMessage(error)}`, path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new PreferencesError(`Malformed preferences: ${errorMessage(error)}`, path);
  }

  const preferences = parsePreferences(parsed, path);
  return options.devMode ? applyDevOverrides(preferences, options.cwd) : preferences;
}
