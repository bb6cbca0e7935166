import { readFile } from 'node:fs/promises';

export const LSB_RELEASE_PATH = '/etc/lsb-release';

export interface LsbRelease {
  codename: string;
  release: string;
}

export const UNKNOWN_LSB_RELEASE: LsbRelease = { codename: 'unknown', release: '0.0' };

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/** Parses `KEY=value` lines; `DISTRIB_` prefixes are dropped. */
export function parseLsbRelease(text: string): LsbRelease {
  const fields: Record<string, string> = {};
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    const separator = line.indexOf('=');
    if (separator <= 0) continue;

    const key = line.slice(0, separator).replace(/^DISTRIB_/, '');
    const value = unquote(line.slice(separator + 1).trim());
    if (value) fields[key] = value;
  }

  const { CODENAME: codename, RELEASE: release } = fields;
  if (!codename || !release) return { ...UNKNOWN_LSB_RELEASE };
  return { codename, release };
}

export async function readLsbRelease(path: string = LSB_RELEASE_PATH): Promise<LsbRelease> {
  try {
    return parseLsbRelease(await readFile(path, 'utf8'));
  } catch (error) {
    console.warn(`[hello] Failed to read "${path}":`, error);
    return { ...UNKNOWN_LSB_RELEASE };
  }
}

export function formatLsbSubtitle({ codename, release }: LsbRelease): string {
  return `${codename} ${release}`;
}
