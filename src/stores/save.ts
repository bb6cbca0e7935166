import { createStore } from 'zustand/vanilla';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { toHyphenLocale } from '@/i18n/localeResolver';
import type { LocaleCode } from '@/i18n/types';
import { expandHome, isNotFoundError } from '@/utils/paths';

export interface SaveRecord {
  locale: LocaleCode | null;
}

interface SaveState extends SaveRecord {
  savePath: string | null;
  isLoaded: boolean;

  setLocale: (locale: LocaleCode) => void;

  // Persistence
  _loadSave: (path: string) => Promise<SaveRecord>;
  _saveSave: () => Promise<boolean>;
}

export function emptySaveRecord(): SaveRecord {
  return { locale: null };
}

function normalizeSavedLocale(value: unknown): LocaleCode | null {
  if (typeof value !== 'string' || value.trim().length === 0) return null;
  return toHyphenLocale(value.trim());
}

/** Unreadable or malformed save files read as an empty record. */
export async function readSaveRecord(path: string): Promise<SaveRecord> {
  let raw: string;
  try {
    raw = await readFile(expandHome(path), 'utf8');
  } catch (error) {
    if (!isNotFoundError(error)) {
      console.warn(`[save] Failed to read save file "${path}":`, error);
    }
    return emptySaveRecord();
  }

  try {
    const parsed = JSON.parse(raw) as unknown;
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return emptySaveRecord();
    }
    return { locale: normalizeSavedLocale('locale' in parsed ? parsed.locale : null) };
  } catch (error) {
    console.warn(`[save] Ignored malformed save file "${path}":`, error);
    return emptySaveRecord();
  }
}

export async function writeSaveRecord(path: string, record: SaveRecord): Promise<boolean> {
  const target = expandHome(path);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify({ locale: record.locale }), 'utf8');
    return true;
  } catch (error) {
    console.error(`[save] Failed to write save file "${path}":`, error);
    return false;
  }
}

export const saveStore = createStore<SaveState>()((set, get) => ({
  ...emptySaveRecord(),
  savePath: null,
  isLoaded: false,

  setLocale: (locale) => set({ locale: toHyphenLocale(locale) }),

  _loadSave: async (path) => {
    const record = await readSaveRecord(path);
    set({ ...record, savePath: path, isLoaded: true });
    return record;
  },

  _saveSave: async () => {
    const { savePath, locale } = get();
    if (!savePath) {
      console.warn('[save] No save path configured, skipping save');
      return false;
    }
    return writeSaveRecord(savePath, { locale });
  },
}));
