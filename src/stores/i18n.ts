import { createStore } from 'zustand/vanilla';
import { readInstalledCatalogs } from '@/i18n/catalog';
import { toHyphenLocale } from '@/i18n/localeResolver';
import type { I18nParams, LocaleCode, LocaleFile, LocaleMeta } from '@/i18n/types';

export const I18N_FALLBACK_LOCALE: LocaleCode = 'en';

export interface InitializeI18nOptions {
  localeRoot: string;
  defaultLocale: LocaleCode;
  locale: LocaleCode;
}

interface I18nState {
  /** Keyed by installed directory, hyphenated. The default is always present. */
  catalogs: Record<LocaleCode, LocaleFile>;
  availableLocales: LocaleMeta[];
  defaultLocale: LocaleCode;
  currentLocale: LocaleCode;
  initialized: boolean;
  initializeI18n: (options: InitializeI18nOptions) => Promise<LocaleCode>;
  setLocale: (locale: LocaleCode) => LocaleCode;
  translate: (key: string, params?: I18nParams) => string;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

const reportedKeys = new Set<string>();

function fillPlaceholders(text: string, params: I18nParams): string {
  return text.replace(PLACEHOLDER, (placeholder, name: string) =>
    name in params ? String(params[name]) : placeholder
  );
}

function sourceCatalog(defaultLocale: LocaleCode): LocaleFile {
  return {
    meta: { code: defaultLocale, displayName: defaultLocale, nativeName: defaultLocale },
    messages: {},
  };
}

/** The locale to activate for a request: itself when installed, else the default. */
function activatable(
  catalogs: Record<LocaleCode, LocaleFile>,
  defaultLocale: LocaleCode,
  requested: LocaleCode
): LocaleCode {
  const locale = toHyphenLocale(requested);
  if (catalogs[locale]) return locale;
  console.warn(`[i18n] No catalog installed for "${locale}", using "${defaultLocale}"`);
  return defaultLocale;
}

export const i18nStore = createStore<I18nState>()((set, get) => ({
  catalogs: { [I18N_FALLBACK_LOCALE]: sourceCatalog(I18N_FALLBACK_LOCALE) },
  availableLocales: [],
  defaultLocale: I18N_FALLBACK_LOCALE,
  currentLocale: I18N_FALLBACK_LOCALE,
  initialized: false,

  initializeI18n: async ({ localeRoot, defaultLocale, locale }) => {
    const installed = await readInstalledCatalogs(localeRoot);
    // Untranslated keys are shown as-is, so the default works without a file.
    const catalogs = { [defaultLocale]: sourceCatalog(defaultLocale), ...installed };
    const availableLocales = Object.values(catalogs)
      .map((catalog) => catalog.meta)
      .sort((a, b) => a.displayName.localeCompare(b.displayName));
    const currentLocale = activatable(catalogs, defaultLocale, locale);

    set({ catalogs, availableLocales, defaultLocale, currentLocale, initialized: true });
    return currentLocale;
  },

  setLocale: (locale) => {
    const { catalogs, defaultLocale } = get();
    const currentLocale = activatable(catalogs, defaultLocale, locale);
    set({ currentLocale });
    return currentLocale;
  },

  translate: (key, params) => {
    const { catalogs, currentLocale, defaultLocale } = get();
    const text = catalogs[currentLocale]?.messages[key] ?? catalogs[defaultLocale]?.messages[key];

    if (text === undefined) {
      if (!reportedKeys.has(key)) {
        reportedKeys.add(key);
        console.warn(`[i18n] No string for "${key}" in "${currentLocale}" or "${defaultLocale}"`);
      }
      return key;
    }
    return params ? fillPlaceholders(text, params) : text;
  },
}));

export async function initializeI18n(options: InitializeI18nOptions): Promise<LocaleCode> {
  return i18nStore.getState().initializeI18n(options);
}
