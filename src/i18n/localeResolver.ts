import type { CatalogExists, LocaleCode } from './types';

export interface ResolveLocaleInput {
  saved: LocaleCode | null;
  systemLocale: LocaleCode | null;
  defaultLocale: LocaleCode;
  assetExists: CatalogExists;
}

/** `en_US` -> `en-US`; bare codes are returned as-is. */
export function toHyphenLocale(locale: LocaleCode): LocaleCode {
  return locale.replace(/_/g, '-');
}

export function toUnderscoreLocale(locale: LocaleCode): LocaleCode {
  return locale.replace(/-/g, '_');
}

export function bareLanguage(locale: LocaleCode): LocaleCode {
  return locale.slice(0, 2);
}

/**
 * Picks the locale to activate. Precedence: saved choice with a catalog,
 * saved choice equal to the default, territory-qualified system locale,
 * bare system language, default. The default locale's catalog is assumed
 * to always be installed.
 */
export function resolveLocale({
  saved,
  systemLocale,
  defaultLocale,
  assetExists,
}: ResolveLocaleInput): LocaleCode {
  if (saved && assetExists(saved)) return saved;
  if (saved === defaultLocale) return defaultLocale;

  const system = systemLocale?.trim() ?? '';
  if (!system) return defaultLocale;

  const qualified = toHyphenLocale(system);
  if (assetExists(qualified)) return qualified;

  const bare = bareLanguage(system);
  if (bare && assetExists(bare)) return bare;

  return defaultLocale;
}
