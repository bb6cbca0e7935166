export type LocaleCode = string;

export type PageId = string;

export interface LocaleMeta {
  code: LocaleCode;
  displayName: string;
  nativeName: string;
}

export interface LocaleFile {
  meta: LocaleMeta;
  messages: Record<string, string>;
}

export type I18nParams = Record<string, string | number>;

/** Answers whether a translation catalog is installed for a locale. */
export type CatalogExists = (locale: LocaleCode) => boolean;
