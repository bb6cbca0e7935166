import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { listPages, loadPage, readTextFileOrNull, type TextFileReader } from '@/content/pageLoader';
import { t } from '@/i18n';
import type { LocaleCode, PageId } from '@/i18n/types';

export const PAGE_UNAVAILABLE_KEY = 'pages.unavailable';

export interface InitializePagesOptions {
  pagesRoot: string;
  defaultLocale: LocaleCode;
  readFile?: TextFileReader;
}

interface PagesState {
  pagesRoot: string;
  defaultLocale: LocaleCode;
  pageIds: PageId[];
  bodies: Record<PageId, string>;
  renderedLocale: LocaleCode | null;
  readFile: TextFileReader;

  initializePages: (options: InitializePagesOptions) => Promise<PageId[]>;
  renderPages: (locale: LocaleCode) => Promise<void>;
}

// Only the newest render may write bodies; older ones finishing late are dropped.
let latestRender = 0;

export const pagesStore = createStore<PagesState>()(
  immer((set, get) => ({
    pagesRoot: '',
    defaultLocale: '',
    pageIds: [],
    bodies: {},
    renderedLocale: null,
    readFile: readTextFileOrNull,

    initializePages: async ({ pagesRoot, defaultLocale, readFile }) => {
      const pageIds = await listPages(pagesRoot, defaultLocale);
      latestRender += 1;
      set((state) => {
        state.pagesRoot = pagesRoot;
        state.defaultLocale = defaultLocale;
        state.pageIds = pageIds;
        state.bodies = {};
        state.renderedLocale = null;
        state.readFile = readFile ?? readTextFileOrNull;
      });
      return pageIds;
    },

    renderPages: async (locale) => {
      const render = ++latestRender;
      const { pagesRoot, defaultLocale, pageIds, readFile } = get();
      const source = { pagesRoot, readFile, unavailableText: t(PAGE_UNAVAILABLE_KEY) };
      const bodies = await Promise.all(
        pageIds.map((page) => loadPage(locale, defaultLocale, page, source))
      );
      if (render !== latestRender) return;

      set((state) => {
        pageIds.forEach((page, index) => {
          state.bodies[page] = bodies[index] ?? source.unavailableText;
        });
        state.renderedLocale = locale;
      });
    },
  }))
);
