import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { i18nStore } from '../i18n';
import { pagesStore } from '../pages';

let pagesRoot: string;

async function writePage(locale: string, page: string, body: string): Promise<void> {
  await mkdir(join(pagesRoot, locale), { recursive: true });
  await writeFile(join(pagesRoot, locale, page), body);
}

describe('pages store', () => {
  beforeEach(async () => {
    pagesRoot = await mkdtemp(join(tmpdir(), 'welcome-hello-pages-store-'));
    await writePage('en', 'readme', 'Read me');
    await writePage('en', 'release', 'Release info');
    await writePage('fr', 'readme', 'Lisez-moi');

    i18nStore.setState({
      defaultLocale: 'en',
      currentLocale: 'fr',
      catalogs: {
        en: {
          meta: { code: 'en', displayName: 'English', nativeName: 'English' },
          messages: { 'pages.unavailable': "Can't load page." },
        },
        fr: {
          meta: { code: 'fr', displayName: 'French', nativeName: 'Français' },
          messages: { 'pages.unavailable': 'Impossible de charger la page.' },
        },
      },
    });
  });

  afterEach(async () => {
    await rm(pagesRoot, { recursive: true, force: true });
  });

  it('enumerates pages from the default locale', async () => {
    const pageIds = await pagesStore.getState().initializePages({ pagesRoot, defaultLocale: 'en' });

    expect(pageIds).toEqual(['readme', 'release']);
    expect(pagesStore.getState().bodies).toEqual({});
    expect(pagesStore.getState().renderedLocale).toBeNull();
  });

  it('renders localized bodies with default-locale fallback', async () => {
    await pagesStore.getState().initializePages({ pagesRoot, defaultLocale: 'en' });
    await pagesStore.getState().renderPages('fr');

    const state = pagesStore.getState();
    expect(state.renderedLocale).toBe('fr');
    expect(state.bodies).toEqual({ readme: 'Lisez-moi', release: 'Release info' });
  });

  it('re-renders after a locale change', async () => {
    await pagesStore.getState().initializePages({ pagesRoot, defaultLocale: 'en' });
    await pagesStore.getState().renderPages('fr');
    await pagesStore.getState().renderPages('en');

    expect(pagesStore.getState().bodies).toEqual({ readme: 'Read me', release: 'Release info' });
  });

  it('shows the translated unavailable message when a page vanished', async () => {
    const readFile = vi.fn(async (path: string) =>
      path.endsWith(join('fr', 'readme')) ? 'Lisez-moi' : null
    );
    await pagesStore.getState().initializePages({ pagesRoot, defaultLocale: 'en', readFile });
    await pagesStore.getState().renderPages('fr');

    expect(pagesStore.getState().bodies).toEqual({
      readme: 'Lisez-moi',
      release: 'Impossible de charger la page.',
    });
    expect(readFile).toHaveBeenCalledWith(join(pagesRoot, 'en', 'release'));
  });

  it('keeps the newest render when an older one finishes last', async () => {
    let releaseFrench: () => void = () => {};
    const frenchGate = new Promise<void>((resolve) => {
      releaseFrench = resolve;
    });
    const readFile = vi.fn(async (path: string) => {
      if (path.startsWith(join(pagesRoot, 'fr'))) {
        await frenchGate;
        return 'Lisez-moi';
      }
      return path.endsWith('readme') ? 'Read me' : 'Release info';
    });
    await pagesStore.getState().initializePages({ pagesRoot, defaultLocale: 'en', readFile });

    const french = pagesStore.getState().renderPages('fr');
    await pagesStore.getState().renderPages('en');
    releaseFrench();
    await french;

    expect(pagesStore.getState().renderedLocale).toBe('en');
    expect(pagesStore.getState().bodies).toEqual({ readme: 'Read me', release: 'Release info' });
  });
});
