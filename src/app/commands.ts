import type { Preferences } from '@/config/preferences';
import type { LocaleCode } from '@/i18n/types';
import { autostartStore } from '@/stores/autostart';
import { i18nStore } from '@/stores/i18n';
import { pagesStore } from '@/stores/pages';
import { saveStore } from '@/stores/save';
import { APP_BROWSER_PAGE, HOME_PAGE, shellStore } from '@/stores/shell';

export type UiEvent =
  | { type: 'language-changed'; locale: LocaleCode }
  | { type: 'autostart-toggled'; enabled: boolean }
  | { type: 'page-selected'; page: string }
  | { type: 'link-clicked'; name: string }
  | { type: 'install-requested' }
  | { type: 'about-requested' }
  | { type: 'window-closed' };

/** What the windowing layer provides to carry out commands. */
export interface HostBridge {
  openUrl: (url: string) => Promise<void>;
  launchInstaller: (command: readonly string[]) => Promise<void>;
  showAbout: () => void;
  quit: () => void;
}

export interface CommandContext {
  preferences: Preferences;
  bridge: HostBridge;
}

let shutdownStarted = false;

/** Clears the shutdown latch; each app run gets one persist. */
export function resetShutdownLatch(): void {
  shutdownStarted = false;
}

export async function changeLanguage(locale: LocaleCode): Promise<LocaleCode> {
  const active = i18nStore.getState().setLocale(locale);
  saveStore.getState().setLocale(active);
  await pagesStore.getState().renderPages(active);
  return active;
}

function selectPage(page: string): void {
  const { pageIds } = pagesStore.getState();
  const { isAppBrowserVisible } = shellStore.getState();
  const known =
    page === HOME_PAGE ||
    pageIds.includes(page) ||
    (page === APP_BROWSER_PAGE && isAppBrowserVisible);

  if (!known) {
    console.warn(`[hello] Ignored navigation to unknown page "${page}"`);
    return;
  }
  shellStore.getState().showPage(page);
}

async function shutdown({ bridge }: CommandContext): Promise<void> {
  if (shutdownStarted) return;
  shutdownStarted = true;
  await saveStore.getState()._saveSave();
  bridge.quit();
}

export async function dispatchUiEvent(event: UiEvent, context: CommandContext): Promise<void> {
  switch (event.type) {
    case 'language-changed':
      await changeLanguage(event.locale);
      return;

    case 'autostart-toggled':
      await autostartStore.getState().toggleAutostart(event.enabled);
      return;

    case 'page-selected':
      selectPage(event.page);
      return;

    case 'link-clicked': {
      const url = context.preferences.urls[event.name];
      if (!url) {
        console.warn(`[hello] No URL configured for link "${event.name}"`);
        return;
      }
      await context.bridge.openUrl(url);
      return;
    }

    case 'install-requested':
      if (!shellStore.getState().isInstallVisible) {
        console.warn('[hello] Install requested outside a live session');
        return;
      }
      await context.bridge.launchInstaller(context.preferences.installerCommand);
      return;

    case 'about-requested':
      context.bridge.showAbout();
      return;

    case 'window-closed':
      await shutdown(context);
      return;
  }
}
