import { loadPreferences, type Preferences } from '@/config/preferences';
import { createCatalogQuery, detectSystemLocale } from '@/i18n/catalog';
import { resolveLocale } from '@/i18n/localeResolver';
import type { LocaleCode } from '@/i18n/types';
import { autostartStore } from '@/stores/autostart';
import { initializeI18n } from '@/stores/i18n';
import { pagesStore } from '@/stores/pages';
import { saveStore } from '@/stores/save';
import { HOME_PAGE, shellStore } from '@/stores/shell';
import type { AutostartTargets } from '@/system/autostart';
import { detectLiveSession } from '@/system/liveSession';
import { formatLsbSubtitle, readLsbRelease } from '@/system/lsbRelease';
import { expandHome } from '@/utils/paths';
import { resetShutdownLatch, type CommandContext, type HostBridge } from './commands';

export interface CliOptions {
  devMode: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  return { devMode: argv.includes('--dev') };
}

export interface BootstrapOptions {
  argv: readonly string[];
  cwd: string;
  bridge: HostBridge;
  env?: NodeJS.ProcessEnv;
  installDir?: string;
  lsbReleasePath?: string;
}

export interface BootstrapResult extends CommandContext {
  locale: LocaleCode;
  devMode: boolean;
}

function autostartTargets(preferences: Preferences): AutostartTargets {
  return {
    desktopEntryPath: preferences.desktopPath,
    autostartLinkPath: preferences.autostartPath,
    extraConfigPath: preferences.windowManagerConfigPath,
  };
}

/**
 * Loads preferences and the save record, picks the locale, and brings
 * every store to its startup state. Rejects only with `PreferencesError`.
 */
export async function bootstrapApp(options: BootstrapOptions): Promise<BootstrapResult> {
  const { devMode } = parseCliArgs(options.argv);
  const preferences = await loadPreferences({
    devMode,
    cwd: options.cwd,
    installDir: options.installDir,
  });
  resetShutdownLatch();

  const saved = await saveStore.getState()._loadSave(preferences.savePath);
  const localeRoot = expandHome(preferences.localePath);
  const resolved = resolveLocale({
    saved: saved.locale,
    systemLocale: detectSystemLocale(options.env ?? process.env),
    defaultLocale: preferences.defaultLocale,
    assetExists: createCatalogQuery(localeRoot),
  });

  const locale = await initializeI18n({
    localeRoot,
    defaultLocale: preferences.defaultLocale,
    locale: resolved,
  });
  saveStore.getState().setLocale(locale);

  await pagesStore.getState().initializePages({
    pagesRoot: expandHome(preferences.pagesPath),
    defaultLocale: preferences.defaultLocale,
  });
  await pagesStore.getState().renderPages(locale);

  autostartStore.getState().configureAutostart(autostartTargets(preferences));
  await autostartStore.getState().refreshAutostart();

  const [isLive, lsb] = await Promise.all([
    detectLiveSession(preferences),
    readLsbRelease(options.lsbReleasePath),
  ]);
  shellStore.getState().showPage(HOME_PAGE);
  shellStore.getState().setLiveSession(isLive);
  shellStore.getState().setSubtitle(formatLsbSubtitle(lsb));

  console.info(`[hello] Started with locale "${locale}"${devMode ? ' (dev mode)' : ''}`);
  return { preferences, bridge: options.bridge, locale, devMode };
}
