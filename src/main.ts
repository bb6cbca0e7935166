import { bootstrapApp } from '@/app/bootstrap';
import { dispatchUiEvent } from '@/app/commands';
import { createNodeHostBridge } from '@/app/nodeHostBridge';
import { PreferencesError } from '@/config/preferences';
import { APP_DISPLAY_NAME } from '@/constants/appMeta';
import { t } from '@/i18n';
import { autostartStore } from '@/stores/autostart';
import { i18nStore } from '@/stores/i18n';
import { pagesStore } from '@/stores/pages';
import { shellStore } from '@/stores/shell';

function printStatus(locale: string): void {
  const { availableLocales } = i18nStore.getState();
  const { pageIds } = pagesStore.getState();
  const { subtitle, isInstallVisible } = shellStore.getState();
  const { enabled } = autostartStore.getState();

  console.info(`${APP_DISPLAY_NAME} (${subtitle})`);
  console.info(t('welcome.title'));
  console.info(`  locale:     ${locale}`);
  console.info(`  languages:  ${availableLocales.map((meta) => meta.code).join(', ')}`);
  console.info(`  pages:      ${pageIds.join(', ')}`);
  console.info(`  autostart:  ${enabled ? 'on' : 'off'}`);
  console.info(`  installer:  ${isInstallVisible ? 'available' : 'hidden'}`);
}

async function main(argv: readonly string[]): Promise<number> {
  try {
    const context = await bootstrapApp({
      argv,
      cwd: process.cwd(),
      bridge: createNodeHostBridge(),
    });
    printStatus(context.locale);
    await dispatchUiEvent({ type: 'window-closed' }, context);
    return 0;
  } catch (error) {
    if (error instanceof PreferencesError) {
      console.error(`[preferences] ${error.message} (${error.path})`);
      return 1;
    }
    throw error;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[hello] Fatal error:', error);
    process.exitCode = 1;
  }
);
