export const APP_META = {
  displayName: 'Welcome',
  appName: 'welcome-hello',
  installDir: '/usr/share/welcome-hello',
  catalogSubdir: 'LC_MESSAGES',
  catalogExtension: '.json',
} as const;

export const APP_DISPLAY_NAME = APP_META.displayName;
export const APP_NAME = APP_META.appName;
export const APP_INSTALL_DIR = APP_META.installDir;

/** Line in an i3-style config that starts the app at login. */
export const APP_LAUNCH_DIRECTIVE = `exec --no-startup-id ${APP_META.appName}`;

export function appCatalogFileName(): string {
  return `${APP_META.appName}${APP_META.catalogExtension}`;
}

