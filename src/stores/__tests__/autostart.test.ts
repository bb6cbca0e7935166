import { beforeEach, describe, expect, it, vi } from 'vitest';

const autostartMocks = vi.hoisted(() => ({
  setAutostart: vi.fn(),
  isAutostartRegistered: vi.fn(),
}));

vi.mock('@/system/autostart', () => ({
  setAutostart: autostartMocks.setAutostart,
  isAutostartRegistered: autostartMocks.isAutostartRegistered,
}));

import { autostartStore } from '../autostart';
import { i18nStore } from '../i18n';

const TARGETS = {
  desktopEntryPath: '/usr/share/applications/welcome-hello.desktop',
  autostartLinkPath: '~/.config/autostart/welcome-hello.desktop',
  extraConfigPath: '~/.i3/config',
};

describe('autostart store', () => {
  beforeEach(() => {
    autostartMocks.setAutostart.mockReset();
    autostartMocks.isAutostartRegistered.mockReset();

    autostartStore.setState({
      targets: null,
      enabled: false,
      pending: false,
      lastError: null,
      errorText: null,
    });
    i18nStore.setState({
      defaultLocale: 'en',
      currentLocale: 'en',
      catalogs: {
        en: {
          meta: { code: 'en', displayName: 'English', nativeName: 'English' },
          messages: { 'autostart.failed': 'Could not change autostart: {{reason}}' },
        },
      },
    });
  });

  it('reads the switch state from disk', async () => {
    autostartMocks.isAutostartRegistered.mockResolvedValue(true);
    autostartStore.getState().configureAutostart(TARGETS);

    expect(await autostartStore.getState().refreshAutostart()).toBe(true);
    expect(autostartStore.getState().enabled).toBe(true);
    expect(autostartMocks.isAutostartRegistered).toHaveBeenCalledWith(TARGETS.autostartLinkPath);
  });

  it('applies a successful toggle', async () => {
    autostartMocks.setAutostart.mockResolvedValue({
      success: true,
      registered: true,
      linkChanged: true,
      configChanged: false,
    });
    autostartStore.getState().configureAutostart(TARGETS);

    expect(await autostartStore.getState().toggleAutostart(true)).toBe(true);
    expect(autostartMocks.setAutostart).toHaveBeenCalledWith(true, TARGETS);
    expect(autostartStore.getState()).toMatchObject({
      enabled: true,
      pending: false,
      lastError: null,
      errorText: null,
    });
  });

  it('follows the on-disk state after a failed toggle', async () => {
    const failure = {
      operation: 'link',
      path: '/home/tester/.config/autostart/welcome-hello.desktop',
      code: 'EACCES',
      message: 'permission denied',
    };
    autostartMocks.setAutostart.mockResolvedValue({ success: false, error: failure });
    autostartMocks.isAutostartRegistered.mockResolvedValue(false);
    autostartStore.getState().configureAutostart(TARGETS);

    expect(await autostartStore.getState().toggleAutostart(true)).toBe(false);

    const state = autostartStore.getState();
    expect(state.enabled).toBe(false);
    expect(state.lastError).toEqual(failure);
    expect(state.errorText).toBe('Could not change autostart: permission denied');

    autostartStore.getState().dismissError();
    expect(autostartStore.getState()).toMatchObject({ lastError: null, errorText: null });
  });

  it('ignores toggles before targets are configured', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await autostartStore.getState().toggleAutostart(true)).toBe(false);
    expect(autostartMocks.setAutostart).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(await autostartStore.getState().refreshAutostart()).toBe(false);
  });
});
