import { createStore } from 'zustand/vanilla';
import { t } from '@/i18n';
import {
  isAutostartRegistered,
  setAutostart,
  type AutostartFailure,
  type AutostartTargets,
} from '@/system/autostart';

interface AutostartState {
  targets: AutostartTargets | null;
  enabled: boolean;
  pending: boolean;
  lastError: AutostartFailure | null;
  /** Translated reason for the last failed toggle, until dismissed. */
  errorText: string | null;

  configureAutostart: (targets: AutostartTargets) => void;
  refreshAutostart: () => Promise<boolean>;
  toggleAutostart: (desired: boolean) => Promise<boolean>;
  dismissError: () => void;
}

export const autostartStore = createStore<AutostartState>()((set, get) => ({
  targets: null,
  enabled: false,
  pending: false,
  lastError: null,
  errorText: null,

  configureAutostart: (targets) => set({ targets }),

  refreshAutostart: async () => {
    const { targets } = get();
    if (!targets) return false;
    const enabled = await isAutostartRegistered(targets.autostartLinkPath);
    set({ enabled });
    return enabled;
  },

  toggleAutostart: async (desired) => {
    const { targets } = get();
    if (!targets) {
      console.warn('[autostart] Toggle requested before targets were configured');
      return get().enabled;
    }

    set({ pending: true });
    const result = await setAutostart(desired, targets);

    if (result.success) {
      set({ enabled: result.registered, pending: false, lastError: null, errorText: null });
      return result.registered;
    }

    // The switch follows what is on disk, not what was attempted.
    const enabled = await isAutostartRegistered(targets.autostartLinkPath);
    set({
      enabled,
      pending: false,
      lastError: result.error,
      errorText: t('autostart.failed', { reason: result.error.message }),
    });
    return enabled;
  },

  dismissError: () => set({ lastError: null, errorText: null }),
}));
