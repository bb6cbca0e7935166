import { createStore } from 'zustand/vanilla';

export const HOME_PAGE = 'home';
export const APP_BROWSER_PAGE = 'appBrowser';

interface ShellState {
  activePage: string;
  isHomeEnabled: boolean;
  isInstallVisible: boolean;
  isAppBrowserVisible: boolean;
  subtitle: string;

  showPage: (page: string) => void;
  setLiveSession: (isLive: boolean) => void;
  setSubtitle: (subtitle: string) => void;
}

export const shellStore = createStore<ShellState>()((set) => ({
  activePage: HOME_PAGE,
  isHomeEnabled: false,
  isInstallVisible: false,
  isAppBrowserVisible: false,
  subtitle: '',

  showPage: (page) =>
    set({
      activePage: page,
      isHomeEnabled: page !== HOME_PAGE,
    }),

  setLiveSession: (isLive) => set({ isInstallVisible: isLive }),

  setSubtitle: (subtitle) => set({ subtitle }),
}));
