import { launchDetached } from '@/system/liveSession';
import type { HostBridge } from './commands';

export interface NodeHostBridgeOptions {
  urlOpener?: readonly string[];
  onQuit?: () => void;
}

/** Headless bridge: opens URLs through the desktop opener, logs window-only actions. */
export function createNodeHostBridge({
  urlOpener = ['xdg-open'],
  onQuit,
}: NodeHostBridgeOptions = {}): HostBridge {
  return {
    openUrl: async (url) => {
      try {
        await launchDetached([...urlOpener, url]);
      } catch (error) {
        console.error(`[hello] Failed to open "${url}":`, error);
      }
    },
    launchInstaller: async (command) => {
      try {
        await launchDetached(command);
      } catch (error) {
        console.error(`[hello] Failed to launch installer "${command.join(' ')}":`, error);
      }
    },
    showAbout: () => {
      console.info('[hello] About dialog requested');
    },
    quit: () => {
      onQuit?.();
    },
  };
}
