import type { I18nParams } from './types';
import { i18nStore } from '@/stores/i18n';

export function t(key: string, params?: I18nParams): string {
  return i18nStore.getState().translate(key, params);
}
