/**
 * Global configuration types
 */

import type { OutputFormat } from '../utils/output';

export interface GlobalConfig {
  /** Default snapshot file */
  snapshot?: string;
  /** Contexts applied to every check, as key=value */
  contexts?: string[];
  /** Default output format */
  output?: OutputFormat;
}

export type ConfigKey = 'snapshot' | 'contexts' | 'output';

export const CONFIG_KEYS: readonly ConfigKey[] = ['snapshot', 'contexts', 'output'];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}
