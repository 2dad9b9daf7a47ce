/**
 * Config commands
 */

import { defaultConfigPath, loadConfig, writeDefaultConfig } from '../../config';
import type { ProspectorConfig } from '../../config/types';

export function maskSecret(value: string | undefined): string | undefined {
  if (!value) return value;
  return value.length <= 4 ? '****' : `****${value.slice(-4)}`;
}

export function maskedConfig(config: ProspectorConfig): ProspectorConfig {
  return {
    ...config,
    api: {
      ...config.api,
      googlePlacesKey: maskSecret(config.api.googlePlacesKey),
      openaiKey: maskSecret(config.api.openaiKey),
    },
  };
}

export function showConfig(options: { config?: string }): void {
  const config = loadConfig(options.config);
  console.log(JSON.stringify(maskedConfig(config), null, 2));
}

export function initConfig(options: { config?: string }): string {
  const target = options.config || defaultConfigPath();
  writeDefaultConfig(target);
  return target;
}
