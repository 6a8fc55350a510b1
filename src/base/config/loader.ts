/**
 * Configuration Loader - Read view-index settings from a parameter source
 */

import type { InitParameterSource } from './types.js';
import {
  SCAN_PATHS_PARAM,
  SCAN_ENABLED_PARAM,
  EXTENSIONLESS_ALWAYS_PARAM,
} from './types.js';
import { validateViewsSettings, type ViewsSettings } from '../utils/config-validator.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_SETTINGS: ViewsSettings = {
  scanPaths: [],
  scanEnabled: true,
  alwaysExtensionless: false,
};

/**
 * Parameter source backed by a plain record
 */
export function createRecordParameterSource(
  parameters: Record<string, string | undefined>
): InitParameterSource {
  return {
    getInitParameter: (name) => parameters[name],
  };
}

/**
 * Environment variable name for a parameter,
 * e.g. `view-index.scan-paths` -> `VIEW_INDEX_SCAN_PATHS`
 */
export function toEnvName(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
}

/**
 * Parameter source backed by environment variables
 */
export function createEnvParameterSource(
  env: NodeJS.ProcessEnv = process.env
): InitParameterSource {
  return {
    getInitParameter: (name) => env[toEnvName(name)],
  };
}

/**
 * Layer sources; the first one that has a value wins
 */
export function combineParameterSources(...sources: InitParameterSource[]): InitParameterSource {
  return {
    getInitParameter(name) {
      for (const source of sources) {
        const value = source.getInitParameter(name);
        if (value !== undefined) {
          return value;
        }
      }
      return undefined;
    },
  };
}

/**
 * Load and validate all view-index settings
 *
 * Invalid input is logged and replaced by the defaults.
 */
export function loadViewsSettings(source: InitParameterSource): ViewsSettings {
  const raw = {
    scanPaths: source.getInitParameter(SCAN_PATHS_PARAM),
    scanEnabled: source.getInitParameter(SCAN_ENABLED_PARAM),
    alwaysExtensionless: source.getInitParameter(EXTENSIONLESS_ALWAYS_PARAM),
  };

  const result = validateViewsSettings(raw, 'init parameters');
  if (!result.valid || !result.data) {
    return { ...DEFAULT_SETTINGS, scanPaths: [] };
  }

  logger.debug('config', 'Loaded settings', { ...result.data });

  return result.data;
}
