/**
 * Configuration Module - init parameters for view scanning
 */

export type { InitParameterSource, ViewsParamName } from './types.js';

export {
  SCAN_PATHS_PARAM,
  SCAN_ENABLED_PARAM,
  EXTENSIONLESS_ALWAYS_PARAM,
  VIEWS_PARAMS,
} from './types.js';

export {
  DEFAULT_SETTINGS,
  loadViewsSettings,
  createRecordParameterSource,
  createEnvParameterSource,
  combineParameterSources,
  toEnvName,
} from './loader.js';

export type { ViewsSettings } from '../utils/config-validator.js';
