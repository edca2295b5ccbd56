/**
 * Configuration Module
 */

export type { VarExportConfig } from './types';

export {
  DEFAULT_CONFIG,
  VALID_LOG_LEVELS,
  VALID_LOG_FORMATS,
  VarExportConfigSchema,
} from './types';

export { ConfigLoadError, ConfigValidationError } from './errors';

export { loadConfig } from './loader';

export type { LoadConfigOptions } from './loader';
