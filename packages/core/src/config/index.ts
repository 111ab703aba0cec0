/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateVersion,
  validateLogLevel,
  validateModules,
} from './ConfigLoader.js';
export type { TesseraConfig, ConfigWarnings } from './ConfigLoader.js';
