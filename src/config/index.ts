/**
 * Configuration: file-backed settings with environment overrides.
 */

export { ConfigManager, CONFIG_KEYS, isPartialConfig } from './config.js';
export type { RoffsmithConfig, PartialRoffsmithConfig, ConfigKey } from './config.js';
