/**
 * @entry Config module
 *
 * YAML loading, schema validation, environment overrides
 */

export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  CONFIG_FILENAME,
  type LoadConfigOptions,
} from './loadConfig.js'
export * from './schema.js'
