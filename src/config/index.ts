// Schema and types
export { AppConfigSchema, type AppConfig } from './schema.js'
export type {
  BufferConfig,
  VectorConfig,
  MemoryConfig,
  CompositionConfig,
  LoggingConfig,
} from './schema.js'

// Defaults
export { getDefaults } from './defaults.js'

// Paths
export {
  getHome,
  getConfigPath,
  getLocalConfigPath,
  getVectorStorePath,
  getLogsPath,
  getAuditPath,
} from './paths.js'

// Environment parsing
export { parseEnvConfig, parseValue, toCamelCase, ENV_PREFIX } from './env.js'

// File utilities
export { fileExists, loadConfigFile, saveConfigFile } from './file.js'

// Merge utilities
export { deepMerge, setPath, getPath } from './merge.js'

// Loader
export { loadConfig, type LoadConfigOptions } from './loader.js'

// Validation
export {
  validateConfig,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validation.js'
