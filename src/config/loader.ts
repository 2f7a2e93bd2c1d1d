import { AppConfigSchema, type AppConfig } from './schema.js'
import { getDefaults } from './defaults.js'
import { getConfigPath, getLocalConfigPath } from './paths.js'
import { parseEnvConfig } from './env.js'
import { fileExists, loadConfigFile } from './file.js'
import { deepMerge } from './merge.js'
import { logQuietly, type AuditLogger } from '../audit/service.js'

export interface LoadConfigOptions {
  /** Config file to read instead of CMEM_HOME/config.json. */
  configPath?: string
  /** Highest-precedence values, e.g. from a caller's own flags. */
  overrides?: Record<string, unknown>
  env?: NodeJS.ProcessEnv
  /** Records which layers were applied under the `config` category. */
  audit?: AuditLogger
}

/**
 * Load configuration with full precedence chain.
 *
 * Precedence (later overrides earlier):
 * 1. Defaults
 * 2. Config file (config.json)
 * 3. Local overrides (config.local.json)
 * 4. Environment variables
 * 5. Explicit overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  let config: Record<string, unknown> = getDefaults()
  const layers = ['defaults']

  const configPath = options.configPath ?? getConfigPath()
  if (await fileExists(configPath)) {
    config = deepMerge(config, await loadConfigFile(configPath))
    layers.push('file')
  }

  const localPath = options.configPath
    ? options.configPath.replace(/\.json$/, '.local.json')
    : getLocalConfigPath()
  if (localPath !== configPath && (await fileExists(localPath))) {
    config = deepMerge(config, await loadConfigFile(localPath))
    layers.push('local')
  }

  const envConfig = parseEnvConfig(options.env)
  if (Object.keys(envConfig).length > 0) {
    config = deepMerge(config, envConfig)
    layers.push('env')
  }

  if (options.overrides) {
    config = deepMerge(config, options.overrides)
    layers.push('overrides')
  }

  const parsed = AppConfigSchema.parse(config)

  await logQuietly(options.audit, {
    category: 'config',
    action: 'loaded',
    metadata: { configPath, layers },
  })

  return parsed
}
