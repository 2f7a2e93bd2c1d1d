import path from 'path'
import os from 'os'

const APP_DIR = 'composable-memory'

/**
 * Get the home directory for config, logs and stores.
 * Resolution order:
 * 1. CMEM_HOME environment variable
 * 2. XDG_CONFIG_HOME/composable-memory (Linux)
 * 3. Platform-specific defaults
 */
export function getHome(): string {
  if (process.env.CMEM_HOME) {
    return process.env.CMEM_HOME
  }

  if (process.env.XDG_CONFIG_HOME) {
    return path.join(process.env.XDG_CONFIG_HOME, APP_DIR)
  }

  switch (process.platform) {
    case 'win32':
      return path.join(process.env.APPDATA || '', APP_DIR)
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR)
    default:
      return path.join(os.homedir(), `.${APP_DIR}`)
  }
}

/**
 * Get the path to the main config file.
 */
export function getConfigPath(): string {
  return path.join(getHome(), 'config.json')
}

/**
 * Get the path to the local config overrides file.
 */
export function getLocalConfigPath(): string {
  return path.join(getHome(), 'config.local.json')
}

/**
 * Get the path to the default vector store database.
 */
export function getVectorStorePath(): string {
  return path.join(getHome(), 'memory.db')
}

/**
 * Get the path to the logs directory.
 */
export function getLogsPath(): string {
  return path.join(getHome(), 'logs')
}

/**
 * Get the path to the audit logs directory.
 */
export function getAuditPath(): string {
  return path.join(getLogsPath(), 'audit')
}
