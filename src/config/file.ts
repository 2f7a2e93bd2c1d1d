import { promises as fs } from 'fs'
import path from 'path'
import { ConfigurationError } from '../memory/errors.js'

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load a JSON config file. The top level must be an object.
 */
export async function loadConfigFile(
  filePath: string
): Promise<Record<string, unknown>> {
  const content = await fs.readFile(filePath, 'utf-8')

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON`, filePath, error)
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`, filePath)
  }

  return { ...parsed }
}

/**
 * Save a JSON config file.
 */
export async function saveConfigFile(
  filePath: string,
  config: Record<string, unknown>
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  await fs.writeFile(filePath, JSON.stringify(config, null, 2), 'utf-8')
}
