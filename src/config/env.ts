import { setPath } from './merge.js'

export const ENV_PREFIX = 'CMEM_'

// Reserved environment variables (not parsed into config)
const RESERVED_ENV_VARS = new Set(['CMEM_HOME'])

/**
 * Parse environment variables into a partial config object.
 *
 * Naming conventions:
 * - Double underscore separates path segments
 * - Single underscore inside a segment becomes camelCase
 *
 *   CMEM_VERSION -> version
 *   CMEM_MEMORY__VECTOR__MIN_SIMILARITY -> memory.vector.minSimilarity
 *   CMEM_LOGGING__AUDIT__ENABLED -> logging.audit.enabled
 */
export function parseEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX)) continue
    if (value === undefined) continue
    if (RESERVED_ENV_VARS.has(key)) continue

    const path = key
      .slice(ENV_PREFIX.length)
      .split('__')
      .map(toCamelCase)
      .join('.')

    setPath(config, path, parseValue(value))
  }

  return config
}

/**
 * MIN_SIMILARITY -> minSimilarity
 */
export function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase())
}

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  if (value === 'true') return true
  if (value === 'false') return false

  if (/^-?\d+$/.test(value)) return parseInt(value, 10)
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  // JSON (arrays/objects)
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      return value
    }
  }

  return value
}
