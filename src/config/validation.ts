import type { AppConfig } from './schema.js'

export interface ValidationError {
  path: string
  message: string
  suggestion?: string
}

export interface ValidationWarning {
  path: string
  message: string
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
  warnings: ValidationWarning[]
}

/**
 * Validate a configuration for semantic correctness.
 * This goes beyond Zod schema validation to check value ranges and
 * combinations the schema cannot express.
 */
export function validateConfig(config: AppConfig): ValidationResult {
  const errors: ValidationError[] = []
  const warnings: ValidationWarning[] = []
  const vector = config.memory.vector

  if (vector.minSimilarity < -1 || vector.minSimilarity > 1) {
    errors.push({
      path: 'memory.vector.minSimilarity',
      message: `minSimilarity must be between -1 and 1, got ${vector.minSimilarity}`,
    })
  }

  if (vector.enabled && vector.storePath === ':memory:') {
    warnings.push({
      path: 'memory.vector.storePath',
      message: 'In-memory vector store is lost when the process exits.',
    })
  }

  if (vector.enabled && vector.embeddingModel.toLowerCase().startsWith('mock')) {
    warnings.push({
      path: 'memory.vector.embeddingModel',
      message: 'Mock embeddings are hash-based and do not capture meaning.',
    })
  }

  if (
    config.composition.outroMessage.includes(config.composition.introMessage) ||
    config.composition.defaultSystemMessage.includes(config.composition.introMessage)
  ) {
    errors.push({
      path: 'composition.introMessage',
      message: 'introMessage appears inside other composition text and would be mis-split',
      suggestion: 'Use an intro sentence that does not occur in outroMessage or defaultSystemMessage',
    })
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
