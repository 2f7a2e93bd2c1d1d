import { describe, it, expect } from 'vitest'
import { validateConfig } from '../../src/config/validation.js'
import { AppConfigSchema } from '../../src/config/schema.js'

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    const result = validateConfig(AppConfigSchema.parse({}))

    expect(result).toEqual({ valid: true, errors: [], warnings: [] })
  })

  it('rejects minSimilarity outside [-1, 1]', () => {
    const result = validateConfig(
      AppConfigSchema.parse({ memory: { vector: { minSimilarity: 1.5 } } })
    )

    expect(result.valid).toBe(false)
    expect(result.errors.map((e) => e.path)).toEqual(['memory.vector.minSimilarity'])
  })

  it('warns about an in-memory store and mock embeddings', () => {
    const result = validateConfig(
      AppConfigSchema.parse({ memory: { vector: { enabled: true, storePath: ':memory:' } } })
    )

    expect(result.valid).toBe(true)
    expect(result.warnings.map((w) => w.path)).toEqual([
      'memory.vector.storePath',
      'memory.vector.embeddingModel',
    ])
  })

  it('does not warn about a disabled vector source', () => {
    const result = validateConfig(
      AppConfigSchema.parse({ memory: { vector: { storePath: ':memory:' } } })
    )

    expect(result.warnings).toEqual([])
  })

  it('rejects an intro message contained in the outro', () => {
    const result = validateConfig(
      AppConfigSchema.parse({
        composition: { introMessage: 'Memories:', outroMessage: 'End of Memories: done' },
      })
    )

    expect(result.valid).toBe(false)
    expect(result.errors[0].path).toBe('composition.introMessage')
  })

  it('rejects an intro message contained in the default system message', () => {
    const result = validateConfig(
      AppConfigSchema.parse({
        composition: { introMessage: 'helpful', defaultSystemMessage: 'Be helpful.' },
      })
    )

    expect(result.errors.map((e) => e.path)).toEqual(['composition.introMessage'])
  })
})
