import { describe, it, expect } from 'vitest'
import {
  createEmbeddingGenerator,
  cosineSimilarity,
  MockEmbeddingGenerator,
  normalize,
} from '../../../src/memory/vector/embeddings.js'
import { ConfigurationError } from '../../../src/memory/errors.js'

describe('MockEmbeddingGenerator', () => {
  it('is deterministic', async () => {
    const a = new MockEmbeddingGenerator(64)
    const b = new MockEmbeddingGenerator(64)

    expect(await a.generate('hello')).toEqual(await b.generate('hello'))
  })

  it('produces unit vectors of the configured size', async () => {
    const generator = new MockEmbeddingGenerator(100)
    const embedding = await generator.generate('hello')

    expect(embedding).toHaveLength(100)
    const magnitude = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0))
    expect(magnitude).toBeCloseTo(1, 10)
  })

  it('gives different texts different embeddings', async () => {
    const generator = new MockEmbeddingGenerator(32)

    expect(await generator.generate('hello')).not.toEqual(await generator.generate('world'))
  })

  it('rejects invalid dimensions', () => {
    expect(() => new MockEmbeddingGenerator(0)).toThrow(ConfigurationError)
  })
})

describe('createEmbeddingGenerator', () => {
  it('creates mock generators', () => {
    expect(createEmbeddingGenerator({ model: 'mock' }).getDimensions()).toBe(1536)
    expect(createEmbeddingGenerator({ model: 'MOCK:small', dimensions: 8 }).getDimensions()).toBe(8)
  })

  it('rejects unknown models', () => {
    expect(() => createEmbeddingGenerator({ model: 'openai:text-embedding-3-small' })).toThrow(
      'Unknown embedding model: openai:text-embedding-3-small'
    )
  })
})

describe('cosineSimilarity', () => {
  it('is 1 for identical directions', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10)
  })

  it('is 0 for orthogonal vectors and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  })

  it('is -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1)
  })

  it('throws on mismatched lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have same length (1 vs 2)')
  })
})

describe('normalize', () => {
  it('scales to unit length', () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8])
  })

  it('leaves the zero vector alone', () => {
    expect(normalize([0, 0])).toEqual([0, 0])
  })
})
