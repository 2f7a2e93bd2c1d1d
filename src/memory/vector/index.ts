/**
 * Vector Memory
 *
 * Retrieval-augmented memory source, typically used as a secondary source:
 * - Generates an embedding for every stored message
 * - Stores messages in SQLite with JSON-encoded vectors
 * - Answers get(input) with the stored messages most similar to the input
 */

import { randomUUID } from 'crypto'
import type {
  ChatMessage,
  MemoryGetOptions,
  MemorySource,
  VectorMemoryConfig,
} from '../types.js'
import { DEFAULT_VECTOR_CONFIG } from '../types.js'
import { ConfigurationError } from '../errors.js'
import {
  createEmbeddingGenerator,
  type IEmbeddingGenerator,
} from './embeddings.js'
import { SqliteVectorStore, type IVectorStore, type VectorRecord } from './store.js'

/**
 * Options for creating a VectorMemory.
 *
 * Pass `embeddings` to use a custom model; otherwise one is created from
 * `embeddingModel`.
 */
export interface VectorMemoryOptions extends Partial<VectorMemoryConfig> {
  storePath: string
  embeddings?: IEmbeddingGenerator
  name?: string
}

/**
 * Vector Memory class.
 */
export class VectorMemory implements MemorySource {
  readonly name: string
  private store: IVectorStore
  private embeddings: IEmbeddingGenerator
  private readonly topK: number
  private readonly minSimilarity: number

  constructor(options: VectorMemoryOptions) {
    const config = { ...DEFAULT_VECTOR_CONFIG, ...options }

    if (!Number.isInteger(config.topK) || config.topK < 1) {
      throw new ConfigurationError(`topK must be a positive integer, got ${config.topK}`, 'topK')
    }
    if (config.minSimilarity < -1 || config.minSimilarity > 1) {
      throw new ConfigurationError(
        `minSimilarity must be between -1 and 1, got ${config.minSimilarity}`,
        'minSimilarity'
      )
    }

    this.name = options.name ?? 'VectorMemory'
    this.topK = config.topK
    this.minSimilarity = config.minSimilarity

    this.embeddings =
      options.embeddings ??
      createEmbeddingGenerator({
        model: config.embeddingModel,
        dimensions: config.dimensions,
      })

    this.store = new SqliteVectorStore(
      config.storePath,
      this.embeddings.getDimensions()
    )
  }

  /**
   * Retrieve stored messages similar to the input.
   *
   * Without an input there is nothing to search for, so nothing is returned.
   */
  async get(input?: string, options: MemoryGetOptions = {}): Promise<ChatMessage[]> {
    if (input === undefined || input.trim() === '') {
      return []
    }

    const queryEmbedding = await this.embeddings.generate(input)
    const results = await this.store.search(
      queryEmbedding,
      options.limit ?? this.topK,
      options.minSimilarity ?? this.minSimilarity
    )

    return results.map((result) => result.message)
  }

  async getAll(): Promise<ChatMessage[]> {
    return this.store.all()
  }

  async put(message: ChatMessage): Promise<void> {
    await this.store.insert(await this.toRecord(message))
  }

  /**
   * Replace stored messages. Embeddings are generated before the store is
   * touched, so a failing embedding leaves the previous contents intact.
   */
  async set(messages: ChatMessage[]): Promise<void> {
    const records: VectorRecord[] = []
    for (const message of messages) {
      records.push(await this.toRecord(message))
    }
    await this.store.replaceAll(records)
  }

  async reset(): Promise<void> {
    await this.store.clear()
  }

  /**
   * Get total stored message count.
   */
  async count(): Promise<number> {
    return this.store.count()
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.store.close()
  }

  private async toRecord(message: ChatMessage): Promise<VectorRecord> {
    return {
      id: randomUUID(),
      message,
      embedding: await this.embeddings.generate(message.content),
      createdAt: new Date(),
    }
  }
}

export { createEmbeddingGenerator, cosineSimilarity, MockEmbeddingGenerator } from './embeddings.js'
export type { IEmbeddingGenerator, EmbeddingGeneratorConfig } from './embeddings.js'
export { SqliteVectorStore } from './store.js'
export type { IVectorStore, VectorRecord } from './store.js'
