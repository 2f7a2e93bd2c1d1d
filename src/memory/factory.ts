/**
 * Build memory components from loaded configuration.
 */

import type { AppConfig } from '../config/schema.js'
import { getAuditPath, getVectorStorePath } from '../config/paths.js'
import { AuditLogger } from '../audit/service.js'
import { JsonlAuditStore } from '../audit/store/jsonl.js'
import { ChatMemoryBuffer } from './buffer/index.js'
import { ComposableMemory } from './composable/index.js'
import type { MemorySource } from './types.js'
import { VectorMemory, type IEmbeddingGenerator } from './vector/index.js'

export interface CreateMemoryOptions {
  /** Overrides the logger built from config.logging. */
  audit?: AuditLogger
  /** Custom embedding model for the vector source. */
  embeddings?: IEmbeddingGenerator
}

/**
 * Create the audit logger described by config.logging, or undefined when
 * auditing is disabled.
 */
export function createAuditLogger(config: AppConfig): AuditLogger | undefined {
  if (!config.logging.audit.enabled) return undefined

  return new AuditLogger({
    store: new JsonlAuditStore(config.logging.audit.path ?? getAuditPath()),
    minSeverity: config.logging.level,
  })
}

/**
 * Create a composable memory: a chat buffer as primary and, when enabled,
 * a vector memory as the single secondary source.
 */
export function createMemoryFromConfig(
  config: AppConfig,
  options: CreateMemoryOptions = {}
): ComposableMemory {
  const sources: MemorySource[] = [
    new ChatMemoryBuffer({ maxMessages: config.memory.buffer.maxMessages }),
  ]

  const vector = config.memory.vector
  if (vector.enabled) {
    sources.push(
      new VectorMemory({
        storePath: vector.storePath ?? getVectorStorePath(),
        embeddingModel: vector.embeddingModel,
        dimensions: vector.dimensions,
        topK: vector.topK,
        minSimilarity: vector.minSimilarity,
        embeddings: options.embeddings,
      })
    )
  }

  return new ComposableMemory(sources, {
    templates: config.composition,
    audit: options.audit ?? createAuditLogger(config),
  })
}
