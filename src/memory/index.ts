/**
 * Memory System
 *
 * Composable chat memory:
 * - ComposableMemory: one primary source plus secondary context sources
 * - ChatMemoryBuffer: in-memory chat history (default primary)
 * - VectorMemory: similarity retrieval over stored messages
 */

// Types
export type {
  MessageRole,
  ChatMessage,
  MemoryGetOptions,
  MemorySource,
  ChatMemoryBufferConfig,
  VectorMemoryConfig,
  VectorSearchResult,
} from './types.js'

export { MESSAGE_ROLES, DEFAULT_VECTOR_CONFIG } from './types.js'
export { ChatMessageSchema, ChatHistorySchema } from './schema.js'

// Errors
export {
  MemoryError,
  ConfigurationError,
  SourceReadError,
  SourceWriteError,
  type SourceReadOperation,
  type SourceWriteOperation,
} from './errors.js'

// Chat buffer
export { ChatMemoryBuffer } from './buffer/index.js'

// Vector memory
export {
  VectorMemory,
  createEmbeddingGenerator,
  cosineSimilarity,
  MockEmbeddingGenerator,
  SqliteVectorStore,
  type VectorMemoryOptions,
  type IEmbeddingGenerator,
  type EmbeddingGeneratorConfig,
  type IVectorStore,
  type VectorRecord,
} from './vector/index.js'

// Composition
export {
  ComposableMemory,
  formatSecondaryHistories,
  formatMessageLine,
  stripInjectedBlock,
  DEFAULT_INTRO_HISTORY_MESSAGE,
  DEFAULT_OUTRO_HISTORY_MESSAGE,
  DEFAULT_SYSTEM_MESSAGE,
  DEFAULT_COMPOSITION_TEMPLATES,
  sourceHeader,
  sourceFooter,
  type ComposableMemoryOptions,
  type CompositionTemplates,
} from './composable/index.js'

// Factory
export { createMemoryFromConfig, createAuditLogger, type CreateMemoryOptions } from './factory.js'
