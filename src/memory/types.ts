/**
 * Memory Types
 *
 * Core interfaces shared by every memory source and the composable
 * coordinator:
 * - ChatMessage: a single role + content pair
 * - MemorySource: the capability set every backing store implements
 * - Per-source configuration and defaults
 */

/**
 * Roles a chat message can carry.
 */
export const MESSAGE_ROLES = [
  'system',
  'developer',
  'user',
  'assistant',
  'function',
  'tool',
  'chatbot',
  'model',
] as const

export type MessageRole = (typeof MESSAGE_ROLES)[number]

/**
 * A single message in a chat history.
 *
 * Treated as an immutable value: memory sources and the coordinator replace
 * whole messages, never edit content in place.
 */
export interface ChatMessage {
  role: MessageRole
  content: string
  metadata?: Record<string, unknown>
}

/**
 * Options passed through to a source's get().
 *
 * Sources read the keys they understand and ignore the rest.
 */
export interface MemoryGetOptions {
  /** Maximum number of messages to return. */
  limit?: number
  /** Minimum similarity for retrieval-backed sources (-1 to 1). */
  minSimilarity?: number
  [key: string]: unknown
}

/**
 * A conversational memory store.
 *
 * Identity and storage belong to the implementation. Sequences returned by
 * get()/getAll() must be safe for the caller to mutate.
 */
export interface MemorySource {
  /** Optional label used in error and audit context. */
  readonly name?: string

  /** Chat history relevant to the optional input. */
  get(input?: string, options?: MemoryGetOptions): Promise<ChatMessage[]>

  /** Full stored history. */
  getAll(): Promise<ChatMessage[]>

  /** Append a message. */
  put(message: ChatMessage): Promise<void>

  /** Replace the stored history. */
  set(messages: ChatMessage[]): Promise<void>

  /** Clear the stored history. */
  reset(): Promise<void>
}

/**
 * Chat buffer configuration.
 */
export interface ChatMemoryBufferConfig {
  /** Evict oldest non-system messages beyond this count. Unbounded when unset. */
  maxMessages?: number
}

/**
 * Vector memory configuration.
 */
export interface VectorMemoryConfig {
  storePath: string
  embeddingModel: string
  dimensions: number
  topK: number
  minSimilarity: number
}

/**
 * Default vector memory configuration.
 */
export const DEFAULT_VECTOR_CONFIG: Omit<VectorMemoryConfig, 'storePath'> = {
  embeddingModel: 'mock',
  dimensions: 1536,
  topK: 2,
  minSimilarity: 0,
}

/**
 * Vector search result with similarity score.
 */
export interface VectorSearchResult {
  message: ChatMessage
  similarity: number
}
