/**
 * Chat Memory Buffer
 *
 * In-memory chat history. The default source used by
 * ComposableMemory.fromDefaults().
 * - Message limit enforcement
 * - System message preservation during eviction
 */

import type {
  ChatMessage,
  ChatMemoryBufferConfig,
  MemoryGetOptions,
  MemorySource,
} from '../types.js'
import { ConfigurationError } from '../errors.js'

/**
 * Chat Memory Buffer class.
 *
 * Every read returns a fresh array, so callers may mutate the result
 * without touching the buffer.
 */
export class ChatMemoryBuffer implements MemorySource {
  readonly name: string
  private messages: ChatMessage[] = []
  private readonly maxMessages: number | undefined

  constructor(config: ChatMemoryBufferConfig & { name?: string } = {}) {
    if (
      config.maxMessages !== undefined &&
      (!Number.isInteger(config.maxMessages) || config.maxMessages < 1)
    ) {
      throw new ConfigurationError(
        `maxMessages must be a positive integer, got ${config.maxMessages}`,
        'maxMessages'
      )
    }
    this.name = config.name ?? 'ChatMemoryBuffer'
    this.maxMessages = config.maxMessages
  }

  /**
   * Create a buffer with default settings.
   */
  static fromDefaults(
    config: ChatMemoryBufferConfig & { name?: string } = {}
  ): ChatMemoryBuffer {
    return new ChatMemoryBuffer(config)
  }

  /**
   * Get the most recent messages.
   *
   * The input is ignored: a buffer has no notion of relevance.
   */
  async get(_input?: string, options: MemoryGetOptions = {}): Promise<ChatMessage[]> {
    if (options.limit === undefined) {
      return [...this.messages]
    }
    if (options.limit <= 0) {
      return []
    }
    return this.messages.slice(-options.limit)
  }

  async getAll(): Promise<ChatMessage[]> {
    return [...this.messages]
  }

  async put(message: ChatMessage): Promise<void> {
    this.messages.push(message)
    this.enforceMessageLimit()
  }

  async set(messages: ChatMessage[]): Promise<void> {
    this.messages = [...messages]
    this.enforceMessageLimit()
  }

  async reset(): Promise<void> {
    this.messages = []
  }

  /**
   * Number of stored messages.
   */
  get size(): number {
    return this.messages.length
  }

  /**
   * Enforce message limit by removing oldest non-system messages.
   */
  private enforceMessageLimit(): void {
    if (this.maxMessages === undefined) return

    while (this.messages.length > this.maxMessages) {
      const indexToRemove = this.messages.findIndex((m) => m.role !== 'system')
      if (indexToRemove === -1) {
        // All messages are system messages - remove oldest
        this.messages.shift()
      } else {
        this.messages.splice(indexToRemove, 1)
      }
    }
  }
}
