/**
 * Composable Memory
 *
 * Composes several memory sources into one chat history:
 * - The first source is primary: the canonical history that reads, writes
 *   and resets default to
 * - The rest are secondary: their histories are formatted into the primary
 *   history's leading system message on every get()
 *
 * Calls into sources are awaited one at a time, in source order.
 */

import { logQuietly, type AuditLogger } from '../../audit/service.js'
import { ChatMemoryBuffer } from '../buffer/index.js'
import {
  ConfigurationError,
  SourceReadError,
  SourceWriteError,
  type SourceWriteOperation,
} from '../errors.js'
import type { ChatMessage, MemoryGetOptions, MemorySource } from '../types.js'
import { formatSecondaryHistories, stripInjectedBlock } from './format.js'
import { DEFAULT_COMPOSITION_TEMPLATES, type CompositionTemplates } from './templates.js'

/**
 * Options for ComposableMemory.
 */
export interface ComposableMemoryOptions {
  templates?: Partial<CompositionTemplates>
  /** When set, composition and fan-out events are recorded here. */
  audit?: AuditLogger
}

/**
 * Composable Memory class.
 */
export class ComposableMemory implements MemorySource {
  readonly name = 'ComposableMemory'
  readonly templates: CompositionTemplates
  private readonly sources: readonly MemorySource[]
  private readonly audit: AuditLogger | undefined

  constructor(sources: MemorySource[], options: ComposableMemoryOptions = {}) {
    if (sources.length === 0) {
      throw new ConfigurationError('Must supply at least one memory source.', 'sources')
    }

    const templates = { ...DEFAULT_COMPOSITION_TEMPLATES, ...options.templates }
    if (templates.introMessage.length === 0) {
      throw new ConfigurationError(
        'introMessage must not be empty: it marks injected history',
        'templates.introMessage'
      )
    }

    this.sources = [...sources]
    this.templates = templates
    this.audit = options.audit
  }

  /**
   * Create a composable memory, falling back to a single fresh
   * ChatMemoryBuffer when no sources are given.
   */
  static fromDefaults(
    sources?: MemorySource[],
    options: ComposableMemoryOptions = {}
  ): ComposableMemory {
    const resolved = sources && sources.length > 0 ? sources : [ChatMemoryBuffer.fromDefaults()]
    return new ComposableMemory(resolved, options)
  }

  get primaryMemory(): MemorySource {
    return this.sources[0]
  }

  get secondaryMemorySources(): MemorySource[] {
    return this.sources.slice(1)
  }

  /**
   * Get the composed chat history.
   *
   * Returns the primary history unchanged when no secondary source has
   * anything to contribute. Otherwise the secondary histories are injected
   * into the leading system message, replacing any block injected by an
   * earlier call, or a new system message is prepended.
   */
  async get(input?: string, options: MemoryGetOptions = {}): Promise<ChatMessage[]> {
    const messages = [...(await this.read(0, 'get', () => this.primaryMemory.get(input, options)))]

    const secondaryHistories: ChatMessage[][] = []
    for (let i = 1; i < this.sources.length; i++) {
      const source = this.sources[i]
      const history = await this.read(i, 'get', () => source.get(input, options))
      if (history.length > 0) {
        secondaryHistories.push(history)
      }
    }

    if (secondaryHistories.length === 0) {
      return messages
    }

    const injection = formatSecondaryHistories(secondaryHistories, this.templates)

    if (messages.length > 0 && messages[0].role === 'system') {
      messages[0] = {
        role: 'system',
        content: stripInjectedBlock(messages[0].content, this.templates.introMessage) + injection,
      }
    } else {
      messages.unshift({
        role: 'system',
        content: this.templates.defaultSystemMessage + injection,
      })
    }

    await logQuietly(this.audit, {
      category: 'memory',
      action: 'compose',
      severity: 'debug',
      metadata: {
        composedMessages: messages.length,
        injectedSources: secondaryHistories.length,
        injectedMessages: secondaryHistories.reduce((sum, h) => sum + h.length, 0),
      },
    })

    return messages
  }

  /**
   * Get all chat history from the primary source only.
   */
  async getAll(): Promise<ChatMessage[]> {
    return this.read(0, 'getAll', () => this.primaryMemory.getAll())
  }

  /**
   * Append a message to every source, primary first.
   */
  async put(message: ChatMessage): Promise<void> {
    await this.fanOut('put', this.sources, (source) => source.put(message))
  }

  /**
   * Overwrite every source's history, primary first.
   */
  async set(messages: ChatMessage[]): Promise<void> {
    await this.fanOut('set', this.sources, (source) => source.set(messages))
  }

  /**
   * Reset the primary source only. Secondary sources keep their history.
   */
  async reset(): Promise<void> {
    await this.fanOut('reset', [this.primaryMemory], (source) => source.reset())
    await logQuietly(this.audit, {
      category: 'memory',
      action: 'reset',
      severity: 'info',
      metadata: { sources: 1 },
    })
  }

  /**
   * Reset every source, primary first.
   */
  async resetAll(): Promise<void> {
    await this.fanOut('reset', this.sources, (source) => source.reset())
    await logQuietly(this.audit, {
      category: 'memory',
      action: 'reset_all',
      severity: 'info',
      metadata: { sources: this.sources.length },
    })
  }

  private async read(
    index: number,
    operation: 'get' | 'getAll',
    call: () => Promise<ChatMessage[]>
  ): Promise<ChatMessage[]> {
    try {
      return await call()
    } catch (error) {
      const wrapped = new SourceReadError(index, this.sourceName(index), operation, error)
      await this.recordFailure('source_read_failed', wrapped)
      throw wrapped
    }
  }

  /**
   * Apply a write to each target in order. Stops at the first failure;
   * targets already written stay written.
   */
  private async fanOut(
    operation: SourceWriteOperation,
    targets: readonly MemorySource[],
    call: (source: MemorySource) => Promise<void>
  ): Promise<void> {
    for (let i = 0; i < targets.length; i++) {
      try {
        await call(targets[i])
      } catch (error) {
        const wrapped = new SourceWriteError(i, this.sourceName(i), operation, error)
        await this.recordFailure('source_write_failed', wrapped)
        throw wrapped
      }
    }
  }

  private async recordFailure(
    action: string,
    error: SourceReadError | SourceWriteError
  ): Promise<void> {
    await logQuietly(this.audit, {
      category: 'source',
      action,
      severity: 'alert',
      metadata: {
        sourceIndex: error.sourceIndex,
        sourceName: error.sourceName,
        operation: error.operation,
        errorMessage: error.message,
      },
    })
  }

  private sourceName(index: number): string {
    const source = this.sources[index]
    return source.name ?? source.constructor.name
  }
}

export { formatSecondaryHistories, formatMessageLine, stripInjectedBlock } from './format.js'
export {
  DEFAULT_INTRO_HISTORY_MESSAGE,
  DEFAULT_OUTRO_HISTORY_MESSAGE,
  DEFAULT_SYSTEM_MESSAGE,
  DEFAULT_COMPOSITION_TEMPLATES,
  sourceHeader,
  sourceFooter,
  type CompositionTemplates,
} from './templates.js'
