/**
 * Memory errors.
 */
export class MemoryError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'MemoryError'
  }
}

/**
 * Thrown when a memory component is built with invalid settings,
 * e.g. a composable memory with no sources.
 */
export class ConfigurationError extends MemoryError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'ConfigurationError'
  }
}

export type SourceReadOperation = 'get' | 'getAll'
export type SourceWriteOperation = 'put' | 'set' | 'reset'

/**
 * A source's get()/getAll() failed. Composition is aborted.
 */
export class SourceReadError extends MemoryError {
  constructor(
    public readonly sourceIndex: number,
    public readonly sourceName: string,
    public readonly operation: SourceReadOperation,
    cause: unknown
  ) {
    super(
      `Memory source ${sourceIndex} (${sourceName}) failed on ${operation}: ${describeCause(cause)}`,
      cause
    )
    this.name = 'SourceReadError'
  }
}

/**
 * A source's put()/set()/reset() failed during fan-out.
 *
 * Sources before sourceIndex have already been written; nothing is rolled back.
 */
export class SourceWriteError extends MemoryError {
  constructor(
    public readonly sourceIndex: number,
    public readonly sourceName: string,
    public readonly operation: SourceWriteOperation,
    cause: unknown
  ) {
    super(
      `Memory source ${sourceIndex} (${sourceName}) failed on ${operation}: ${describeCause(cause)}`,
      cause
    )
    this.name = 'SourceWriteError'
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
