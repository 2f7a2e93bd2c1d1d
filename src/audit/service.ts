import { randomUUID } from 'crypto'
import type { AuditEntry } from './schema.js'
import { AUDIT_SEVERITIES, type AuditCategory, type AuditSeverity } from './types.js'
import type { AuditStore, AuditFilter } from './store/interface.js'
import { JsonlAuditStore } from './store/jsonl.js'
import { getAuditPath } from '../config/paths.js'

/**
 * Options for creating an audit entry.
 */
export interface AuditOptions {
  category: AuditCategory
  action: string
  severity?: AuditSeverity
  sessionId?: string
  metadata?: Record<string, unknown>
}

export interface AuditLoggerOptions {
  store?: AuditStore
  /** Entries below this severity are dropped. Defaults to 'debug'. */
  minSeverity?: AuditSeverity
}

/**
 * Audit logger service.
 *
 * All entries are sanitized by the store before they are written.
 */
export class AuditLogger {
  private readonly store: AuditStore
  private readonly minRank: number

  constructor(options: AuditLoggerOptions = {}) {
    this.store = options.store ?? new JsonlAuditStore(getAuditPath())
    this.minRank = AUDIT_SEVERITIES.indexOf(options.minSeverity ?? 'debug')
  }

  /**
   * Log an audit entry.
   */
  async log(options: AuditOptions): Promise<void> {
    const severity = options.severity ?? 'info'
    if (AUDIT_SEVERITIES.indexOf(severity) < this.minRank) return

    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      category: options.category,
      action: options.action,
      severity,
      sessionId: options.sessionId,
      metadata: options.metadata,
    }

    await this.store.append(entry)
  }

  async debug(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'debug', metadata })
  }

  async info(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'info', metadata })
  }

  async warning(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'warning', metadata })
  }

  async alert(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'alert', metadata })
  }

  async critical(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'critical', metadata })
  }

  /**
   * Query the audit store.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.store.query(filter)
  }
}

/**
 * Log through an optional logger. A store failure is reported on stderr and
 * never reaches the caller, so audit trouble cannot change the outcome of
 * the operation being audited.
 */
export async function logQuietly(
  logger: AuditLogger | undefined,
  options: AuditOptions
): Promise<void> {
  if (!logger) return

  try {
    await logger.log(options)
  } catch (error) {
    console.error(`Audit write failed (${options.category}/${options.action}):`, error)
  }
}

// Singleton instance
let defaultLogger: AuditLogger | null = null

/**
 * Get the default audit logger instance.
 */
export function getAuditLogger(): AuditLogger {
  if (!defaultLogger) {
    defaultLogger = new AuditLogger()
  }
  return defaultLogger
}

/**
 * Reset the default logger (for testing).
 */
export function resetAuditLogger(): void {
  defaultLogger = null
}
