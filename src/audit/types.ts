/**
 * Audit event categories.
 */
export type AuditCategory =
  | 'memory' // Composition, fan-out writes, resets
  | 'source' // Individual memory source failures
  | 'config' // Config loading

/**
 * Audit event severity levels, lowest first.
 */
export const AUDIT_SEVERITIES = ['debug', 'info', 'warning', 'alert', 'critical'] as const

export type AuditSeverity = (typeof AUDIT_SEVERITIES)[number]

// NOTE: AuditEntry is defined in schema.ts and re-exported from index.ts
