import { z } from 'zod'
import { AUDIT_SEVERITIES } from './types.js'

/**
 * Audit entry schema with coerced date for JSON serialization.
 *
 * z.coerce.date() turns the ISO string written to JSONL back into a Date.
 */
export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  category: z.enum(['memory', 'source', 'config']),
  action: z.string(),
  severity: z.enum(AUDIT_SEVERITIES),
  sessionId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
})

/**
 * Audit entry type.
 */
export type AuditEntry = z.infer<typeof AuditEntrySchema>
