// Schema and types
export { AuditEntrySchema, type AuditEntry } from './schema.js'
export { AUDIT_SEVERITIES, type AuditCategory, type AuditSeverity } from './types.js'

// Redaction
export { sanitizeAuditEntry, sanitizeErrorMessage, MAX_ERROR_MESSAGE_LENGTH } from './redaction.js'

// Store
export type { AuditStore, AuditFilter } from './store/interface.js'
export { JsonlAuditStore } from './store/jsonl.js'

// Service
export {
  AuditLogger,
  getAuditLogger,
  resetAuditLogger,
  logQuietly,
  type AuditOptions,
  type AuditLoggerOptions,
} from './service.js'
