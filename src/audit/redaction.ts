import type { AuditEntry } from './schema.js'

/**
 * Fields that must never appear in audit logs.
 *
 * Paths are relative to the AuditEntry root object.
 */
const NEVER_LOG_FIELDS = [
  'metadata.message.content', // Chat message text
  'metadata.memory.content', // Stored memory content
  'metadata.messages', // Whole histories
]

/**
 * Maximum length for error messages in audit logs.
 */
export const MAX_ERROR_MESSAGE_LENGTH = 500

/**
 * Sanitize an audit entry by removing NEVER_LOG fields and truncating
 * error messages.
 *
 * Every entry passes through here before it is written.
 */
export function sanitizeAuditEntry(entry: AuditEntry): AuditEntry {
  const sanitized = structuredClone(entry)

  if (sanitized.metadata) {
    for (const field of NEVER_LOG_FIELDS) {
      deletePath(sanitized.metadata, field.replace(/^metadata\./, ''))
    }

    if (sanitized.metadata.errorMessage !== undefined) {
      sanitized.metadata.errorMessage = sanitizeErrorMessage(
        String(sanitized.metadata.errorMessage)
      )
    }
  }

  return sanitized
}

/**
 * Collapse whitespace and truncate an error message.
 */
export function sanitizeErrorMessage(msg: string): string {
  return msg.replace(/\s+/g, ' ').trim().slice(0, MAX_ERROR_MESSAGE_LENGTH)
}

/**
 * Delete a value at a dot-separated path in an object.
 */
function deletePath(obj: Record<string, unknown>, path: string): void {
  const parts = path.split('.')
  let current = obj

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]]
    if (!isRecord(next)) {
      return
    }
    current = next
  }

  delete current[parts[parts.length - 1]]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
