import { z } from 'zod'
import { MESSAGE_ROLES } from './types.js'

/**
 * Chat message schema.
 *
 * Used wherever messages cross a serialization boundary (SQLite rows,
 * JSON transcripts) so a malformed row fails loudly instead of producing
 * an untyped message.
 */
export const ChatMessageSchema = z.object({
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  metadata: z.record(z.unknown()).optional(),
})

export const ChatHistorySchema = z.array(ChatMessageSchema)
