import { z } from 'zod'
import {
  DEFAULT_INTRO_HISTORY_MESSAGE,
  DEFAULT_OUTRO_HISTORY_MESSAGE,
  DEFAULT_SYSTEM_MESSAGE,
} from '../memory/composable/templates.js'
import { AUDIT_SEVERITIES } from '../audit/types.js'

// Primary chat buffer
export const BufferConfigSchema = z.object({
  maxMessages: z.number().int().positive().optional(),
})

// Secondary vector memory
export const VectorConfigSchema = z.object({
  enabled: z.boolean().default(false),
  storePath: z.string().min(1).optional(), // defaults to CMEM_HOME/memory.db
  embeddingModel: z.string().min(1).default('mock'),
  dimensions: z.number().int().positive().default(1536),
  topK: z.number().int().positive().default(2),
  minSimilarity: z.number().default(0),
})

// Memory sources
export const MemoryConfigSchema = z.object({
  buffer: BufferConfigSchema.default({}),
  vector: VectorConfigSchema.default({}),
})

// Injected history text
export const CompositionConfigSchema = z.object({
  introMessage: z.string().min(1).default(DEFAULT_INTRO_HISTORY_MESSAGE),
  outroMessage: z.string().default(DEFAULT_OUTRO_HISTORY_MESSAGE),
  defaultSystemMessage: z.string().default(DEFAULT_SYSTEM_MESSAGE),
})

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(AUDIT_SEVERITIES).default('info'),
  audit: z
    .object({
      enabled: z.boolean().default(true),
      path: z.string().min(1).optional(), // defaults to CMEM_HOME/logs/audit
    })
    .default({}),
})

// Full application configuration
export const AppConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  memory: MemoryConfigSchema.default({}),
  composition: CompositionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type BufferConfig = z.infer<typeof BufferConfigSchema>
export type VectorConfig = z.infer<typeof VectorConfigSchema>
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>
export type CompositionConfig = z.infer<typeof CompositionConfigSchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
