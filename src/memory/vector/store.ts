/**
 * Vector Store
 *
 * SQLite-based message storage with brute-force cosine similarity search.
 * Sufficient for <10k messages.
 */

import Database from 'better-sqlite3'
import { z } from 'zod'
import { ChatHistorySchema, ChatMessageSchema } from '../schema.js'
import type { ChatMessage, VectorSearchResult } from '../types.js'
import { cosineSimilarity } from './embeddings.js'

/**
 * A message as stored, with its embedding.
 */
export interface VectorRecord {
  id: string
  message: ChatMessage
  embedding: number[]
  createdAt: Date
}

/**
 * Vector store interface.
 */
export interface IVectorStore {
  insert(record: VectorRecord): Promise<void>
  replaceAll(records: VectorRecord[]): Promise<void>
  search(
    queryEmbedding: number[],
    limit: number,
    minSimilarity: number
  ): Promise<VectorSearchResult[]>
  all(): Promise<ChatMessage[]>
  clear(): Promise<number>
  count(): Promise<number>
  close(): void
}

const RowSchema = z.object({
  id: z.string(),
  role: z.string(),
  content: z.string(),
  embedding: z.string(),
  metadata: z.string().nullable(),
  created_at: z.string(),
})

type Row = z.infer<typeof RowSchema>

const EmbeddingSchema = z.array(z.number())

/**
 * SQLite-based vector store.
 *
 * Stores embeddings as JSON strings. Rows keep an autoincrement sequence so
 * all() returns messages in insertion order.
 */
export class SqliteVectorStore implements IVectorStore {
  private db: Database.Database
  readonly dimensions: number

  constructor(path: string, dimensions: number = 1536) {
    this.dimensions = dimensions
    this.db = new Database(path)
    this.initSchema()
  }

  /**
   * Initialize database schema.
   */
  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vector_messages (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding TEXT NOT NULL,
        metadata TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_vector_created ON vector_messages(created_at);
    `)
  }

  /**
   * Insert a message record.
   */
  async insert(record: VectorRecord): Promise<void> {
    this.insertSync(record)
  }

  /**
   * Replace every stored record in one transaction.
   */
  async replaceAll(records: VectorRecord[]): Promise<void> {
    const replace = this.db.transaction((toInsert: VectorRecord[]) => {
      this.db.prepare('DELETE FROM vector_messages').run()
      for (const record of toInsert) {
        this.insertSync(record)
      }
    })
    replace(records)
  }

  /**
   * Search for similar messages using brute-force cosine similarity.
   */
  async search(
    queryEmbedding: number[],
    limit: number,
    minSimilarity: number = 0
  ): Promise<VectorSearchResult[]> {
    if (queryEmbedding.length !== this.dimensions) {
      throw new Error(
        `Query embedding has ${queryEmbedding.length} dimensions, store expects ${this.dimensions}`
      )
    }
    if (limit <= 0) return []

    const results: VectorSearchResult[] = []

    for (const row of this.selectRows('SELECT * FROM vector_messages ORDER BY seq ASC')) {
      const embedding = EmbeddingSchema.parse(JSON.parse(row.embedding))
      const similarity = cosineSimilarity(queryEmbedding, embedding)

      if (similarity >= minSimilarity) {
        results.push({ message: this.rowToMessage(row), similarity })
      }
    }

    // Stable sort keeps insertion order among equal scores
    results.sort((a, b) => b.similarity - a.similarity)
    return results.slice(0, limit)
  }

  /**
   * All stored messages in insertion order.
   */
  async all(): Promise<ChatMessage[]> {
    return ChatHistorySchema.parse(
      this.selectRows('SELECT * FROM vector_messages ORDER BY seq ASC').map(rowToFields)
    )
  }

  /**
   * Delete every record.
   *
   * @returns Number of deleted records
   */
  async clear(): Promise<number> {
    return this.db.prepare('DELETE FROM vector_messages').run().changes
  }

  async count(): Promise<number> {
    const row = z
      .object({ count: z.number() })
      .parse(this.db.prepare('SELECT COUNT(*) as count FROM vector_messages').get())
    return row.count
  }

  /**
   * Close database connection.
   */
  close(): void {
    this.db.close()
  }

  private insertSync(record: VectorRecord): void {
    if (record.embedding.length !== this.dimensions) {
      throw new Error(
        `Embedding has ${record.embedding.length} dimensions, store expects ${this.dimensions}`
      )
    }

    this.db
      .prepare(
        `INSERT INTO vector_messages (id, role, content, embedding, metadata, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.id,
        record.message.role,
        record.message.content,
        JSON.stringify(record.embedding),
        record.message.metadata ? JSON.stringify(record.message.metadata) : null,
        record.createdAt.toISOString()
      )
  }

  private selectRows(sql: string): Row[] {
    return z.array(RowSchema).parse(this.db.prepare(sql).all())
  }

  /**
   * Convert database row to ChatMessage.
   */
  private rowToMessage(row: Row): ChatMessage {
    return ChatMessageSchema.parse(rowToFields(row))
  }
}

function rowToFields(row: Row): Record<string, unknown> {
  return {
    role: row.role,
    content: row.content,
    ...(row.metadata !== null ? { metadata: JSON.parse(row.metadata) } : {}),
  }
}
