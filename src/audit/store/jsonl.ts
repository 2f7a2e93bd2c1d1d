import { mkdir, appendFile, readFile, readdir } from 'fs/promises'
import path from 'path'
import type { AuditEntry } from '../schema.js'
import { AuditEntrySchema } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import type { AuditStore, AuditFilter } from './interface.js'

const FILE_PATTERN = /^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/

/**
 * JSONL-based audit store with daily file rotation.
 *
 * File naming: audit-YYYY-MM-DD.jsonl (local date of the entry)
 */
export class JsonlAuditStore implements AuditStore {
  private readonly baseDir: string
  private initialized = false

  constructor(baseDir: string) {
    this.baseDir = baseDir
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return
    await mkdir(this.baseDir, { recursive: true })
    this.initialized = true
  }

  /**
   * Get the filename for a given date.
   */
  static filenameFor(date: Date): string {
    const yyyy = date.getFullYear()
    const mm = String(date.getMonth() + 1).padStart(2, '0')
    const dd = String(date.getDate()).padStart(2, '0')
    return `audit-${yyyy}-${mm}-${dd}.jsonl`
  }

  async append(entry: AuditEntry): Promise<void> {
    await this.ensureDir()

    const sanitized = sanitizeAuditEntry(entry)
    const filePath = path.join(this.baseDir, JsonlAuditStore.filenameFor(sanitized.timestamp))

    await appendFile(filePath, JSON.stringify(sanitized) + '\n', 'utf-8')
  }

  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const results: AuditEntry[] = []

    for (const file of await this.listFiles(filter)) {
      for (const entry of await this.readEntries(file)) {
        if (!this.matchesFilter(entry, filter)) continue
        results.push(entry)
        if (filter.limit !== undefined && results.length >= filter.limit) {
          return results
        }
      }
    }

    return results
  }

  /**
   * Audit files newest first, skipping days entirely outside the filter range.
   */
  private async listFiles(filter: AuditFilter): Promise<string[]> {
    let files: string[]
    try {
      files = await readdir(this.baseDir)
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }

    const since = filter.since ? JsonlAuditStore.filenameFor(filter.since) : undefined
    const until = filter.until ? JsonlAuditStore.filenameFor(filter.until) : undefined

    // Filenames sort chronologically
    return files
      .filter((f) => FILE_PATTERN.test(f))
      .filter((f) => (since === undefined || f >= since) && (until === undefined || f <= until))
      .sort()
      .reverse()
  }

  /**
   * Read and parse entries from a file. Malformed lines are skipped.
   */
  private async readEntries(filename: string): Promise<AuditEntry[]> {
    const content = await readFile(path.join(this.baseDir, filename), 'utf-8')
    const entries: AuditEntry[] = []

    for (const line of content.split('\n')) {
      if (!line.trim()) continue

      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        continue
      }

      const result = AuditEntrySchema.safeParse(parsed)
      if (result.success) {
        entries.push(result.data)
      }
    }

    return entries
  }

  private matchesFilter(entry: AuditEntry, filter: AuditFilter): boolean {
    if (filter.since && entry.timestamp < filter.since) return false
    if (filter.until && entry.timestamp > filter.until) return false
    if (filter.category && entry.category !== filter.category) return false
    if (filter.action && entry.action !== filter.action) return false
    if (filter.severity && entry.severity !== filter.severity) return false
    return true
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
