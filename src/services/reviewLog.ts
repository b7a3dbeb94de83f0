import fs from 'fs'
import path from 'path'
import { createObjectCsvStringifier, createObjectCsvWriter } from 'csv-writer'
import { z } from 'zod'
import type { AuthoredReview, ReviewLogEntry, ReviewOperation } from '../types/reviews'
import { ReviewLogCorruptionError } from '../utils/errors'
import { readCsvRecords } from '../utils/csv'
import { parseReviewSequence } from './legacyReviewImport'

const LOG_COLUMNS = [
  'operation',
  'review_id',
  'movie_id',
  'user_id',
  'imdb_username',
  'rating',
  'review_text',
  'review_date',
] as const

const LOG_HEADER = LOG_COLUMNS.map((column) => ({ id: column, title: column }))

const ratingCell = z
  .string()
  .trim()
  .min(1, 'rating is empty')
  .pipe(z.coerce.number().finite())

const upsertRowSchema = z.object({
  operation: z.enum(['create', 'update']),
  review_id: z.string().min(1, 'review_id is empty'),
  movie_id: z.string().min(1, 'movie_id is empty'),
  user_id: z.string().min(1, 'user_id is empty'),
  rating: ratingCell,
  review_text: z.string().default(''),
  review_date: z.string().default(''),
})

const deleteRowSchema = z.object({
  operation: z.literal('delete'),
  review_id: z.string().min(1, 'review_id is empty'),
})

const logRowSchema = z.discriminatedUnion('operation', [upsertRowSchema, deleteRowSchema])

const metadataSchema = z.object({
  next_review_number: z.number().int().min(1),
  compacted_at: z.string(),
})

export type ReviewLogMetadata = z.infer<typeof metadataSchema>

export interface ReplayResult {
  reviews: Map<string, AuthoredReview>
  /** Highest `review_NNNNNN` number referenced by any entry, deleted ones included */
  maxSequence: number
}

/**
 * Apply log entries in order. Creates and updates carry the full record and upsert it;
 * deletes remove it. Last writer wins per review id.
 */
export function replayEntries(entries: readonly ReviewLogEntry[]): ReplayResult {
  const reviews = new Map<string, AuthoredReview>()
  let maxSequence = 0

  for (const entry of entries) {
    const reviewId = entry.operation === 'delete' ? entry.review_id : entry.review.review_id
    const sequence = parseReviewSequence(reviewId)
    if (sequence !== null && sequence > maxSequence) maxSequence = sequence

    if (entry.operation === 'delete') {
      reviews.delete(entry.review_id)
    } else {
      reviews.set(reviewId, { ...entry.review })
    }
  }

  return { reviews, maxSequence }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Append-only CSV log of review mutations, plus a small JSON sidecar that records the
 * id counter at the last compaction.
 *
 * The log only ever holds authored reviews; legacy reviews come from the import.
 */
export class ReviewLog {
  readonly filePath: string
  readonly metadataPath: string

  constructor(filePath: string) {
    this.filePath = filePath
    this.metadataPath = `${filePath}.meta.json`
  }

  /** Create the log with its header row if it is missing or empty. */
  async ensureExists(): Promise<void> {
    const stat = await fs.promises.stat(this.filePath).catch((error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') return null
      throw error
    })
    if (stat && stat.size > 0) return

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true })
    await this.writeRows(this.filePath, [])
    console.log(`🗒️  Created review log at ${this.filePath}`)
  }

  async append(operation: ReviewOperation, review: AuthoredReview): Promise<void> {
    await this.appendMany(operation, [review])
  }

  /** Append one row per review in a single write. */
  async appendMany(operation: ReviewOperation, reviews: readonly AuthoredReview[]): Promise<void> {
    if (reviews.length === 0) return
    const writer = createObjectCsvWriter({ path: this.filePath, header: LOG_HEADER, append: true })
    await writer.writeRecords(reviews.map((review) => ({ operation, ...review })))
  }

  /**
   * Parse every row. A row that cannot be replayed aborts the read: skipping it would
   * silently lose whatever it recorded.
   */
  async readEntries(): Promise<ReviewLogEntry[]> {
    let rows: Record<string, string>[]
    try {
      rows = await readCsvRecords(this.filePath)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ReviewLogCorruptionError(this.filePath, null, reason)
    }

    return rows.map((row, index): ReviewLogEntry => {
      const parsed = logRowSchema.safeParse(row)
      if (!parsed.success) {
        throw new ReviewLogCorruptionError(this.filePath, index + 1, describeIssues(parsed.error))
      }

      const entry = parsed.data
      if (entry.operation === 'delete') {
        return { operation: 'delete', review_id: entry.review_id }
      }
      return {
        operation: entry.operation,
        review: {
          review_id: entry.review_id,
          movie_id: entry.movie_id,
          user_id: entry.user_id,
          imdb_username: null,
          rating: entry.rating,
          review_text: entry.review_text,
          review_date: entry.review_date,
        },
      }
    })
  }

  /**
   * Replace the log with one `create` row per review. Writes a temp file first and
   * renames it over the log, so a failed write leaves the previous log in place.
   */
  async rewrite(reviews: Iterable<AuthoredReview>): Promise<void> {
    const tempPath = `${this.filePath}.tmp`
    const rows = Array.from(reviews, (review) => ({ operation: 'create' as const, ...review }))
    await this.writeRows(tempPath, rows)
    await fs.promises.rename(tempPath, this.filePath)
  }

  async readMetadata(): Promise<ReviewLogMetadata | null> {
    let raw: string
    try {
      raw = await fs.promises.readFile(this.metadataPath, 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ReviewLogCorruptionError(this.metadataPath, null, reason)
    }

    const parsed = metadataSchema.safeParse(json)
    if (!parsed.success) {
      throw new ReviewLogCorruptionError(this.metadataPath, null, describeIssues(parsed.error))
    }
    return parsed.data
  }

  async writeMetadata(metadata: ReviewLogMetadata): Promise<void> {
    const tempPath = `${this.metadataPath}.tmp`
    await fs.promises.writeFile(tempPath, JSON.stringify(metadata, null, 2) + '\n', 'utf-8')
    await fs.promises.rename(tempPath, this.metadataPath)
  }

  private async writeRows(filePath: string, rows: Array<{ operation: ReviewOperation } & AuthoredReview>): Promise<void> {
    const stringifier = createObjectCsvStringifier({ header: LOG_HEADER })
    const body = rows.length > 0 ? stringifier.stringifyRecords(rows) : ''
    await fs.promises.writeFile(filePath, (stringifier.getHeaderString() ?? '') + body, 'utf-8')
  }
}
