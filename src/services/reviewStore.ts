import {
  type AuthoredReview,
  type CreateReviewInput,
  type LegacyReview,
  type Review,
  type ReviewUpdate,
  isLegacyReview,
} from '../types/reviews'
import { DuplicateReviewError, ReviewNotFoundError } from '../utils/errors'
import {
  formatReviewId,
  importLegacyReviews,
  parseReviewSequence,
  truncateReviewText,
} from './legacyReviewImport'
import { ReviewLog, replayEntries } from './reviewLog'

export const DEFAULT_COMPACTION_THRESHOLD = 100

export interface ReviewStoreOptions {
  legacyPath: string
  logPath: string
  /** Mutations between automatic compactions, and the log size that triggers one at startup */
  compactionThreshold?: number
  /** Trimmed movie title -> movie id, used to resolve legacy rows */
  titleIndex?: ReadonlyMap<string, string>
}

export interface ListOptions {
  offset?: number
  limit?: number
}

type StoreState = 'new' | 'ready' | 'closed'

function addToIndex(index: Map<string, Set<string>>, key: string, reviewId: string): void {
  let ids = index.get(key)
  if (!ids) {
    ids = new Set()
    index.set(key, ids)
  }
  ids.add(reviewId)
}

function removeFromIndex(index: Map<string, Set<string>>, key: string, reviewId: string): void {
  const ids = index.get(key)
  if (!ids) return
  ids.delete(reviewId)
  if (ids.size === 0) index.delete(key)
}

/**
 * In-memory view of every review, rebuilt at startup from the legacy export and the
 * operation log.
 *
 * Mutations run one at a time through a promise-chain lock and write to the log before
 * touching memory, so a failed append leaves both unchanged. Reads are served straight
 * from memory and always return copies.
 */
export class ReviewStore {
  private readonly reviews = new Map<string, Review>()
  private readonly reviewsByMovie = new Map<string, Set<string>>()
  private readonly reviewsByUser = new Map<string, Set<string>>()
  private readonly log: ReviewLog
  private readonly legacyPath: string
  private readonly compactionThreshold: number
  private readonly titleIndex: ReadonlyMap<string, string>

  private state: StoreState = 'new'
  private nextSequence = 1
  private logEntries = 0
  private mutationsSinceCompaction = 0
  private queue: Promise<void> = Promise.resolve()

  constructor(options: ReviewStoreOptions) {
    const threshold = options.compactionThreshold ?? DEFAULT_COMPACTION_THRESHOLD
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new RangeError(`compactionThreshold must be a positive integer, got ${threshold}`)
    }
    this.log = new ReviewLog(options.logPath)
    this.legacyPath = options.legacyPath
    this.compactionThreshold = threshold
    this.titleIndex = options.titleIndex ?? new Map()
  }

  /** Number of reviews currently held, legacy included. */
  get size(): number {
    return this.reviews.size
  }

  /** Rows in the operation log as of the last write or compaction. */
  get logEntryCount(): number {
    return this.logEntries
  }

  async init(): Promise<void> {
    if (this.state !== 'new') {
      throw new Error('ReviewStore.init() may only be called once')
    }

    const legacy = await importLegacyReviews(this.legacyPath, this.titleIndex)
    let highestSequence = 0
    for (const review of legacy) {
      this.insert(review)
      highestSequence = Math.max(highestSequence, parseReviewSequence(review.review_id) ?? 0)
    }

    await this.log.ensureExists()
    const entries = await this.log.readEntries()
    const replayed = replayEntries(entries)
    for (const review of replayed.reviews.values()) {
      this.insert(review)
    }

    const metadata = await this.log.readMetadata()
    this.nextSequence = Math.max(
      metadata?.next_review_number ?? 1,
      highestSequence + 1,
      replayed.maxSequence + 1,
    )
    this.logEntries = entries.length
    this.state = 'ready'

    console.log(
      `✅ Review store ready: ${legacy.length} legacy + ${replayed.reviews.size} platform reviews (${entries.length} log entries replayed)`,
    )

    if (entries.length > this.compactionThreshold) {
      console.log(`🔄 Review log has ${entries.length} entries, compacting on startup`)
      await this.compact()
    }
  }

  /** Wait for queued mutations to finish; later mutations are rejected. */
  async close(): Promise<void> {
    if (this.state === 'closed') return
    const drained = this.queue.then(() => {
      this.state = 'closed'
    })
    this.queue = drained
    await drained
    console.log('📦 Review store closed')
  }

  get(reviewId: string): Review {
    const review = this.reviews.get(reviewId)
    if (!review) throw new ReviewNotFoundError(reviewId)
    return { ...review }
  }

  getByMovie(movieId: string): Review[] {
    return this.collect(this.reviewsByMovie.get(movieId))
  }

  getByUser(userId: string): AuthoredReview[] {
    const reviews: AuthoredReview[] = []
    for (const review of this.collect(this.reviewsByUser.get(userId))) {
      if (!isLegacyReview(review)) reviews.push(review)
    }
    return reviews
  }

  list({ offset = 0, limit = this.reviews.size }: ListOptions = {}): Review[] {
    const page: Review[] = []
    let index = 0
    for (const review of this.reviews.values()) {
      if (page.length >= limit) break
      if (index++ >= offset) page.push({ ...review })
    }
    return page
  }

  create(input: CreateReviewInput): Promise<AuthoredReview> {
    return this.exclusive(async () => {
      for (const reviewId of this.reviewsByUser.get(input.user_id) ?? []) {
        const existing = this.reviews.get(reviewId)
        if (existing && existing.movie_id === input.movie_id) {
          throw new DuplicateReviewError(input.user_id, input.movie_id, reviewId)
        }
      }

      const review: AuthoredReview = {
        review_id: formatReviewId(this.nextSequence),
        movie_id: input.movie_id,
        user_id: input.user_id,
        imdb_username: null,
        rating: input.rating,
        review_text: truncateReviewText(input.review_text),
        review_date: input.review_date || new Date().toISOString(),
      }

      await this.log.append('create', review)
      this.nextSequence++
      this.logEntries++
      this.insert(review)
      console.log(`✅ Created review ${review.review_id} for movie ${review.movie_id} by ${review.user_id}`)

      await this.afterMutation(1)
      return { ...review }
    })
  }

  /**
   * Apply the given fields. Ownership is the caller's concern. Legacy reviews are not
   * part of the log, so changes to them only live until the next restart.
   */
  update(reviewId: string, fields: ReviewUpdate): Promise<Review> {
    return this.exclusive(async () => {
      const existing = this.reviews.get(reviewId)
      if (!existing) throw new ReviewNotFoundError(reviewId)

      const changes: ReviewUpdate = {}
      if (fields.rating !== undefined) changes.rating = fields.rating
      if (fields.review_text !== undefined) changes.review_text = truncateReviewText(fields.review_text)
      if (fields.review_date !== undefined) changes.review_date = fields.review_date

      if (isLegacyReview(existing)) {
        const updated: LegacyReview = { ...existing, ...changes }
        this.reviews.set(reviewId, updated)
        console.warn(`⚠️  Legacy review ${reviewId} changed in memory only`)
        return { ...updated }
      }

      const updated: AuthoredReview = { ...existing, ...changes }
      await this.log.append('update', updated)
      this.logEntries++
      this.reviews.set(reviewId, updated)
      console.log(`✅ Updated review ${reviewId}`)

      await this.afterMutation(1)
      return { ...updated }
    })
  }

  delete(reviewId: string): Promise<void> {
    return this.exclusive(async () => {
      const existing = this.reviews.get(reviewId)
      if (!existing) throw new ReviewNotFoundError(reviewId)

      if (isLegacyReview(existing)) {
        this.remove(existing)
        console.warn(`⚠️  Legacy review ${reviewId} removed in memory only`)
        return
      }

      await this.log.append('delete', existing)
      this.logEntries++
      this.remove(existing)
      console.log(`🗑️  Deleted review ${reviewId}`)

      await this.afterMutation(1)
    })
  }

  /** Delete every platform review of a movie. Legacy reviews are kept. */
  deleteByMovie(movieId: string): Promise<number> {
    return this.exclusive(() => this.deleteAuthored(this.reviewsByMovie.get(movieId), `movie ${movieId}`))
  }

  /** Delete every review written by a user, for account removal. */
  deleteByUser(userId: string): Promise<number> {
    return this.exclusive(() => this.deleteAuthored(this.reviewsByUser.get(userId), `user ${userId}`))
  }

  /** Rewrite the log as one `create` row per live platform review; returns rows discarded. */
  compact(): Promise<number> {
    return this.exclusive(() => this.compactLog())
  }

  private async deleteAuthored(ids: Set<string> | undefined, label: string): Promise<number> {
    const targets: AuthoredReview[] = []
    for (const review of this.collect(ids)) {
      if (!isLegacyReview(review)) targets.push(review)
    }

    if (targets.length === 0) return 0

    // Every delete row is written before memory changes, so a failure deletes nothing
    await this.log.appendMany('delete', targets)
    this.logEntries += targets.length
    for (const review of targets) this.remove(review)

    console.log(`🗑️  Deleted ${targets.length} reviews for ${label}`)
    await this.afterMutation(targets.length)
    return targets.length
  }

  private async compactLog(): Promise<number> {
    const live: AuthoredReview[] = []
    for (const review of this.reviews.values()) {
      if (!isLegacyReview(review)) live.push(review)
    }

    // The counter goes first: once history is gone it is the only record of deleted ids
    await this.log.writeMetadata({
      next_review_number: this.nextSequence,
      compacted_at: new Date().toISOString(),
    })
    await this.log.rewrite(live)

    const discarded = Math.max(0, this.logEntries - live.length)
    this.logEntries = live.length
    this.mutationsSinceCompaction = 0
    console.log(`🧹 Compacted review log: kept ${live.length} entries, discarded ${discarded}`)
    return discarded
  }

  /**
   * The mutation itself is already durable here, so a failed compaction is reported
   * and retried on the next mutation instead of failing the caller.
   */
  private async afterMutation(count: number): Promise<void> {
    this.mutationsSinceCompaction += count
    if (this.mutationsSinceCompaction < this.compactionThreshold) return

    try {
      await this.compactLog()
    } catch (error) {
      console.error('❌ Automatic review log compaction failed, will retry after the next mutation:', error)
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(() => {
      this.assertReady()
      return task()
    })
    // Failures reach the caller through `run`; the queue itself must keep going
    this.queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private assertReady(): void {
    if (this.state === 'new') throw new Error('ReviewStore has not been initialized')
    if (this.state === 'closed') throw new Error('ReviewStore is closed')
  }

  private collect(ids: Set<string> | undefined): Review[] {
    const reviews: Review[] = []
    for (const id of ids ?? []) {
      const review = this.reviews.get(id)
      if (review) reviews.push({ ...review })
    }
    return reviews
  }

  private insert(review: Review): void {
    const previous = this.reviews.get(review.review_id)
    if (previous) this.remove(previous)

    this.reviews.set(review.review_id, review)
    addToIndex(this.reviewsByMovie, review.movie_id, review.review_id)
    if (review.user_id !== null) {
      addToIndex(this.reviewsByUser, review.user_id, review.review_id)
    }
  }

  private remove(review: Review): void {
    this.reviews.delete(review.review_id)
    removeFromIndex(this.reviewsByMovie, review.movie_id, review.review_id)
    if (review.user_id !== null) {
      removeFromIndex(this.reviewsByUser, review.user_id, review.review_id)
    }
  }
}
