import fs from 'fs'
import type { LegacyReview } from '../types/reviews'
import { readCsvRecords } from '../utils/csv'

export const REVIEW_TEXT_MAX_LENGTH = 250
export const REVIEW_ID_PREFIX = 'review_'
const REVIEW_ID_DIGITS = 6
const NEUTRAL_RATING = 3

// Column titles of the third-party export
const LEGACY_COLUMNS = {
  movie: 'movie',
  user: 'User',
  rating: "User's Rating out of 10",
  review: 'Review',
  date: 'Date of Review',
} as const

export function formatReviewId(sequence: number): string {
  return `${REVIEW_ID_PREFIX}${String(sequence).padStart(REVIEW_ID_DIGITS, '0')}`
}

/**
 * Numeric part of a `review_NNNNNN` id, or null for ids in any other shape.
 */
export function parseReviewSequence(reviewId: string): number | null {
  if (!reviewId.startsWith(REVIEW_ID_PREFIX)) return null
  const digits = reviewId.slice(REVIEW_ID_PREFIX.length)
  if (!/^\d+$/.test(digits)) return null
  return Number.parseInt(digits, 10)
}

/** Cut to REVIEW_TEXT_MAX_LENGTH code points, never splitting a surrogate pair. */
export function truncateReviewText(text: string | null | undefined): string {
  if (!text) return ''
  if (text.length <= REVIEW_TEXT_MAX_LENGTH) return text
  const codePoints = Array.from(text)
  return codePoints.length > REVIEW_TEXT_MAX_LENGTH ? codePoints.slice(0, REVIEW_TEXT_MAX_LENGTH).join('') : text
}

/**
 * Convert an out-of-10 rating to the platform's 1–5 scale. Halves round up (9 -> 5).
 * Missing or unparsable input yields the neutral rating.
 */
export function normalizeLegacyRating(raw: string | number | null | undefined): number {
  if (raw === null || raw === undefined) return NEUTRAL_RATING
  const text = String(raw).trim()
  if (text === '') return NEUTRAL_RATING
  const value = Number(text)
  if (!Number.isFinite(value)) return NEUTRAL_RATING
  return Math.min(5, Math.max(1, Math.round(value / 2)))
}

/**
 * Read the immutable legacy export and normalize every row.
 * `titleIndex` maps trimmed movie titles to catalog ids; unresolved titles are kept as the movie id.
 */
export async function importLegacyReviews(
  filePath: string,
  titleIndex: ReadonlyMap<string, string>,
): Promise<LegacyReview[]> {
  if (!fs.existsSync(filePath)) {
    console.warn(`⚠️  Legacy review export not found at ${filePath}, starting without imported reviews`)
    return []
  }

  const rows = await readCsvRecords(filePath)
  let unresolved = 0

  const reviews = rows.map((row, index): LegacyReview => {
    const title = (row[LEGACY_COLUMNS.movie] ?? '').trim()
    const movieId = titleIndex.get(title)
    if (movieId === undefined) unresolved++

    return {
      review_id: formatReviewId(index + 1),
      movie_id: movieId ?? (row[LEGACY_COLUMNS.movie] ?? ''),
      user_id: null,
      imdb_username: row[LEGACY_COLUMNS.user] ?? '',
      rating: normalizeLegacyRating(row[LEGACY_COLUMNS.rating]),
      review_text: truncateReviewText(row[LEGACY_COLUMNS.review]),
      review_date: row[LEGACY_COLUMNS.date] ?? '',
    }
  })

  console.log(`📥 Imported ${reviews.length} legacy reviews from ${filePath}`)
  if (unresolved > 0) {
    console.warn(`⚠️  ${unresolved} legacy reviews reference movie titles missing from the catalog`)
  }
  return reviews
}
