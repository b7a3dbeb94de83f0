/**
 * Review records
 *
 * A review is either authored on the platform (has a user_id) or imported from the
 * legacy export (no user_id, only the reviewer's original username). The two shapes
 * are distinguished by user_id alone.
 */

interface ReviewFields {
  review_id: string
  movie_id: string
  rating: number
  review_text: string
  review_date: string
}

export interface AuthoredReview extends ReviewFields {
  user_id: string
  imdb_username: null
}

export interface LegacyReview extends ReviewFields {
  user_id: null
  imdb_username: string
}

export type Review = AuthoredReview | LegacyReview

export type ReviewOperation = 'create' | 'update' | 'delete'

/** One replayable row of the operation log. Delete rows only need the id. */
export type ReviewLogEntry =
  | { operation: 'create' | 'update'; review: AuthoredReview }
  | { operation: 'delete'; review_id: string }

export interface CreateReviewInput {
  movie_id: string
  user_id: string
  rating: number
  review_text?: string
  review_date?: string
}

export type ReviewUpdate = Partial<Pick<ReviewFields, 'rating' | 'review_text' | 'review_date'>>

export function isLegacyReview(review: Review): review is LegacyReview {
  return review.user_id === null
}
