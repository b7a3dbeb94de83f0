import type { ReviewStore } from './reviewStore'

export interface RatingSummary {
  movie_id: string
  average_rating: number | null
  review_count: number
}

type MovieReviewSource = Pick<ReviewStore, 'getByMovie'>

/**
 * Mean rating over every review of the movie, rounded to two decimals.
 * Always computed over all reviews, whoever is asking. Null when there are none.
 */
export function averageRating(store: MovieReviewSource, movieId: string): number | null {
  return summarizeRatings(store, movieId).average_rating
}

export function summarizeRatings(store: MovieReviewSource, movieId: string): RatingSummary {
  const reviews = store.getByMovie(movieId)
  if (reviews.length === 0) {
    return { movie_id: movieId, average_rating: null, review_count: 0 }
  }

  const total = reviews.reduce((sum, review) => sum + review.rating, 0)
  return {
    movie_id: movieId,
    average_rating: Math.round((total / reviews.length) * 100) / 100,
    review_count: reviews.length,
  }
}
