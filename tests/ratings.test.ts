import { describe, expect, it } from 'vitest'
import { averageRating, summarizeRatings } from '../src/services/ratings'
import type { Review } from '../src/types/reviews'

function storeWith(ratings: number[]) {
  const reviews: Review[] = ratings.map((rating, index) => ({
    review_id: `review_${index}`,
    movie_id: 'm1',
    user_id: `u${index}`,
    imdb_username: null,
    rating,
    review_text: '',
    review_date: '',
  }))
  return { getByMovie: (movieId: string) => (movieId === 'm1' ? reviews : []) }
}

describe('averageRating', () => {
  it('is null for a movie without reviews', () => {
    expect(averageRating(storeWith([]), 'm1')).toBeNull()
  })

  it('averages every rating', () => {
    expect(averageRating(storeWith([5, 3, 4]), 'm1')).toBe(4)
    expect(averageRating(storeWith([4, 5]), 'm1')).toBe(4.5)
  })

  it('rounds to two decimals', () => {
    expect(averageRating(storeWith([1, 2, 2]), 'm1')).toBe(1.67)
  })
})

describe('summarizeRatings', () => {
  it('reports the review count with the average', () => {
    expect(summarizeRatings(storeWith([2, 3]), 'm1')).toEqual({ movie_id: 'm1', average_rating: 2.5, review_count: 2 })
    expect(summarizeRatings(storeWith([2, 3]), 'm9')).toEqual({ movie_id: 'm9', average_rating: null, review_count: 0 })
  })
})
