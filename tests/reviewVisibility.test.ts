import { beforeEach, describe, expect, it } from 'vitest'
import { buildVisibilityContext, filterVisibleReviews } from '../src/services/reviewVisibility'
import type { AuthoredReview, LegacyReview, Review } from '../src/types/reviews'
import { InMemoryUserDirectory } from './helpers/fakes'

function authored(reviewId: string, userId: string, rating: number): AuthoredReview {
  return {
    review_id: reviewId,
    movie_id: 'm1',
    user_id: userId,
    imdb_username: null,
    rating,
    review_text: '',
    review_date: '2024-01-01',
  }
}

const legacy: LegacyReview = {
  review_id: 'review_000003',
  movie_id: 'm1',
  user_id: null,
  imdb_username: 'old_fan',
  rating: 4,
  review_text: '',
  review_date: '2010-01-01',
}

const reviews: Review[] = [authored('review_000001', 'u1', 5), authored('review_000002', 'u2', 2), legacy]

function ids(list: Review[]): string[] {
  return list.map((review) => review.review_id)
}

describe('filterVisibleReviews', () => {
  it('hides suspended authors from anonymous viewers', () => {
    const visible = filterVisibleReviews(reviews, {
      viewerId: null,
      suspendedAuthors: new Set(['u2']),
      blockedAuthors: new Set(['u1']),
    })
    expect(ids(visible)).toEqual(['review_000001', 'review_000003'])
  })

  it('also hides blocked authors from a signed-in viewer', () => {
    const visible = filterVisibleReviews(reviews, {
      viewerId: 'u3',
      suspendedAuthors: new Set(['u2']),
      blockedAuthors: new Set(['u1']),
    })
    expect(ids(visible)).toEqual(['review_000003'])
  })

  it('always keeps legacy reviews', () => {
    expect(filterVisibleReviews([legacy], { viewerId: 'u3', suspendedAuthors: new Set(), blockedAuthors: new Set() })).toEqual([
      legacy,
    ])
  })
})

describe('buildVisibilityContext', () => {
  let directory: InMemoryUserDirectory

  beforeEach(() => {
    directory = new InMemoryUserDirectory()
    directory.addUser('u1')
    directory.addUser('u2', { is_suspended: true })
    directory.addUser('u3')
  })

  it('collects suspended authors for anonymous viewers', async () => {
    const context = await buildVisibilityContext(directory, reviews, null)
    expect(context).toEqual({ viewerId: null, suspendedAuthors: new Set(['u2']), blockedAuthors: new Set() })
  })

  it('hides an author the viewer blocked', async () => {
    await directory.blockUser('u3', 'u1')
    const context = await buildVisibilityContext(directory, reviews, 'u3')
    expect(ids(filterVisibleReviews(reviews, context))).toEqual(['review_000003'])
  })

  it('hides an author who blocked the viewer, even if only one side recorded it', async () => {
    directory.addUser('u1', { blocked_users: ['u3'] })
    const context = await buildVisibilityContext(directory, reviews, 'u3')
    expect(context.blockedAuthors).toEqual(new Set(['u1']))
  })

  it('treats authors missing from the directory as active', async () => {
    const context = await buildVisibilityContext(directory, [authored('review_000009', 'ghost', 3)], 'u3')
    expect(context.suspendedAuthors.size).toBe(0)
    expect(context.blockedAuthors.size).toBe(0)
  })
})
