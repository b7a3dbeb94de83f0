import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  formatReviewId,
  importLegacyReviews,
  normalizeLegacyRating,
  parseReviewSequence,
  truncateReviewText,
} from '../src/services/legacyReviewImport'
import { LEGACY_HEADER, makeTempDir, removeTempDir, writeLines } from './helpers/tempFiles'

describe('normalizeLegacyRating', () => {
  it('halves and rounds an out-of-10 rating', () => {
    expect(normalizeLegacyRating('10')).toBe(5)
    expect(normalizeLegacyRating('7')).toBe(4)
    expect(normalizeLegacyRating('4')).toBe(2)
    expect(normalizeLegacyRating(' 8 ')).toBe(4)
  })

  it('rounds halves up', () => {
    expect(normalizeLegacyRating('9')).toBe(5)
    expect(normalizeLegacyRating('5')).toBe(3)
    expect(normalizeLegacyRating('3')).toBe(2)
    expect(normalizeLegacyRating('1')).toBe(1)
  })

  it('clamps to the 1-5 scale', () => {
    expect(normalizeLegacyRating('0')).toBe(1)
    expect(normalizeLegacyRating('1')).toBe(1)
    expect(normalizeLegacyRating('14')).toBe(5)
  })

  it('uses the neutral rating for missing or unparsable values', () => {
    expect(normalizeLegacyRating('')).toBe(3)
    expect(normalizeLegacyRating(undefined)).toBe(3)
    expect(normalizeLegacyRating(null)).toBe(3)
    expect(normalizeLegacyRating('n/a')).toBe(3)
  })
})

describe('review ids', () => {
  it('zero-pads to six digits', () => {
    expect(formatReviewId(1)).toBe('review_000001')
    expect(formatReviewId(1234)).toBe('review_001234')
  })

  it('parses the numeric part back', () => {
    expect(parseReviewSequence('review_000042')).toBe(42)
    expect(parseReviewSequence('review_abc')).toBeNull()
    expect(parseReviewSequence('rev_000001')).toBeNull()
  })
})

describe('truncateReviewText', () => {
  it('keeps at most 250 characters', () => {
    expect(truncateReviewText('x'.repeat(300))).toHaveLength(250)
    expect(truncateReviewText('short')).toBe('short')
    expect(truncateReviewText(undefined)).toBe('')
  })

  it('counts characters, not UTF-16 units', () => {
    const text = 'a'.repeat(249) + '😀' + 'b'.repeat(50)
    expect(truncateReviewText(text)).toBe('a'.repeat(249) + '😀')
    expect(truncateReviewText('😀'.repeat(200))).toBe('😀'.repeat(200))
  })
})

describe('importLegacyReviews', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
  })

  afterEach(() => {
    removeTempDir(dir)
  })

  it('normalizes each row and numbers them in file order', async () => {
    const filePath = path.join(dir, 'legacy.csv')
    writeLines(filePath, [
      LEGACY_HEADER,
      'Inception,film_fan,9,Loved it,2019-05-01',
      'Unknown Film,critic42,abc,Meh,2020-01-01',
      ' Inception ,quiet_viewer,,,',
      'Inception,low_scorer,1,"Bad, really",2018-03-03',
    ])

    const reviews = await importLegacyReviews(filePath, new Map([['Inception', 'movie_001']]))

    expect(reviews).toEqual([
      {
        review_id: 'review_000001',
        movie_id: 'movie_001',
        user_id: null,
        imdb_username: 'film_fan',
        rating: 5,
        review_text: 'Loved it',
        review_date: '2019-05-01',
      },
      {
        review_id: 'review_000002',
        movie_id: 'Unknown Film',
        user_id: null,
        imdb_username: 'critic42',
        rating: 3,
        review_text: 'Meh',
        review_date: '2020-01-01',
      },
      {
        review_id: 'review_000003',
        movie_id: 'movie_001',
        user_id: null,
        imdb_username: 'quiet_viewer',
        rating: 3,
        review_text: '',
        review_date: '',
      },
      {
        review_id: 'review_000004',
        movie_id: 'movie_001',
        user_id: null,
        imdb_username: 'low_scorer',
        rating: 1,
        review_text: 'Bad, really',
        review_date: '2018-03-03',
      },
    ])
  })

  it('truncates long review text', async () => {
    const filePath = path.join(dir, 'legacy.csv')
    writeLines(filePath, [LEGACY_HEADER, `Inception,verbose,6,${'y'.repeat(400)},2021-01-01`])

    const [review] = await importLegacyReviews(filePath, new Map())
    expect(review.review_text).toBe('y'.repeat(250))
  })

  it('returns nothing when the export is missing', async () => {
    await expect(importLegacyReviews(path.join(dir, 'missing.csv'), new Map())).resolves.toEqual([])
  })
})
