import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import { getAuthUserId, getRequiredUserId, requireAdmin, requireAuth } from '../middleware/clerk'
import type { ReviewStore } from '../services/reviewStore'
import { buildVisibilityContext, filterVisibleReviews } from '../services/reviewVisibility'
import type { UserDirectory } from '../services/userDirectory'
import type { MovieCatalog } from '../services/movieCatalog'
import type { ReportLedger } from '../services/reportLedger'
import { type Review, isLegacyReview } from '../types/reviews'
import { ForbiddenError, MovieNotFoundError, ReviewNotFoundError, UserNotFoundError } from '../utils/errors'
import { paginate, paginationSchema, parseInput, sendError } from '../utils/http'

export interface ReviewRouteDeps {
  store: ReviewStore
  users: UserDirectory
  movies: MovieCatalog
  reports: ReportLedger
}

const ratingSchema = z
  .number()
  .int('Rating must be a whole number')
  .min(1, 'Rating must be between 1 and 5')
  .max(5, 'Rating must be between 1 and 5')

const createReviewSchema = z.object({
  movie_id: z.string().trim().min(1, 'movie_id is required'),
  rating: ratingSchema,
  review_text: z.string().optional(),
  review_date: z.string().optional(),
})

const updateReviewSchema = z
  .object({
    rating: ratingSchema.optional(),
    review_text: z.string().optional(),
    review_date: z.string().optional(),
  })
  .refine(
    (fields) => fields.rating !== undefined || fields.review_text !== undefined || fields.review_date !== undefined,
    { message: 'No fields to update' }
  )

const reportSchema = z.object({
  reason: z.string().trim().max(500, 'Reason must be at most 500 characters').optional(),
})

export function createReviewsRouter({ store, users, movies, reports }: ReviewRouteDeps): Router {
  const router = Router()

  async function visibleTo(viewerId: string | null, reviews: Review[]): Promise<Review[]> {
    const context = await buildVisibilityContext(users, reviews, viewerId)
    return filterVisibleReviews(reviews, context)
  }

  /**
   * Legacy reviews are permanent. Everything else may be changed by its author or an admin.
   */
  async function assertCanModify(review: Review, userId: string): Promise<void> {
    if (isLegacyReview(review)) {
      throw new ForbiddenError('Imported reviews cannot be modified')
    }
    if (review.user_id === userId) return

    const requester = await users.getUser(userId)
    if (requester?.role !== 'admin') {
      throw new ForbiddenError('You can only modify your own reviews')
    }
  }

  /**
   * GET /api/reviews
   * Every review visible to the current viewer, oldest first
   * Query parameters: page (default 1), limit (default 10, max 100)
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const pagination = parseInput(paginationSchema, req.query)
      const reviews = await visibleTo(getAuthUserId(req), store.list())
      const page = paginate(reviews, pagination)

      res.json({
        success: true,
        data: { reviews: page.items, page: page.page, limit: page.limit, total: page.total },
      })
    } catch (error) {
      sendError(res, error, 'GET /api/reviews')
    }
  })

  /**
   * GET /api/reviews/movie/:movieId
   * Reviews for a movie, hidden authors removed for the current viewer
   * Query parameters: page (default 1), limit (default 10, max 100)
   */
  router.get('/movie/:movieId', async (req: Request, res: Response) => {
    try {
      const pagination = parseInput(paginationSchema, req.query)
      const reviews = await visibleTo(getAuthUserId(req), store.getByMovie(req.params.movieId))
      const page = paginate(reviews, pagination)

      res.json({
        success: true,
        data: { reviews: page.items, page: page.page, limit: page.limit, total: page.total },
      })
    } catch (error) {
      sendError(res, error, 'GET /api/reviews/movie/:movieId')
    }
  })

  /**
   * GET /api/reviews/user/:userId
   * Reviews written by a user, with the same filtering as movie listings
   */
  router.get('/user/:userId', async (req: Request, res: Response) => {
    try {
      const pagination = parseInput(paginationSchema, req.query)
      const reviews = await visibleTo(getAuthUserId(req), store.getByUser(req.params.userId))
      const page = paginate(reviews, pagination)

      res.json({
        success: true,
        data: { reviews: page.items, page: page.page, limit: page.limit, total: page.total },
      })
    } catch (error) {
      sendError(res, error, 'GET /api/reviews/user/:userId')
    }
  })

  /**
   * POST /api/reviews/compact
   * Compact the review log now instead of waiting for the automatic trigger
   * Requires an admin account
   */
  router.post('/compact', requireAuth, requireAdmin(users), async (req: Request, res: Response) => {
    try {
      const discarded = await store.compact()
      res.json({
        success: true,
        data: { discarded },
      })
    } catch (error) {
      sendError(res, error, 'POST /api/reviews/compact')
    }
  })

  /**
   * GET /api/reviews/:reviewId
   * A single review; reviews hidden from the viewer are reported as missing
   */
  router.get('/:reviewId', async (req: Request, res: Response) => {
    try {
      const review = store.get(req.params.reviewId)
      const [visible] = await visibleTo(getAuthUserId(req), [review])
      if (!visible) throw new ReviewNotFoundError(review.review_id)

      res.json({
        success: true,
        data: visible,
      })
    } catch (error) {
      sendError(res, error, 'GET /api/reviews/:reviewId')
    }
  })

  /**
   * POST /api/reviews
   * Create a review as the signed-in user
   * Requires authentication; suspended accounts cannot post
   */
  router.post('/', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)

      const body = parseInput(createReviewSchema, req.body)

      const user = await users.getOrCreateUser(userId)
      if (!user) throw new UserNotFoundError(userId)
      if (user.is_suspended) {
        throw new ForbiddenError('Your account is suspended')
      }

      if (!(await movies.movieExists(body.movie_id))) {
        throw new MovieNotFoundError(body.movie_id)
      }

      const review = await store.create({ ...body, user_id: userId })

      res.status(201).json({
        success: true,
        data: review,
      })
    } catch (error) {
      sendError(res, error, 'POST /api/reviews')
    }
  })

  /**
   * PUT /api/reviews/:reviewId
   * Partial update by the author or an admin
   */
  router.put('/:reviewId', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)

      const fields = parseInput(updateReviewSchema, req.body)
      const review = store.get(req.params.reviewId)
      await assertCanModify(review, userId)

      const updated = await store.update(review.review_id, fields)

      res.json({
        success: true,
        data: updated,
      })
    } catch (error) {
      sendError(res, error, 'PUT /api/reviews/:reviewId')
    }
  })

  /**
   * DELETE /api/reviews/:reviewId
   * Delete by the author or an admin
   */
  router.delete('/:reviewId', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)

      const review = store.get(req.params.reviewId)
      await assertCanModify(review, userId)
      await store.delete(review.review_id)
      const deletedReports = await reports.deleteReportsByReview(review.review_id)

      res.json({
        success: true,
        data: { review_id: review.review_id, deleted_reports: deletedReports },
      })
    } catch (error) {
      sendError(res, error, 'DELETE /api/reviews/:reviewId')
    }
  })

  /**
   * POST /api/reviews/:reviewId/report
   * Report an abusive review; each user may report a review once
   */
  router.post('/:reviewId/report', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      const { reason } = parseInput(reportSchema, req.body ?? {})

      const review = store.get(req.params.reviewId)
      const [visible] = await visibleTo(userId, [review])
      if (!visible) throw new ReviewNotFoundError(review.review_id)

      const report = await reports.createReport({ review: visible, reportingUserId: userId, reason })

      res.status(201).json({
        success: true,
        data: report,
      })
    } catch (error) {
      sendError(res, error, 'POST /api/reviews/:reviewId/report')
    }
  })

  /**
   * GET /api/reviews/:reviewId/reports
   * Requires an admin account
   */
  router.get('/:reviewId/reports', requireAuth, requireAdmin(users), async (req: Request, res: Response) => {
    try {
      const review = store.get(req.params.reviewId)
      res.json({
        success: true,
        data: await reports.getReportsByReview(review.review_id),
      })
    } catch (error) {
      sendError(res, error, 'GET /api/reviews/:reviewId/reports')
    }
  })

  return router
}
