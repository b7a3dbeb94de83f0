import { Router, type Request, type Response } from 'express'
import { getRequiredUserId, requireAdmin, requireAuth } from '../middleware/clerk'
import type { MovieCatalog } from '../services/movieCatalog'
import type { ReportLedger } from '../services/reportLedger'
import type { ReviewStore } from '../services/reviewStore'
import type { UserDirectory } from '../services/userDirectory'
import { MovieNotFoundError, UserNotFoundError } from '../utils/errors'
import { paginate, paginationSchema, parseInput, sendError } from '../utils/http'

export interface UserRouteDeps {
  store: ReviewStore
  users: UserDirectory
  movies: MovieCatalog
  reports: ReportLedger
}

export function createUsersRouter({ store, users, movies, reports }: UserRouteDeps): Router {
  const router = Router()

  /**
   * GET /api/users/me
   * Current user's profile, created from Clerk on first sight
   */
  router.get('/me', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      const user = await users.getOrCreateUser(userId)
      if (!user) throw new UserNotFoundError(userId)

      res.json({
        success: true,
        data: user,
      })
    } catch (error) {
      sendError(res, error, 'GET /api/users/me')
    }
  })

  /**
   * DELETE /api/users/me
   * Delete the current account together with every review it wrote
   */
  router.delete('/me', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      if (!(await users.getUser(userId))) throw new UserNotFoundError(userId)

      const deletedReviews = await store.deleteByUser(userId)
      const deletedReports = await reports.deleteReportsForUser(userId)
      await users.deleteUser(userId)

      res.json({
        success: true,
        data: { user_id: userId, deleted_reviews: deletedReviews, deleted_reports: deletedReports },
      })
    } catch (error) {
      sendError(res, error, 'DELETE /api/users/me')
    }
  })

  /**
   * POST /api/users/me/favorites/:movieId
   * Toggle a movie in the current user's favorites
   */
  router.post('/me/favorites/:movieId', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      const { movieId } = req.params
      if (!(await movies.movieExists(movieId))) throw new MovieNotFoundError(movieId)

      const favorited = await users.toggleFavorite(userId, movieId)
      res.json({
        success: true,
        data: { movie_id: movieId, favorited },
      })
    } catch (error) {
      sendError(res, error, 'POST /api/users/me/favorites/:movieId')
    }
  })

  /**
   * POST /api/users/:userId/block
   * Block a user; neither side sees the other's reviews afterwards
   */
  router.post('/:userId/block', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      await users.blockUser(userId, req.params.userId)
      res.json({
        success: true,
        data: { blocked_user_id: req.params.userId },
      })
    } catch (error) {
      sendError(res, error, 'POST /api/users/:userId/block')
    }
  })

  /**
   * DELETE /api/users/:userId/block
   */
  router.delete('/:userId/block', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      await users.unblockUser(userId, req.params.userId)
      res.json({
        success: true,
        data: { unblocked_user_id: req.params.userId },
      })
    } catch (error) {
      sendError(res, error, 'DELETE /api/users/:userId/block')
    }
  })

  /**
   * POST /api/users/:userId/follow
   * Follow a user; refused while either side blocks the other
   */
  router.post('/:userId/follow', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      await users.followUser(userId, req.params.userId)
      res.json({
        success: true,
        data: { followed_user_id: req.params.userId },
      })
    } catch (error) {
      sendError(res, error, 'POST /api/users/:userId/follow')
    }
  })

  /**
   * DELETE /api/users/:userId/follow
   */
  router.delete('/:userId/follow', requireAuth, async (req: Request, res: Response) => {
    try {
      const userId = getRequiredUserId(req)
      await users.unfollowUser(userId, req.params.userId)
      res.json({
        success: true,
        data: { unfollowed_user_id: req.params.userId },
      })
    } catch (error) {
      sendError(res, error, 'DELETE /api/users/:userId/follow')
    }
  })

  /**
   * GET /api/users/:userId/followers
   * GET /api/users/:userId/following
   * User IDs, paginated like review listings
   */
  for (const relation of ['followers', 'following'] as const) {
    router.get(`/:userId/${relation}`, async (req: Request, res: Response) => {
      try {
        const pagination = parseInput(paginationSchema, req.query)
        const user = await users.getUser(req.params.userId)
        if (!user) throw new UserNotFoundError(req.params.userId)

        const page = paginate(user[relation], pagination)
        res.json({
          success: true,
          data: { users: page.items, page: page.page, limit: page.limit, total: page.total },
        })
      } catch (error) {
        sendError(res, error, `GET /api/users/:userId/${relation}`)
      }
    })
  }

  /**
   * POST /api/users/:userId/suspend
   * Requires an admin account. A suspended user's reviews are hidden from everyone.
   */
  router.post('/:userId/suspend', requireAuth, requireAdmin(users), async (req: Request, res: Response) => {
    try {
      const user = await users.setSuspended(req.params.userId, true)
      res.json({
        success: true,
        data: user,
      })
    } catch (error) {
      sendError(res, error, 'POST /api/users/:userId/suspend')
    }
  })

  /**
   * POST /api/users/:userId/reactivate
   * Requires an admin account
   */
  router.post('/:userId/reactivate', requireAuth, requireAdmin(users), async (req: Request, res: Response) => {
    try {
      const user = await users.setSuspended(req.params.userId, false)
      res.json({
        success: true,
        data: user,
      })
    } catch (error) {
      sendError(res, error, 'POST /api/users/:userId/reactivate')
    }
  })

  return router
}
