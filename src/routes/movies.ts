import { Router, type Request, type Response } from 'express'
import { requireAdmin, requireAuth } from '../middleware/clerk'
import type { MovieCatalog } from '../services/movieCatalog'
import type { ReportLedger } from '../services/reportLedger'
import type { ReviewStore } from '../services/reviewStore'
import { summarizeRatings } from '../services/ratings'
import type { UserDirectory } from '../services/userDirectory'
import { MovieNotFoundError } from '../utils/errors'
import { sendError } from '../utils/http'

export interface MovieRouteDeps {
  store: ReviewStore
  users: UserDirectory
  movies: MovieCatalog
  reports: ReportLedger
}

export function createMoviesRouter({ store, users, movies, reports }: MovieRouteDeps): Router {
  const router = Router()

  /**
   * GET /api/movies/:movieId
   * Movie details with its average rating over all reviews
   */
  router.get('/:movieId', async (req: Request, res: Response) => {
    try {
      const movie = await movies.getMovie(req.params.movieId)
      if (!movie) throw new MovieNotFoundError(req.params.movieId)

      const { average_rating, review_count } = summarizeRatings(store, movie.movie_id)
      res.json({
        success: true,
        data: { ...movie, average_rating, review_count },
      })
    } catch (error) {
      sendError(res, error, 'GET /api/movies/:movieId')
    }
  })

  /**
   * GET /api/movies/:movieId/rating
   * Average rating and review count; average_rating is null when nobody has reviewed it
   */
  router.get('/:movieId/rating', (req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: summarizeRatings(store, req.params.movieId),
      })
    } catch (error) {
      sendError(res, error, 'GET /api/movies/:movieId/rating')
    }
  })

  /**
   * DELETE /api/movies/:movieId
   * Remove a movie and every platform review of it; imported reviews stay
   * Requires an admin account
   */
  router.delete('/:movieId', requireAuth, requireAdmin(users), async (req: Request, res: Response) => {
    try {
      const { movieId } = req.params
      if (!(await movies.movieExists(movieId))) throw new MovieNotFoundError(movieId)

      const deletedReviews = await store.deleteByMovie(movieId)
      const deletedReports = await reports.deleteReportsByMovie(movieId)
      await movies.deleteMovie(movieId)

      res.json({
        success: true,
        data: { movie_id: movieId, deleted_reviews: deletedReviews, deleted_reports: deletedReports },
      })
    } catch (error) {
      sendError(res, error, 'DELETE /api/movies/:movieId')
    }
  })

  return router
}
