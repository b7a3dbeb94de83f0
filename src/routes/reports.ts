import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import { requireAdmin, requireAuth } from '../middleware/clerk'
import type { ReportLedger } from '../services/reportLedger'
import type { UserDirectory } from '../services/userDirectory'
import { parseInput, sendError } from '../utils/http'

export interface ReportRouteDeps {
  users: UserDirectory
  reports: ReportLedger
}

const listQuerySchema = z.object({
  unviewed: z.enum(['true', 'false']).optional(),
})

/**
 * Moderation queue for reported reviews. Every route requires an admin account.
 */
export function createReportsRouter({ users, reports }: ReportRouteDeps): Router {
  const router = Router()

  router.use(requireAuth, requireAdmin(users))

  /**
   * GET /api/reports
   * Newest first; ?unviewed=true keeps only reports no admin has looked at
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const { unviewed } = parseInput(listQuerySchema, req.query)
      res.json({
        success: true,
        data: await reports.listReports({ unviewedOnly: unviewed === 'true' }),
      })
    } catch (error) {
      sendError(res, error, 'GET /api/reports')
    }
  })

  /**
   * POST /api/reports/:reportId/viewed
   */
  router.post('/:reportId/viewed', async (req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        data: await reports.markViewed(req.params.reportId),
      })
    } catch (error) {
      sendError(res, error, 'POST /api/reports/:reportId/viewed')
    }
  })

  return router
}
