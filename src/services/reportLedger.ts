import mongoose, { type FilterQuery } from 'mongoose'
import Report, { type IReport } from '../models/reports'
import { isDatabaseConnected } from '../config/database'
import type { Review } from '../types/reviews'
import { DuplicateReportError, ReportNotFoundError, ServiceUnavailableError } from '../utils/errors'

export interface ReportRecord {
  report_id: string
  review_id: string
  movie_id: string
  review_author_id: string | null
  reporting_user_id: string
  reason: string
  admin_viewed: boolean
  created_at: string | null
}

export interface CreateReportInput {
  review: Review
  reportingUserId: string
  reason?: string
}

/**
 * Reports of abusive reviews, as seen by the review and admin routes.
 */
export interface ReportLedger {
  /** Throws DuplicateReportError when the user already reported this review */
  createReport(input: CreateReportInput): Promise<ReportRecord>
  hasUserReportedReview(reviewId: string, userId: string): Promise<boolean>
  getReportsByReview(reviewId: string): Promise<ReportRecord[]>
  /** Newest first */
  listReports(options?: { unviewedOnly?: boolean }): Promise<ReportRecord[]>
  markViewed(reportId: string): Promise<ReportRecord>
  deleteReportsByReview(reviewId: string): Promise<number>
  /** Reports on the movie's platform reviews; reports on imported reviews stay with them */
  deleteReportsByMovie(movieId: string): Promise<number>
  /** Reports on the user's reviews and reports the user filed */
  deleteReportsForUser(userId: string): Promise<number>
}

type ReportFields = Pick<
  IReport,
  '_id' | 'review_id' | 'movie_id' | 'review_author_id' | 'reporting_user_id' | 'reason' | 'admin_viewed' | 'created_at'
>

export function formatReportForAPI(report: ReportFields): ReportRecord {
  return {
    report_id: String(report._id),
    review_id: report.review_id,
    movie_id: report.movie_id,
    review_author_id: report.review_author_id ?? null,
    reporting_user_id: report.reporting_user_id,
    reason: report.reason ?? '',
    admin_viewed: report.admin_viewed ?? false,
    created_at: report.created_at?.toISOString() ?? null,
  }
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === 11000
}

/**
 * ReportLedger backed by the `reports` collection.
 */
export class MongoReportLedger implements ReportLedger {
  async createReport({ review, reportingUserId, reason = '' }: CreateReportInput): Promise<ReportRecord> {
    if (await this.hasUserReportedReview(review.review_id, reportingUserId)) {
      throw new DuplicateReportError()
    }

    try {
      const report = await Report.create({
        review_id: review.review_id,
        movie_id: review.movie_id,
        review_author_id: review.user_id,
        reporting_user_id: reportingUserId,
        reason,
      })
      console.log(`🚩 Review ${review.review_id} reported by ${reportingUserId}`)
      return formatReportForAPI(report)
    } catch (error) {
      // A concurrent report got past the check above
      if (isDuplicateKeyError(error)) throw new DuplicateReportError()
      throw error
    }
  }

  async hasUserReportedReview(reviewId: string, userId: string): Promise<boolean> {
    this.assertConnected()
    const found = await Report.exists({ review_id: reviewId, reporting_user_id: userId })
    return found !== null
  }

  async getReportsByReview(reviewId: string): Promise<ReportRecord[]> {
    this.assertConnected()
    const reports = await Report.find({ review_id: reviewId }).sort({ created_at: 1 })
    return reports.map(formatReportForAPI)
  }

  async listReports({ unviewedOnly = false }: { unviewedOnly?: boolean } = {}): Promise<ReportRecord[]> {
    this.assertConnected()
    const reports = await Report.find(unviewedOnly ? { admin_viewed: false } : {}).sort({ created_at: -1 })
    return reports.map(formatReportForAPI)
  }

  async markViewed(reportId: string): Promise<ReportRecord> {
    this.assertConnected()
    if (!mongoose.isValidObjectId(reportId)) throw new ReportNotFoundError(reportId)

    const report = await Report.findByIdAndUpdate(reportId, { $set: { admin_viewed: true } }, { new: true })
    if (!report) throw new ReportNotFoundError(reportId)
    return formatReportForAPI(report)
  }

  async deleteReportsByReview(reviewId: string): Promise<number> {
    return this.deleteWhere({ review_id: reviewId }, `review ${reviewId}`)
  }

  async deleteReportsByMovie(movieId: string): Promise<number> {
    return this.deleteWhere({ movie_id: movieId, review_author_id: { $ne: null } }, `movie ${movieId}`)
  }

  async deleteReportsForUser(userId: string): Promise<number> {
    return this.deleteWhere(
      { $or: [{ review_author_id: userId }, { reporting_user_id: userId }] },
      `user ${userId}`,
    )
  }

  private async deleteWhere(filter: FilterQuery<IReport>, label: string): Promise<number> {
    this.assertConnected()
    const result = await Report.deleteMany(filter)
    if (result.deletedCount > 0) {
      console.log(`🗑️  Deleted ${result.deletedCount} reports for ${label}`)
    }
    return result.deletedCount
  }

  private assertConnected(): void {
    if (!isDatabaseConnected()) {
      throw new ServiceUnavailableError()
    }
  }
}
