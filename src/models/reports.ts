import mongoose, { Schema, type Document, type Model } from 'mongoose'

/**
 * A user's report of an abusive review. The reviewed movie and the review's author are
 * copied in so cascades can find the reports without the review.
 */
export interface IReport extends Document {
  review_id: string
  movie_id: string
  review_author_id: string | null // null for imported reviews
  reporting_user_id: string
  reason: string
  admin_viewed: boolean
  created_at: Date
  updated_at: Date
}

const ReportSchema = new Schema<IReport>(
  {
    review_id: {
      type: String,
      required: true,
      index: true,
    },
    movie_id: {
      type: String,
      required: true,
      index: true,
    },
    review_author_id: {
      type: String,
      default: null,
      index: true,
    },
    reporting_user_id: {
      type: String,
      required: true,
      index: true,
    },
    reason: {
      type: String,
      default: '',
      trim: true,
    },
    admin_viewed: {
      type: Boolean,
      default: false,
    },
  },
  {
    timestamps: {
      createdAt: 'created_at',
      updatedAt: 'updated_at',
    },
    collection: 'reports',
  }
)

// One report per user per review
ReportSchema.index({ review_id: 1, reporting_user_id: 1 }, { unique: true })

const Report: Model<IReport> = mongoose.models.Report || mongoose.model<IReport>('Report', ReportSchema)

export default Report
