/**
 * Error types shared by the review store, the collaborators and the routes.
 * Routes answer with `statusCode` for any AppError and 500 for everything else.
 */

export class AppError extends Error {
  readonly statusCode: number

  constructor(message: string, statusCode: number) {
    super(message)
    this.name = new.target.name
    this.statusCode = statusCode
  }
}

export class ReviewNotFoundError extends AppError {
  readonly reviewId: string

  constructor(reviewId: string) {
    super(`Review with ID '${reviewId}' not found`, 404)
    this.reviewId = reviewId
  }
}

export class DuplicateReviewError extends AppError {
  constructor(userId: string, movieId: string, existingReviewId: string) {
    super(
      `User '${userId}' has already reviewed movie '${movieId}' (review '${existingReviewId}'). Edit the existing review instead.`,
      400,
    )
  }
}

export class UserNotFoundError extends AppError {
  constructor(userId: string) {
    super(`User with ID '${userId}' not found`, 404)
  }
}

export class MovieNotFoundError extends AppError {
  constructor(movieId: string) {
    super(`Movie with ID '${movieId}' not found`, 404)
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 401)
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403)
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400)
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message = 'Database is not available. Please try again in a moment.') {
    super(message, 503)
  }
}

/** An operation-log row that cannot be replayed. Startup must not continue past it. */
export class ReviewLogCorruptionError extends Error {
  /** 1-based data row (header excluded), or null when the file could not be tokenized at all */
  readonly row: number | null

  constructor(filePath: string, row: number | null, reason: string) {
    super(
      row === null
        ? `Review log ${filePath} is not valid CSV: ${reason}`
        : `Corrupt review log entry in ${filePath} at row ${row}: ${reason}`,
    )
    this.name = 'ReviewLogCorruptionError'
    this.row = row
  }
}

export class DuplicateReportError extends AppError {
  constructor() {
    super('You have already reported this review', 400)
  }
}

export class ReportNotFoundError extends AppError {
  constructor(reportId: string) {
    super(`Report with ID '${reportId}' not found`, 404)
  }
}
