import type { Response } from 'express'
import { z } from 'zod'
import { AppError, ValidationError } from './errors'

/**
 * Send the `{ success: false, error }` envelope for any thrown value.
 * AppErrors keep their status code; anything else is a 500.
 */
export function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      console.error(`❌ ${context}:`, error.message)
    } else {
      console.warn(`⚠️  ${context}: ${error.message}`)
    }
    return res.status(error.statusCode).json({
      success: false,
      error: error.message,
    })
  }

  console.error(`Error in ${context}:`, error)
  return res.status(500).json({
    success: false,
    error: error instanceof Error ? error.message : 'Internal server error',
  })
}

/**
 * Parse request input, turning schema failures into a 400 ValidationError.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new ValidationError(message)
  }
  return result.data
}

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(10),
})

export type Pagination = z.output<typeof paginationSchema>

export function paginate<T>(items: readonly T[], { page, limit }: Pagination) {
  const start = (page - 1) * limit
  return {
    items: items.slice(start, start + limit),
    page,
    limit,
    total: items.length,
  }
}
