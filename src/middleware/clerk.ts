import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { clerkClient, clerkMiddleware, getAuth } from '@clerk/express'
import { CLERK_PUBLISHABLE_KEY, CLERK_SECRET_KEY } from '../config/env'
import type { UserDirectory } from '../services/userDirectory'
import { UnauthorizedError } from '../utils/errors'

export const clerkClientInstance = clerkClient

/**
 * Clerk middleware that verifies the session and attaches auth data to the request.
 * The session token is read from the __session cookie or the Authorization header.
 * Requests without a session pass through as anonymous.
 */
export const clerkAuth: RequestHandler = clerkMiddleware({
  secretKey: CLERK_SECRET_KEY || undefined,
  publishableKey: CLERK_PUBLISHABLE_KEY || undefined,
})

/**
 * The signed-in user's ID (also their review `user_id`), or null for anonymous requests.
 */
export function getAuthUserId(req: Request): string | null {
  return getAuth(req).userId ?? null
}

/**
 * The signed-in user's ID for handlers behind requireAuth.
 */
export function getRequiredUserId(req: Request): string {
  const userId = getAuthUserId(req)
  if (!userId) throw new UnauthorizedError()
  return userId
}

/**
 * Middleware to require authentication
 * Returns 401 if user is not authenticated
 */
export const requireAuth = (req: Request, res: Response, next: NextFunction) => {
  if (!getAuthUserId(req)) {
    return res.status(401).json({
      success: false,
      error: 'Authentication required',
    })
  }
  next()
}

/**
 * Middleware to require an admin account. Must run after requireAuth.
 */
export function requireAdmin(directory: Pick<UserDirectory, 'getUser'>): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const userId = getAuthUserId(req)
      const user = userId ? await directory.getUser(userId) : null
      if (!user || user.role !== 'admin') {
        console.warn(`⚠️  Non-admin user attempted admin action: ${userId ?? 'anonymous'}`)
        return res.status(403).json({
          success: false,
          error: 'Admin privileges required',
        })
      }
      next()
    } catch (error) {
      next(error)
    }
  }
}
