import type { Review } from '../types/reviews'
import type { UserDirectory, UserStatus } from './userDirectory'

export interface VisibilityContext {
  viewerId: string | null
  suspendedAuthors: ReadonlySet<string>
  /** Authors hidden from this viewer because of a block in either direction */
  blockedAuthors: ReadonlySet<string>
}

/**
 * Drop reviews whose author is suspended or, for a signed-in viewer, blocked.
 * Legacy reviews have no live author and always pass. Input order is kept.
 */
export function filterVisibleReviews<T extends Review>(reviews: readonly T[], context: VisibilityContext): T[] {
  return reviews.filter((review) => {
    if (review.user_id === null) return true
    if (context.suspendedAuthors.has(review.user_id)) return false
    if (context.viewerId !== null && context.blockedAuthors.has(review.user_id)) return false
    return true
  })
}

/**
 * Look up everything `filterVisibleReviews` needs for one request.
 * Authors unknown to the directory are treated as active and unblocked.
 */
export async function buildVisibilityContext(
  directory: Pick<UserDirectory, 'getStatuses'>,
  reviews: readonly Review[],
  viewerId: string | null,
): Promise<VisibilityContext> {
  const authors = new Set<string>()
  for (const review of reviews) {
    if (review.user_id !== null) authors.add(review.user_id)
  }

  const lookup = new Set(authors)
  if (viewerId !== null) lookup.add(viewerId)
  const statuses = lookup.size > 0 ? await directory.getStatuses([...lookup]) : new Map<string, UserStatus>()

  const suspendedAuthors = new Set<string>()
  const blockedAuthors = new Set<string>()
  const viewerBlocks = new Set(viewerId !== null ? statuses.get(viewerId)?.blocked_users ?? [] : [])

  for (const authorId of authors) {
    const status = statuses.get(authorId)
    if (!status) continue
    if (status.is_suspended) suspendedAuthors.add(authorId)
    if (viewerId !== null && (viewerBlocks.has(authorId) || status.blocked_users.includes(viewerId))) {
      blockedAuthors.add(authorId)
    }
  }

  return { viewerId, suspendedAuthors, blockedAuthors }
}
