import type { MovieCatalog, MovieRecord } from '../../src/services/movieCatalog'
import type { CreateReportInput, ReportLedger, ReportRecord } from '../../src/services/reportLedger'
import type { UserDirectory, UserProfile, UserStatus } from '../../src/services/userDirectory'
import { DuplicateReportError, ReportNotFoundError, UserNotFoundError, ValidationError } from '../../src/utils/errors'

/**
 * In-process UserDirectory with the same blocking and suspension rules as the Mongo one.
 */
export class InMemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, UserProfile>()

  addUser(userId: string, overrides: Partial<UserProfile> = {}): UserProfile {
    const user: UserProfile = {
      user_id: userId,
      email: `${userId}@example.com`,
      username: userId,
      full_name: null,
      role: 'user',
      is_suspended: false,
      blocked_users: [],
      following: [],
      followers: [],
      favorites: [],
      created_at: null,
      ...overrides,
    }
    this.users.set(userId, user)
    return user
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    const user = this.users.get(userId)
    return user ? { ...user } : null
  }

  async getOrCreateUser(userId: string): Promise<UserProfile | null> {
    return this.getUser(userId)
  }

  async getStatuses(userIds: readonly string[]): Promise<Map<string, UserStatus>> {
    const statuses = new Map<string, UserStatus>()
    for (const userId of userIds) {
      const user = this.users.get(userId)
      if (user) {
        statuses.set(userId, { user_id: userId, is_suspended: user.is_suspended, blocked_users: [...user.blocked_users] })
      }
    }
    return statuses
  }

  async blockUser(blockerId: string, blockedId: string): Promise<void> {
    if (blockerId === blockedId) throw new ValidationError('Cannot block yourself')
    const blocker = this.require(blockerId)
    const blocked = this.require(blockedId)
    this.link(blocker, blockedId)
    this.link(blocked, blockerId)
  }

  async unblockUser(unblockerId: string, blockedId: string): Promise<void> {
    const unblocker = this.require(unblockerId)
    const blocked = this.require(blockedId)
    unblocker.blocked_users = unblocker.blocked_users.filter((id) => id !== blockedId)
    blocked.blocked_users = blocked.blocked_users.filter((id) => id !== unblockerId)
  }

  async followUser(followerId: string, followeeId: string): Promise<void> {
    if (followerId === followeeId) throw new ValidationError('Cannot follow yourself')
    const follower = this.require(followerId)
    const followee = this.require(followeeId)
    if (follower.blocked_users.includes(followeeId) || followee.blocked_users.includes(followerId)) {
      throw new ValidationError('Cannot follow a user you have blocked or who has blocked you')
    }
    if (!follower.following.includes(followeeId)) follower.following = [...follower.following, followeeId]
    if (!followee.followers.includes(followerId)) followee.followers = [...followee.followers, followerId]
  }

  async unfollowUser(followerId: string, followeeId: string): Promise<void> {
    const follower = this.require(followerId)
    const followee = this.require(followeeId)
    follower.following = follower.following.filter((id) => id !== followeeId)
    followee.followers = followee.followers.filter((id) => id !== followerId)
  }

  async setSuspended(userId: string, suspended: boolean): Promise<UserProfile> {
    const user = this.require(userId)
    user.is_suspended = suspended
    return { ...user }
  }

  async toggleFavorite(userId: string, movieId: string): Promise<boolean> {
    const user = this.require(userId)
    if (user.favorites.includes(movieId)) {
      user.favorites = user.favorites.filter((id) => id !== movieId)
      return false
    }
    user.favorites = [...user.favorites, movieId]
    return true
  }

  async deleteUser(userId: string): Promise<void> {
    if (!this.users.delete(userId)) throw new UserNotFoundError(userId)
    for (const user of this.users.values()) {
      user.blocked_users = user.blocked_users.filter((id) => id !== userId)
      user.following = user.following.filter((id) => id !== userId)
      user.followers = user.followers.filter((id) => id !== userId)
    }
  }

  private require(userId: string): UserProfile {
    const user = this.users.get(userId)
    if (!user) throw new UserNotFoundError(userId)
    return user
  }

  private link(user: UserProfile, otherId: string): void {
    if (!user.blocked_users.includes(otherId)) user.blocked_users = [...user.blocked_users, otherId]
    user.following = user.following.filter((id) => id !== otherId)
    user.followers = user.followers.filter((id) => id !== otherId)
  }
}

export class InMemoryMovieCatalog implements MovieCatalog {
  private readonly movies = new Map<string, MovieRecord>()

  addMovie(movieId: string, title: string): MovieRecord {
    const movie: MovieRecord = { movie_id: movieId, title, genre: null, year: null, director: null, description: null }
    this.movies.set(movieId, movie)
    return movie
  }

  async getMovie(movieId: string): Promise<MovieRecord | null> {
    const movie = this.movies.get(movieId)
    return movie ? { ...movie } : null
  }

  async movieExists(movieId: string): Promise<boolean> {
    return this.movies.has(movieId)
  }

  async getTitleIndex(): Promise<Map<string, string>> {
    const index = new Map<string, string>()
    for (const movie of this.movies.values()) index.set(movie.title.trim(), movie.movie_id)
    return index
  }

  async deleteMovie(movieId: string): Promise<boolean> {
    return this.movies.delete(movieId)
  }
}

export class InMemoryReportLedger implements ReportLedger {
  private readonly reports: ReportRecord[] = []
  private nextId = 1

  async createReport({ review, reportingUserId, reason = '' }: CreateReportInput): Promise<ReportRecord> {
    if (await this.hasUserReportedReview(review.review_id, reportingUserId)) throw new DuplicateReportError()
    const report: ReportRecord = {
      report_id: `report_${this.nextId++}`,
      review_id: review.review_id,
      movie_id: review.movie_id,
      review_author_id: review.user_id,
      reporting_user_id: reportingUserId,
      reason,
      admin_viewed: false,
      created_at: null,
    }
    this.reports.push(report)
    return { ...report }
  }

  async hasUserReportedReview(reviewId: string, userId: string): Promise<boolean> {
    return this.reports.some((report) => report.review_id === reviewId && report.reporting_user_id === userId)
  }

  async getReportsByReview(reviewId: string): Promise<ReportRecord[]> {
    return this.reports.filter((report) => report.review_id === reviewId).map((report) => ({ ...report }))
  }

  async listReports({ unviewedOnly = false }: { unviewedOnly?: boolean } = {}): Promise<ReportRecord[]> {
    return this.reports
      .filter((report) => !unviewedOnly || !report.admin_viewed)
      .reverse()
      .map((report) => ({ ...report }))
  }

  async markViewed(reportId: string): Promise<ReportRecord> {
    const report = this.reports.find((candidate) => candidate.report_id === reportId)
    if (!report) throw new ReportNotFoundError(reportId)
    report.admin_viewed = true
    return { ...report }
  }

  async deleteReportsByReview(reviewId: string): Promise<number> {
    return this.deleteWhere((report) => report.review_id === reviewId)
  }

  async deleteReportsByMovie(movieId: string): Promise<number> {
    return this.deleteWhere((report) => report.movie_id === movieId && report.review_author_id !== null)
  }

  async deleteReportsForUser(userId: string): Promise<number> {
    return this.deleteWhere((report) => report.review_author_id === userId || report.reporting_user_id === userId)
  }

  private deleteWhere(matches: (report: ReportRecord) => boolean): number {
    const before = this.reports.length
    const kept = this.reports.filter((report) => !matches(report))
    this.reports.splice(0, this.reports.length, ...kept)
    return before - kept.length
  }
}
