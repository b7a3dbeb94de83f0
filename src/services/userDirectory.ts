import User, { type IUser } from '../models/users'
import { isDatabaseConnected } from '../config/database'
import { ServiceUnavailableError, UserNotFoundError, ValidationError } from '../utils/errors'
import { getOrSyncUser } from './userSync'

export interface UserProfile {
  user_id: string
  email: string
  username: string | null
  full_name: string | null
  role: 'user' | 'admin'
  is_suspended: boolean
  blocked_users: string[]
  following: string[]
  followers: string[]
  favorites: string[]
  created_at: string | null
}

/** What review visibility needs to know about a user */
export interface UserStatus {
  user_id: string
  is_suspended: boolean
  blocked_users: string[]
}

/**
 * The user accounts and social graph, as seen by the review routes.
 */
export interface UserDirectory {
  getUser(userId: string): Promise<UserProfile | null>
  /** Like getUser, but creates the local record for a first-time signed-in user */
  getOrCreateUser(userId: string): Promise<UserProfile | null>
  /** Statuses for the known users among `userIds`; unknown IDs are left out */
  getStatuses(userIds: readonly string[]): Promise<Map<string, UserStatus>>
  /** Block in both directions and drop follow edges between the two users */
  blockUser(blockerId: string, blockedId: string): Promise<void>
  unblockUser(unblockerId: string, blockedId: string): Promise<void>
  /** Idempotent. Refused while either user blocks the other */
  followUser(followerId: string, followeeId: string): Promise<void>
  /** Idempotent */
  unfollowUser(followerId: string, followeeId: string): Promise<void>
  setSuspended(userId: string, suspended: boolean): Promise<UserProfile>
  /** Returns true when the movie was added, false when it was removed */
  toggleFavorite(userId: string, movieId: string): Promise<boolean>
  deleteUser(userId: string): Promise<void>
}

export function formatUserForAPI(user: IUser): UserProfile {
  return {
    user_id: user.clerk_id,
    email: user.email,
    username: user.username ?? null,
    full_name: user.full_name ?? null,
    role: user.role ?? 'user',
    is_suspended: user.is_suspended ?? false,
    blocked_users: [...(user.blocked_users ?? [])],
    following: [...(user.following ?? [])],
    followers: [...(user.followers ?? [])],
    favorites: [...(user.favorites ?? [])],
    created_at: user.created_at?.toISOString() ?? null,
  }
}

/**
 * UserDirectory backed by the `users` collection.
 */
export class MongoUserDirectory implements UserDirectory {
  async getUser(userId: string): Promise<UserProfile | null> {
    this.assertConnected()
    const user = await User.findOne({ clerk_id: userId })
    return user ? formatUserForAPI(user) : null
  }

  async getOrCreateUser(userId: string): Promise<UserProfile | null> {
    const user = await getOrSyncUser(userId)
    return user ? formatUserForAPI(user) : null
  }

  async getStatuses(userIds: readonly string[]): Promise<Map<string, UserStatus>> {
    this.assertConnected()
    const users = await User.find({ clerk_id: { $in: [...userIds] } })
      .select('clerk_id is_suspended blocked_users')
      .lean<Array<Pick<IUser, 'clerk_id' | 'is_suspended' | 'blocked_users'>>>()

    const statuses = new Map<string, UserStatus>()
    for (const user of users) {
      statuses.set(user.clerk_id, {
        user_id: user.clerk_id,
        is_suspended: user.is_suspended ?? false,
        blocked_users: user.blocked_users ?? [],
      })
    }
    return statuses
  }

  async blockUser(blockerId: string, blockedId: string): Promise<void> {
    if (blockerId === blockedId) {
      throw new ValidationError('Cannot block yourself')
    }
    await this.assertUsersExist(blockerId, blockedId)

    await User.bulkWrite([
      {
        updateOne: {
          filter: { clerk_id: blockerId },
          update: {
            $addToSet: { blocked_users: blockedId },
            $pull: { following: blockedId, followers: blockedId },
          },
        },
      },
      {
        updateOne: {
          filter: { clerk_id: blockedId },
          update: {
            $addToSet: { blocked_users: blockerId },
            $pull: { following: blockerId, followers: blockerId },
          },
        },
      },
    ])
    console.log(`🚫 User ${blockerId} blocked ${blockedId} (bidirectional block applied)`)
  }

  async unblockUser(unblockerId: string, blockedId: string): Promise<void> {
    await this.assertUsersExist(unblockerId, blockedId)

    await User.bulkWrite([
      {
        updateOne: {
          filter: { clerk_id: unblockerId },
          update: { $pull: { blocked_users: blockedId } },
        },
      },
      {
        updateOne: {
          filter: { clerk_id: blockedId },
          update: { $pull: { blocked_users: unblockerId } },
        },
      },
    ])
    console.log(`✅ User ${unblockerId} unblocked ${blockedId}`)
  }

  async followUser(followerId: string, followeeId: string): Promise<void> {
    if (followerId === followeeId) {
      throw new ValidationError('Cannot follow yourself')
    }
    this.assertConnected()

    const users = await User.find({ clerk_id: { $in: [followerId, followeeId] } })
      .select('clerk_id blocked_users')
      .lean<Array<Pick<IUser, 'clerk_id' | 'blocked_users'>>>()
    const follower = users.find((user) => user.clerk_id === followerId)
    if (!follower) throw new UserNotFoundError(followerId)
    const followee = users.find((user) => user.clerk_id === followeeId)
    if (!followee) throw new UserNotFoundError(followeeId)

    if ((follower.blocked_users ?? []).includes(followeeId) || (followee.blocked_users ?? []).includes(followerId)) {
      throw new ValidationError('Cannot follow a user you have blocked or who has blocked you')
    }

    await User.bulkWrite([
      {
        updateOne: {
          filter: { clerk_id: followerId },
          update: { $addToSet: { following: followeeId } },
        },
      },
      {
        updateOne: {
          filter: { clerk_id: followeeId },
          update: { $addToSet: { followers: followerId } },
        },
      },
    ])
    console.log(`👥 User ${followerId} now follows ${followeeId}`)
  }

  async unfollowUser(followerId: string, followeeId: string): Promise<void> {
    await this.assertUsersExist(followerId, followeeId)

    await User.bulkWrite([
      {
        updateOne: {
          filter: { clerk_id: followerId },
          update: { $pull: { following: followeeId } },
        },
      },
      {
        updateOne: {
          filter: { clerk_id: followeeId },
          update: { $pull: { followers: followerId } },
        },
      },
    ])
    console.log(`👋 User ${followerId} unfollowed ${followeeId}`)
  }

  async setSuspended(userId: string, suspended: boolean): Promise<UserProfile> {
    this.assertConnected()
    const user = await User.findOneAndUpdate(
      { clerk_id: userId },
      { $set: { is_suspended: suspended } },
      { new: true }
    )
    if (!user) throw new UserNotFoundError(userId)

    console.log(`${suspended ? '⛔ Suspended' : '✅ Reactivated'} user: ${userId}`)
    return formatUserForAPI(user)
  }

  async toggleFavorite(userId: string, movieId: string): Promise<boolean> {
    this.assertConnected()
    const user = await User.findOne({ clerk_id: userId })
    if (!user) throw new UserNotFoundError(userId)

    const isFavorite = (user.favorites ?? []).includes(movieId)
    await User.updateOne(
      { clerk_id: userId },
      isFavorite ? { $pull: { favorites: movieId } } : { $addToSet: { favorites: movieId } }
    )
    console.log(`${isFavorite ? '💔 Removed' : '⭐ Added'} movie ${movieId} ${isFavorite ? 'from' : 'to'} favorites of ${userId}`)
    return !isFavorite
  }

  async deleteUser(userId: string): Promise<void> {
    this.assertConnected()
    const result = await User.deleteOne({ clerk_id: userId })
    if (result.deletedCount === 0) throw new UserNotFoundError(userId)

    // Drop dangling references from everyone else's social lists
    await User.updateMany(
      {},
      { $pull: { blocked_users: userId, following: userId, followers: userId } }
    )
    console.log(`🗑️  Deleted user: ${userId}`)
  }

  private async assertUsersExist(...userIds: string[]): Promise<void> {
    this.assertConnected()
    const found = await User.find({ clerk_id: { $in: userIds } }).select('clerk_id').lean<Array<Pick<IUser, 'clerk_id'>>>()
    const foundIds = new Set(found.map((user) => user.clerk_id))
    for (const userId of userIds) {
      if (!foundIds.has(userId)) throw new UserNotFoundError(userId)
    }
  }

  private assertConnected(): void {
    if (!isDatabaseConnected()) {
      throw new ServiceUnavailableError()
    }
  }
}
