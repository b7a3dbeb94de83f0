import { clerkClientInstance } from '../middleware/clerk'
import User, { type IUser } from '../models/users'
import { isDatabaseConnected } from '../config/database'
import { ServiceUnavailableError } from '../utils/errors'

/**
 * Sync user data from Clerk to MongoDB
 * Fetches the Clerk user and creates or refreshes the local record. Moderation and
 * social fields are never touched here.
 */
export async function syncUserFromClerk(clerkUserId: string): Promise<IUser | null> {
  if (!isDatabaseConnected()) {
    console.error('❌ MongoDB is not connected. Cannot sync user.')
    throw new ServiceUnavailableError()
  }

  try {
    const clerkUser = await clerkClientInstance.users.getUser(clerkUserId)

    if (!clerkUser) {
      console.error(`User not found in Clerk: ${clerkUserId}`)
      return null
    }

    const userData = {
      clerk_id: clerkUser.id,
      email: clerkUser.emailAddresses[0]?.emailAddress || '',
      username: clerkUser.username || undefined,
      full_name: `${clerkUser.firstName || ''} ${clerkUser.lastName || ''}`.trim() || undefined,
      profile_picture: clerkUser.imageUrl || undefined,
      last_synced_from_clerk: new Date(),
    }

    // role, is_suspended and the social lists keep their schema defaults on insert
    const user = await User.findOneAndUpdate(
      { clerk_id: clerkUserId },
      { $set: userData },
      {
        upsert: true,
        new: true,
        runValidators: true,
        setDefaultsOnInsert: true,
      }
    )
    if (!user) return null

    console.log(`🔄 Synced user from Clerk: ${user.clerk_id} (${user.email})`)
    return user
  } catch (error) {
    console.error(`Error syncing user from Clerk (${clerkUserId}):`, error)
    throw error
  }
}

/**
 * Get user from MongoDB by Clerk ID
 * If user doesn't exist, sync from Clerk first
 */
export async function getOrSyncUser(clerkUserId: string): Promise<IUser | null> {
  if (!isDatabaseConnected()) {
    throw new ServiceUnavailableError()
  }

  const user = await User.findOne({ clerk_id: clerkUserId })
  if (user) return user

  console.log(`🔄 Syncing new user from Clerk: ${clerkUserId}`)
  return syncUserFromClerk(clerkUserId)
}
