import mongoose, { Schema, type Document, type Model } from 'mongoose'

/**
 * Platform user, keyed by the Clerk user ID that authenticated requests carry.
 * The Clerk ID is also the `user_id` stamped on every review the user writes.
 */
export interface IUser extends Document {
  clerk_id: string
  email: string
  username?: string
  full_name?: string
  profile_picture?: string
  role: 'user' | 'admin'

  // Moderation and social graph
  is_suspended: boolean
  blocked_users: string[] // Clerk IDs; blocking is stored on both users
  following: string[]
  followers: string[]
  favorites: string[] // movie_ids

  created_at: Date
  updated_at: Date
  last_synced_from_clerk?: Date
}

const UserSchema = new Schema<IUser>(
  {
    clerk_id: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
    },
    username: {
      type: String,
      unique: true,
      sparse: true, // Allow multiple null values
      trim: true,
      lowercase: true,
    },
    full_name: {
      type: String,
      trim: true,
    },
    profile_picture: {
      type: String,
    },
    role: {
      type: String,
      enum: ['user', 'admin'],
      default: 'user',
    },
    is_suspended: {
      type: Boolean,
      default: false,
      index: true,
    },
    blocked_users: {
      type: [String],
      default: [],
    },
    following: {
      type: [String],
      default: [],
    },
    followers: {
      type: [String],
      default: [],
    },
    favorites: {
      type: [String],
      default: [],
    },
    last_synced_from_clerk: {
      type: Date,
    },
  },
  {
    timestamps: {
      createdAt: 'created_at',
      updatedAt: 'updated_at',
    },
  }
)

const User: Model<IUser> = mongoose.models.User || mongoose.model<IUser>('User', UserSchema, 'users')

export default User
