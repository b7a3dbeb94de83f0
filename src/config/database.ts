import mongoose from 'mongoose'
import { MONGODB_URI } from './env'

/**
 * MongoDB connection for the user directory and the movie catalog.
 * Reviews do not live here; they are kept in the CSV operation log.
 */

let isConnected = false

/**
 * Connect to MongoDB
 * This function should be called once when the server starts
 */
export async function connectDatabase(): Promise<void> {
  if (isConnected) {
    console.log('📦 MongoDB already connected')
    return
  }

  if (!MONGODB_URI) {
    console.error('❌ Cannot connect to MongoDB: MONGODB_URI is not set')
    return
  }

  try {
    console.log('🔄 Attempting to connect to MongoDB...')
    await mongoose.connect(MONGODB_URI)

    isConnected = true
    const dbName = mongoose.connection.db?.databaseName || 'reelreview'
    console.log(`✅ Connected to MongoDB`)
    console.log(`📦 Database: ${dbName}`)
    console.log(`🔌 Connection state: ${mongoose.connection.readyState} (1 = connected)`)

    mongoose.connection.on('error', (err) => {
      console.error('❌ MongoDB connection error:', err)
      isConnected = false
    })

    mongoose.connection.on('disconnected', () => {
      console.warn('⚠️  MongoDB disconnected')
      isConnected = false
    })

    mongoose.connection.on('reconnected', () => {
      console.log('✅ MongoDB reconnected')
      isConnected = true
    })
  } catch (error) {
    console.error('❌ Failed to connect to MongoDB:', error)
    isConnected = false
    throw error
  }
}

/**
 * Disconnect from MongoDB
 * Useful for graceful shutdown
 */
export async function disconnectDatabase(): Promise<void> {
  if (!isConnected) {
    return
  }

  try {
    await mongoose.disconnect()
    isConnected = false
    console.log('📦 Disconnected from MongoDB')
  } catch (error) {
    console.error('❌ Error disconnecting from MongoDB:', error)
    throw error
  }
}

/**
 * Check if database is connected
 * readyState: 0 = disconnected, 1 = connected, 2 = connecting, 3 = disconnecting
 */
export function isDatabaseConnected(): boolean {
  const readyState = mongoose.connection.readyState
  const connected = readyState === 1

  if (!connected) {
    console.warn(`⚠️  MongoDB connection state: ${readyState} (0=disconnected, 1=connected, 2=connecting, 3=disconnecting)`)
  }

  return connected
}

export default mongoose
