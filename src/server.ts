import type { Server } from 'http'
import { connectDatabase, disconnectDatabase, isDatabaseConnected } from './config/database'
import {
  PORT,
  CLERK_SECRET_KEY,
  CLERK_PUBLISHABLE_KEY,
  MONGODB_URI,
  LEGACY_REVIEWS_PATH,
  REVIEW_LOG_PATH,
  REVIEW_COMPACTION_THRESHOLD,
} from './config/env'
import { createApp } from './app'
import { ReviewStore } from './services/reviewStore'
import { MongoUserDirectory } from './services/userDirectory'
import { MongoMovieCatalog } from './services/movieCatalog'
import { MongoReportLedger } from './services/reportLedger'

let server: Server | null = null
let store: ReviewStore | null = null

async function startServer() {
  try {
    console.log('Starting server and connecting to database')
    await connectDatabase()

    const movies = new MongoMovieCatalog()
    const users = new MongoUserDirectory()
    const reports = new MongoReportLedger()

    // Legacy reviews are matched to catalog movies by title, so the catalog comes first
    const titleIndex = isDatabaseConnected() ? await movies.getTitleIndex() : new Map<string, string>()
    if (titleIndex.size === 0) {
      console.warn('⚠️  Movie catalog is empty or unavailable; legacy reviews will keep their raw titles as movie IDs')
    }

    store = new ReviewStore({
      legacyPath: LEGACY_REVIEWS_PATH,
      logPath: REVIEW_LOG_PATH,
      compactionThreshold: REVIEW_COMPACTION_THRESHOLD,
      titleIndex,
    })
    await store.init()

    const app = createApp({ store, users, movies, reports })

    server = app.listen(PORT, () => {
      console.log(`🚀 Server is running on port ${PORT}`)
      console.log(`📡 API endpoint: http://localhost:${PORT}/api`)
      console.log(`🔐 Clerk Secret Key: ${CLERK_SECRET_KEY ? 'Set ✅' : 'Missing ❌'}`)
      console.log(`🔑 Clerk Publishable Key: ${CLERK_PUBLISHABLE_KEY ? 'Set ✅' : 'Missing ❌'}`)
      console.log(`🗄️  MongoDB URI: ${MONGODB_URI ? 'Set ✅' : 'Missing ❌'}`)
      console.log(`📝 Review log: ${REVIEW_LOG_PATH} (compaction every ${REVIEW_COMPACTION_THRESHOLD} operations)`)

      if (!CLERK_SECRET_KEY || !CLERK_PUBLISHABLE_KEY) {
        console.warn('⚠️  Warning: Clerk keys are missing. Authentication will not work properly.')
      }

      if (!MONGODB_URI) {
        console.warn('⚠️  Warning: MongoDB URI is missing. User and movie features will not work.')
      }
    })
  } catch (error) {
    console.error('❌ Failed to start server:', error)
    process.exit(1)
  }
}

// Handle graceful shutdown
async function shutdown(signal: string) {
  console.log(`${signal} received, shutting down gracefully...`)
  try {
    server?.close()
    await store?.close()
    await disconnectDatabase()
    process.exit(0)
  } catch (error) {
    console.error('❌ Error during shutdown:', error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})

process.on('SIGINT', () => {
  void shutdown('SIGINT')
})

void startServer()
