/**
 * Compact the review log offline (server stopped)
 * Usage: npm run compact-reviews
 *
 * Uses LEGACY_REVIEWS_PATH and REVIEW_LOG_PATH from the environment.
 */

import { LEGACY_REVIEWS_PATH, REVIEW_LOG_PATH } from '../src/config/env'
import { ReviewStore } from '../src/services/reviewStore'

async function compactReviews() {
  // A threshold this high keeps init() from compacting on its own
  const store = new ReviewStore({
    legacyPath: LEGACY_REVIEWS_PATH,
    logPath: REVIEW_LOG_PATH,
    compactionThreshold: Number.MAX_SAFE_INTEGER,
  })

  try {
    await store.init()
    const before = store.logEntryCount
    const discarded = await store.compact()
    console.log(`\n🎉 Review log compacted: ${before} → ${store.logEntryCount} entries (${discarded} discarded)`)
  } catch (error) {
    console.error('❌ Error compacting review log:', error)
    process.exitCode = 1
  } finally {
    await store.close()
  }
}

void compactReviews()
