// Load environment variables from .env file
// This must be at the very top, before any other imports
import dotenv from 'dotenv'
dotenv.config()

/**
 * Centralized environment variables configuration
 * All environment variables should be loaded and exported from here
 * Other files should import from this file instead of accessing process.env directly
 */

// Server configuration
export const PORT = Number(process.env.PORT) || 5000
// Normalize FRONTEND_URL by removing trailing slashes
export const FRONTEND_URL = (process.env.FRONTEND_URL || 'http://localhost:3000').replace(/\/+$/, '')

// Comma-separated list of allowed origins (e.g., "http://localhost:3000,https://reviews.example.com")
export const ALLOWED_ORIGINS = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map(url => url.trim().replace(/\/+$/, ''))
  : [FRONTEND_URL]

// Clerk Authentication
export const CLERK_SECRET_KEY = process.env.CLERK_SECRET_KEY || ''
export const CLERK_PUBLISHABLE_KEY = process.env.CLERK_PUBLISHABLE_KEY || ''

// MongoDB (users and movie catalog)
export const MONGODB_URI = process.env.MONGODB_URI || ''

// Review storage
// The legacy export is read once at startup and never written
export const LEGACY_REVIEWS_PATH = process.env.LEGACY_REVIEWS_PATH || 'data/imdb_reviews.csv'
export const REVIEW_LOG_PATH = process.env.REVIEW_LOG_PATH || 'data/new_reviews.csv'
export const REVIEW_COMPACTION_THRESHOLD = parsePositiveInt(process.env.REVIEW_COMPACTION_THRESHOLD, 100)

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < 1) {
    console.warn(`⚠️  Ignoring invalid REVIEW_COMPACTION_THRESHOLD "${value}", using ${fallback}`)
    return fallback
  }
  return parsed
}

// Validation and warnings
if (!CLERK_SECRET_KEY) {
  console.warn('⚠️  CLERK_SECRET_KEY is not set in environment variables')
  console.warn('   Add it to your .env file: CLERK_SECRET_KEY=sk_test_...')
}

if (!CLERK_PUBLISHABLE_KEY) {
  console.warn('⚠️  CLERK_PUBLISHABLE_KEY is not set in environment variables')
  console.warn('   Add it to your .env file: CLERK_PUBLISHABLE_KEY=pk_test_...')
}

if (!MONGODB_URI) {
  console.warn('⚠️  MONGODB_URI is not set in environment variables')
  console.warn('   Add it to your .env file: MONGODB_URI=mongodb+srv://...')
}
