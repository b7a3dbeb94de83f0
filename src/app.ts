import express, { type Express, type Request, type Response, type NextFunction } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { clerkAuth } from './middleware/clerk'
import { ALLOWED_ORIGINS } from './config/env'
import type { ReviewStore } from './services/reviewStore'
import type { UserDirectory } from './services/userDirectory'
import type { MovieCatalog } from './services/movieCatalog'
import type { ReportLedger } from './services/reportLedger'
import { createReviewsRouter } from './routes/reviews'
import { createMoviesRouter } from './routes/movies'
import { createUsersRouter } from './routes/users'
import { createReportsRouter } from './routes/reports'

export interface AppDeps {
  store: ReviewStore
  users: UserDirectory
  movies: MovieCatalog
  reports: ReportLedger
}

function isAllowedOrigin(origin: string): boolean {
  // Normalize origin by removing trailing slashes for comparison
  const normalizedOrigin = origin.replace(/\/+$/, '').toLowerCase()

  for (const allowedOrigin of ALLOWED_ORIGINS) {
    if (normalizedOrigin === allowedOrigin.replace(/\/+$/, '').toLowerCase()) {
      return true
    }
  }

  // In development, also allow localhost with any port
  return process.env.NODE_ENV !== 'production' && normalizedOrigin.startsWith('http://localhost')
}

/**
 * Build the Express app around already-initialized collaborators.
 */
export function createApp(deps: AppDeps): Express {
  const app: Express = express()

  app.use(helmet())

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like mobile apps or curl requests)
      if (!origin || isAllowedOrigin(origin)) {
        return callback(null, true)
      }
      console.warn(`⚠️  CORS blocked origin: ${origin}`)
      callback(new Error('Not allowed by CORS'))
    },
    credentials: true, // Allow the Clerk session cookie
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }))

  app.use(express.json({ limit: '1mb' }))

  // Attaches auth data when a session is present; anonymous requests pass through
  app.use(clerkAuth)

  app.get('/api/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Server is running',
      total_reviews: deps.store.size,
      timestamp: new Date().toISOString(),
    })
  })

  app.use('/api/reviews', createReviewsRouter(deps))
  app.use('/api/movies', createMoviesRouter(deps))
  app.use('/api/users', createUsersRouter(deps))
  app.use('/api/reports', createReportsRouter(deps))

  // 404 handler
  app.use((req: Request, res: Response) => {
    console.warn(`⚠️  404 - Route not found: ${req.method} ${req.originalUrl || req.url}`)
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.originalUrl || req.url,
      method: req.method,
    })
  })

  // Error handler
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    console.error('Error:', err)
    if (res.headersSent) {
      return next(err)
    }
    res.status(500).json({
      success: false,
      error: err.message || 'Internal server error',
    })
  })

  return app
}
