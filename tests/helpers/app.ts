import path from 'path'
import type { Express } from 'express'
import { createApp } from '../../src/app'
import { ReviewStore } from '../../src/services/reviewStore'
import { InMemoryMovieCatalog, InMemoryReportLedger, InMemoryUserDirectory } from './fakes'
import { LEGACY_HEADER, writeLines } from './tempFiles'

export interface TestContext {
  app: Express
  store: ReviewStore
  users: InMemoryUserDirectory
  movies: InMemoryMovieCatalog
  reports: InMemoryReportLedger
}

/**
 * App wired to a file-backed store in `dir` and in-memory users and movies.
 *
 * Users: u1, u2 (suspended), u3, admin1 (admin). Movies: m1 "The Matrix", m2 "Heat".
 * One imported review of m1 (review_000001, rating 4).
 */
export async function createTestContext(dir: string): Promise<TestContext> {
  const users = new InMemoryUserDirectory()
  users.addUser('u1')
  users.addUser('u2', { is_suspended: true })
  users.addUser('u3')
  users.addUser('admin1', { role: 'admin' })

  const movies = new InMemoryMovieCatalog()
  movies.addMovie('m1', 'The Matrix')
  movies.addMovie('m2', 'Heat')

  const legacyPath = path.join(dir, 'legacy.csv')
  writeLines(legacyPath, [LEGACY_HEADER, 'The Matrix,neo_fan,8,Mind-bending,2005-06-01'])

  const store = new ReviewStore({
    legacyPath,
    logPath: path.join(dir, 'log.csv'),
    titleIndex: await movies.getTitleIndex(),
  })
  await store.init()

  const reports = new InMemoryReportLedger()

  return { app: createApp({ store, users, movies, reports }), store, users, movies, reports }
}
