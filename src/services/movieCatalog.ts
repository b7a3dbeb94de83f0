import Movie, { type IMovie } from '../models/movies'
import { isDatabaseConnected } from '../config/database'
import { ServiceUnavailableError } from '../utils/errors'

export interface MovieRecord {
  movie_id: string
  title: string
  genre: string | null
  year: number | null
  director: string | null
  description: string | null
}

/**
 * The movie catalog, as seen by the review routes.
 */
export interface MovieCatalog {
  getMovie(movieId: string): Promise<MovieRecord | null>
  movieExists(movieId: string): Promise<boolean>
  /** Trimmed title -> movie_id, for resolving legacy reviews */
  getTitleIndex(): Promise<Map<string, string>>
  /** Returns false when the movie did not exist */
  deleteMovie(movieId: string): Promise<boolean>
}

type MovieFields = Pick<IMovie, 'movie_id' | 'title' | 'genre' | 'year' | 'director' | 'description'>

export function formatMovieForAPI(movie: MovieFields): MovieRecord {
  return {
    movie_id: movie.movie_id,
    title: movie.title,
    genre: movie.genre ?? null,
    year: movie.year ?? null,
    director: movie.director ?? null,
    description: movie.description ?? null,
  }
}

/**
 * MovieCatalog backed by the `movies` collection.
 */
export class MongoMovieCatalog implements MovieCatalog {
  async getMovie(movieId: string): Promise<MovieRecord | null> {
    this.assertConnected()
    const movie = await Movie.findOne({ movie_id: movieId }).lean<MovieFields>()
    return movie ? formatMovieForAPI(movie) : null
  }

  async movieExists(movieId: string): Promise<boolean> {
    this.assertConnected()
    const found = await Movie.exists({ movie_id: movieId })
    return found !== null
  }

  async getTitleIndex(): Promise<Map<string, string>> {
    this.assertConnected()
    const movies = await Movie.find({}).select('movie_id title').lean<Array<Pick<IMovie, 'movie_id' | 'title'>>>()

    const index = new Map<string, string>()
    for (const movie of movies) {
      const title = movie.title.trim()
      // First entry wins for duplicate titles
      if (!index.has(title)) index.set(title, movie.movie_id)
    }
    console.log(`🎬 Indexed ${index.size} movie titles`)
    return index
  }

  async deleteMovie(movieId: string): Promise<boolean> {
    this.assertConnected()
    const result = await Movie.deleteOne({ movie_id: movieId })
    if (result.deletedCount > 0) {
      console.log(`🗑️  Deleted movie: ${movieId}`)
      return true
    }
    return false
  }

  private assertConnected(): void {
    if (!isDatabaseConnected()) {
      throw new ServiceUnavailableError()
    }
  }
}
