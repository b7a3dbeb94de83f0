import mongoose, { Schema, type Document, type Model } from 'mongoose'

/**
 * Movie catalog entry. Reviews reference movies by `movie_id`, and legacy reviews are
 * matched to movies by title.
 */
export interface IMovie extends Document {
  movie_id: string
  title: string
  genre?: string
  year?: number
  director?: string
  description?: string
  created_at: Date
  updated_at: Date
}

const MovieSchema = new Schema<IMovie>(
  {
    movie_id: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    title: {
      type: String,
      required: true,
      trim: true,
      index: true,
    },
    genre: {
      type: String,
      trim: true,
    },
    year: {
      type: Number,
      min: 1870,
    },
    director: {
      type: String,
      trim: true,
    },
    description: {
      type: String,
    },
  },
  {
    timestamps: {
      createdAt: 'created_at',
      updatedAt: 'updated_at',
    },
  }
)

const Movie: Model<IMovie> = mongoose.models.Movie || mongoose.model<IMovie>('Movie', MovieSchema, 'movies')

export default Movie
