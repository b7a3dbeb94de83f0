import fs from 'fs'
import os from 'os'
import path from 'path'

export const LEGACY_HEADER = "movie,User,User's Rating out of 10,Review,Date of Review"

export const LOG_HEADER = 'operation,review_id,movie_id,user_id,imdb_username,rating,review_text,review_date'

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'reviews-test-'))
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

export function writeLines(filePath: string, lines: string[]): void {
  fs.writeFileSync(filePath, lines.join('\n') + '\n', 'utf-8')
}

/** Non-empty lines of a text file */
export function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, 'utf-8').split('\n').filter((line) => line.length > 0)
}
