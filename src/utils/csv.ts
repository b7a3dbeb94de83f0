import fs from 'fs'
import { parse } from 'csv-parse'
import { z } from 'zod'

export type CsvRecord = Record<string, string>

const csvRecordsSchema = z.array(z.record(z.string()))

/**
 * Read a CSV file with a header row into plain records keyed by column title.
 * Rows with fewer cells than the header simply omit the missing keys.
 */
export async function readCsvRecords(filePath: string): Promise<CsvRecord[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8')
  const parsed = await new Promise<unknown>((resolve, reject) => {
    parse(
      content,
      {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      },
      (err, records) => (err ? reject(err) : resolve(records)),
    )
  })
  return csvRecordsSchema.parse(parsed)
}
