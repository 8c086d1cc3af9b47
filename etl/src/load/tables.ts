import fs from 'node:fs'
import csv from 'csv-parser'
import { PipelineError, type Row } from '@pgx-graph/shared'

// PharmGKB TSVs are not CSV-quoted: list cells carry literal double quotes
// that must reach the list formatter untouched.
const NO_QUOTE = '\u0000'

const cleanHeader = ({ header }: { header: string }) => header.replace(/^\uFEFF/, '').trim()

/**
 * Parse a delimited file into header-keyed rows. Rejects when the header
 * lacks any of `columns`.
 */
function readRows(filePath: string, options: csv.Options, columns: readonly string[]): Promise<Row[]> {
  if (!fs.existsSync(filePath)) {
    return Promise.reject(new PipelineError(`input table not found: ${filePath}`))
  }
  return new Promise((resolve, reject) => {
    const rows: Row[] = []
    const source = fs.createReadStream(filePath)
    source
      .on('error', reject)
      .pipe(csv({ mapHeaders: cleanHeader, ...options }))
      .on('headers', (headers: string[]) => {
        const missing = columns.find(column => !headers.includes(column))
        if (missing === undefined) return
        source.destroy()
        reject(new PipelineError(`${filePath}: missing column ${missing}`))
      })
      .on('data', (row: Row) => rows.push(row))
      .on('end', () => resolve(rows))
      .on('error', reject)
  })
}

export const readTsv = (filePath: string, columns: readonly string[] = []) =>
  readRows(filePath, { separator: '\t', quote: NO_QUOTE }, columns)

export const readCsv = (filePath: string, columns: readonly string[] = []) => readRows(filePath, {}, columns)

/** Cell value with surrounding whitespace removed; missing cells read as empty. */
export const cell = (row: Row, column: string): string => (row[column] ?? '').trim()

/**
 * Two-column lookup from a conversion table. The first row for a key wins
 * and rows with an empty key or value are ignored.
 */
export function toLookup(rows: Row[], keyColumn: string, valueColumn: string): Map<string, string> {
  const lookup = new Map<string, string>()
  for (const row of rows) {
    const key = cell(row, keyColumn)
    const value = cell(row, valueColumn)
    if (key && value && !lookup.has(key)) lookup.set(key, value)
  }
  return lookup
}
