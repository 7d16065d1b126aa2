/**
 * CSV row sources
 * @module import/sources/csv-source
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import Papa from 'papaparse'
import { BatchFatalError } from '../import-error.js'
import type { RowSource, SourceRow, SourceTable } from '../types.js'

/**
 * Parses CSV text with a header row. Headers and cells are trimmed, blank
 * lines are skipped, and short rows are padded with empty cells.
 *
 * @throws {BatchFatalError} with kind `unreadable` on malformed quoting or
 * when there is no header row
 */
export function readCsvRows(text: string): SourceTable {
  const input = text.replace(/^\uFEFF/, '')
  if (input.trim() === '') {
    return { columns: [], rows: [] }
  }

  const result = Papa.parse<Record<string, unknown>>(input, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  })

  const fatal = result.errors.find((error) => error.type === 'Quotes')
  if (fatal) {
    const at = fatal.row === undefined ? '' : ` (row ${fatal.row + 1})`
    throw new BatchFatalError(`Unreadable file format: ${fatal.message}${at}`, 'unreadable')
  }

  const columns = (result.meta.fields ?? []).filter((field) => field !== '')
  if (columns.length === 0) {
    throw new BatchFatalError('Unreadable file format: no header row', 'unreadable')
  }

  const rows = result.data.map((record) => {
    const row: SourceRow = {}
    for (const column of columns) {
      const cell = record[column]
      row[column] = typeof cell === 'string' ? cell.trim() : ''
    }
    return row
  })
  return { columns, rows }
}

/**
 * Source over CSV text already in memory (an upload, a Sheets export)
 */
export function csvTextSource(text: string, description = 'csv'): RowSource {
  return {
    description,
    read: async () => readCsvRows(text),
  }
}

/**
 * Source over a CSV file. A file that cannot be opened is a source failure,
 * not an unreadable file.
 */
export function csvFileSource(path: string): RowSource {
  return {
    description: basename(path),
    read: async () => readCsvRows(await readFile(path, 'utf8')),
  }
}
