/**
 * Excel workbook row sources
 * @module import/sources/xlsx-source
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { Readable } from 'node:stream'
import ExcelJS from 'exceljs'
import { errorMessage } from '../../utils/errors.js'
import { BatchFatalError } from '../import-error.js'
import type { RowSource, SourceRow, SourceTable } from '../types.js'

export interface XlsxReadOptions {
  /** Worksheet to read; the first sheet by default */
  sheet?: string
}

/**
 * Date cells carry the wall-clock time as UTC; written without a zone so
 * they read the same as a CSV export of the sheet
 */
function formatDateCell(value: Date): string {
  const iso = value.toISOString()
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`
}

/**
 * Display text of a cell: formulas give their cached result, rich text and
 * hyperlinks their text, error cells nothing
 */
export function cellText(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (value instanceof Date) return formatDateCell(value)
  if ('richText' in value) return value.richText.map((run) => run.text).join('')
  if ('hyperlink' in value) return value.text
  if ('error' in value) return ''
  if ('result' in value) {
    const result = value.result
    if (result instanceof Date) return formatDateCell(result)
    // error results are objects
    if (result === undefined || typeof result === 'object') return ''
    return String(result)
  }
  return ''
}

/**
 * Reads one worksheet with a header row. The first row with any value is
 * the header; headers and cells are trimmed, blank rows are skipped and
 * columns with a blank header are dropped.
 *
 * @throws {BatchFatalError} with kind `unreadable` when the data is not a
 * workbook or the sheet does not exist
 */
export async function readXlsxRows(
  data: Uint8Array,
  options: XlsxReadOptions = {}
): Promise<SourceTable> {
  const workbook = new ExcelJS.Workbook()
  try {
    await workbook.xlsx.read(Readable.from([data]))
  } catch (error) {
    throw new BatchFatalError(`Unreadable file format: ${errorMessage(error)}`, 'unreadable')
  }

  const sheet = options.sheet ? workbook.getWorksheet(options.sheet) : workbook.worksheets[0]
  if (!sheet) {
    const missing = options.sheet ? `no sheet named '${options.sheet}'` : 'workbook has no sheets'
    throw new BatchFatalError(`Unreadable file format: ${missing}`, 'unreadable')
  }

  const lines: string[][] = []
  sheet.eachRow({ includeEmpty: false }, (row) => {
    const cells = Array.from({ length: row.cellCount }, () => '')
    row.eachCell({ includeEmpty: false }, (cell, column) => {
      cells[column - 1] = cellText(cell.value).trim()
    })
    if (cells.some((cell) => cell !== '')) lines.push(cells)
  })

  const [header, ...body] = lines
  if (!header) {
    return { columns: [], rows: [] }
  }

  const indexed = header
    .map((name, index) => ({ name, index }))
    .filter(({ name }) => name !== '')
  const rows = body.map((cells) => {
    const row: SourceRow = {}
    for (const { name, index } of indexed) {
      row[name] = cells[index] ?? ''
    }
    return row
  })
  return { columns: indexed.map(({ name }) => name), rows }
}

/**
 * Source over workbook bytes already in memory (an upload)
 */
export function xlsxBufferSource(
  data: Uint8Array,
  description = 'xlsx',
  options: XlsxReadOptions = {}
): RowSource {
  return {
    description,
    read: async () => readXlsxRows(data, options),
  }
}

/**
 * Source over an `.xlsx` file such as a Pathful session export. A file that
 * cannot be opened is a source failure, not an unreadable file.
 */
export function xlsxFileSource(path: string, options: XlsxReadOptions = {}): RowSource {
  return {
    description: basename(path),
    read: async () => readXlsxRows(await readFile(path), options),
  }
}
