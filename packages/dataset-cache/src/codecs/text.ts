/**
 * Delimited-text codec.
 *
 * Text caches store every cell as a string, so reading is two steps:
 * SheetJS splits the text into raw cells (no value guessing), then the
 * column-type table turns each column into dates, numbers, booleans or
 * strings. `date` and `value` are always typed; other columns use their
 * declaration or are inferred from their cells.
 */

import * as XLSX from 'xlsx'
import type { CellValue, DataRow, DataTable } from '@brrealty/contracts'
import { columnsOf } from '@brrealty/contracts'
import type { ColumnType, ColumnTypes } from '../types.js'

export const DEFAULT_COLUMN_TYPES: ColumnTypes = {
  date: 'date',
  value: 'number',
}

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/
const BOOLEAN_CELLS = new Set(['TRUE', 'FALSE', 'true', 'false'])

export class TableDecodeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TableDecodeError'
  }
}

function isMissing(cell: string): boolean {
  const trimmed = cell.trim()
  return trimmed === '' || trimmed === 'NA'
}

function inferType(cells: (string | null)[]): ColumnType {
  const present = cells.filter((cell): cell is string => cell !== null && !isMissing(cell))
  if (present.length === 0) {
    return 'string'
  }
  if (present.every((cell) => NUMBER_PATTERN.test(cell.trim()))) {
    return 'number'
  }
  if (present.every((cell) => BOOLEAN_CELLS.has(cell.trim()))) {
    return 'boolean'
  }
  return 'string'
}

/**
 * Normalizes a date cell to `YYYY-MM-DD`. Accepts ISO dates and ISO
 * timestamps; anything else is a decode error.
 */
function toIsoDate(cell: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/.exec(cell.trim())
  if (match?.[1] === undefined) {
    throw new TableDecodeError(`Unparseable date cell: "${cell}"`)
  }
  return match[1]
}

function coerce(cell: string | null, type: ColumnType): CellValue {
  if (cell === null || isMissing(cell)) {
    return null
  }
  switch (type) {
    case 'date':
      return toIsoDate(cell)
    case 'number': {
      const parsed = Number(cell.trim())
      return Number.isNaN(parsed) ? null : parsed
    }
    case 'boolean':
      return cell.trim().toLowerCase() === 'true'
    case 'string':
      return cell
  }
}

function cellText(cell: unknown): string | null {
  if (cell === null || cell === undefined) {
    return null
  }
  return String(cell)
}

/**
 * Parses delimited text into a typed table.
 *
 * @throws TableDecodeError when the header lacks `date` or `value`,
 *         or a date cell cannot be read
 */
export function decodeText(text: string, declared: ColumnTypes = {}): DataTable {
  const workbook = XLSX.read(text, { type: 'string', raw: true })
  const sheetName = workbook.SheetNames[0]
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName]
  if (sheet === undefined) {
    return []
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false })
  const [header, ...body] = grid
  if (header === undefined) {
    return []
  }

  const columns = header.map((cell) => String(cell ?? '').trim())
  if (!columns.includes('date') || !columns.includes('value')) {
    throw new TableDecodeError(`Missing date/value columns (found: ${columns.join(', ')})`)
  }

  const cells = body.map((row) => columns.map((_, index) => cellText(row[index])))
  const types = { ...DEFAULT_COLUMN_TYPES, ...declared }
  const columnTypes = columns.map(
    (column, index) => types[column] ?? inferType(cells.map((row) => row[index] ?? null))
  )

  return cells.map((row) => {
    const record: Record<string, CellValue> = {}
    columns.forEach((column, index) => {
      record[column] = coerce(row[index] ?? null, columnTypes[index] ?? 'string')
    })
    return toDataRow(record)
  })
}

function toDataRow(record: Record<string, CellValue>): DataRow {
  const { date, value, ...rest } = record
  if (typeof date !== 'string') {
    throw new TableDecodeError('Row without a date')
  }
  return { ...rest, date, value: typeof value === 'number' ? value : null }
}

/**
 * Serializes a table to CSV with `date` and `value` first. Missing cells
 * are written empty.
 */
export function encodeText(table: DataTable): string {
  const rest = columnsOf(table).filter((column) => column !== 'date' && column !== 'value')
  const header = ['date', 'value', ...rest]
  const sheet = XLSX.utils.json_to_sheet(table, { header })
  if (table.length === 0) {
    return `${header.join(',')}\n`
  }
  return `${XLSX.utils.sheet_to_csv(sheet, { rawNumbers: true })}\n`
}
