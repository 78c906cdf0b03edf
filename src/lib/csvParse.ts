import Papa from 'papaparse'
import { DEFAULT_CONVENTIONS, type ColumnConventions } from '../config'
import { findIdentifierColumn } from './schemaClassifier'
import { createLogger } from './logger'
import type { CellValue, DataRow, Dataset } from '../types'

const log = createLogger('csv')

export type LoadResult = { ok: true; dataset: Dataset; renamedIndex: boolean } | { ok: false; error: string }

const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const ZERO_PADDED_INTEGER = /^[+-]?0\d+$/

/** Decimal text ("45.0", "40.10", "1e3") becomes a number; zero-padded codes like "000001" stay text. */
function toCell(raw: string | undefined): CellValue {
  const trimmed = (raw ?? '').trim()
  if (trimmed === '') return null
  if (DECIMAL_TEXT.test(trimmed) && !ZERO_PADDED_INTEGER.test(trimmed)) {
    const num = Number(trimmed)
    if (Number.isFinite(num)) return num
  }
  return trimmed
}

function headerNames(rawHeaders: string[], conventions: ColumnConventions): string[] {
  return rawHeaders.map((h, j) => {
    const s = h != null ? String(h).trim() : ''
    if (s) return s
    // spreadsheet exports leave the index header blank
    return j === 0 ? conventions.unnamedIndexColumn : `Column_${j + 1}`
  })
}

/**
 * Parse exported CSV text into a dataset. The unnamed index column becomes the
 * stock code column when that one is not already present, and is dropped as a
 * plain row index when it is. Failures come back as user-facing messages, not
 * engine errors.
 */
export function parseDatasetCSV(csvText: string, conventions: ColumnConventions = DEFAULT_CONVENTIONS): LoadResult {
  let text = csvText
  if (text.charCodeAt(0) === 0xfeff) text = text.slice(1)
  const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true })
  if (parsed.errors.length > 0) {
    log.warn('csv parse reported issues', { count: parsed.errors.length, first: parsed.errors[0].message })
  }
  const rows = parsed.data
  if (rows.length < 2) return { ok: false, error: 'No columns or data found in the CSV. Use a header row and at least one data row.' }

  const headers = headerNames(rows[0], conventions)
  const identifier = conventions.identifierCandidates[0]
  const hasIndex = headers.includes(conventions.unnamedIndexColumn)
  const hasNamedIdentifier = conventions.identifierCandidates.some((c) => headers.includes(c))
  let renamedIndex = false
  let fields = headers.map((name, index) => ({ name, index }))
  if (hasIndex && hasNamedIdentifier) {
    fields = fields.filter((f) => f.name !== conventions.unnamedIndexColumn)
    log.debug('dropped row index column', { column: conventions.unnamedIndexColumn })
  } else if (hasIndex) {
    fields = fields.map((f) => (f.name === conventions.unnamedIndexColumn ? { ...f, name: identifier } : f))
    renamedIndex = true
    log.debug('renamed unnamed index column', { to: identifier })
  }
  const columns = fields.map((f) => f.name)

  if (!findIdentifierColumn(columns, conventions)) {
    return { ok: false, error: `Missing required column: ${identifier}` }
  }

  const dataRows: DataRow[] = []
  for (let i = 1; i < rows.length; i++) {
    const raw = rows[i]
    const obj: DataRow = {}
    for (const f of fields) obj[f.name] = toCell(raw[f.index])
    dataRows.push(obj)
  }

  log.info('csv loaded', { rows: dataRows.length, columns: columns.length })
  return { ok: true, dataset: { columns, rows: dataRows }, renamedIndex }
}
