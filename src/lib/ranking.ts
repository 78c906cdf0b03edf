import { ConfigurationError } from './errors'
import { numericValue } from './cells'
import type { ColumnClassification, DataRow, Dataset, RankDirection } from '../types'

/**
 * Top-N rows by a metric. Stable: ties keep source order, so ranking is reproducible.
 * Missing values sort last in both directions.
 */
export function rank(
  dataset: Dataset,
  classification: ColumnClassification,
  metric: string,
  direction: RankDirection,
  limit: number
): DataRow[] {
  if (!classification.metricColumns.includes(metric)) {
    throw new ConfigurationError(`not a metric column: ${metric}`)
  }
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`limit must be a positive integer, got ${limit}`)
  }
  const sign = direction === 'ascending' ? 1 : -1
  const decorated = dataset.rows.map((row, index) => ({ row, index, value: numericValue(row[metric]) }))
  decorated.sort((a, b) => {
    if (a.value === undefined || b.value === undefined) {
      if (a.value === b.value) return a.index - b.index
      return a.value === undefined ? 1 : -1
    }
    if (a.value !== b.value) return sign * (a.value - b.value)
    return a.index - b.index
  })
  return decorated.slice(0, limit).map((d) => d.row)
}

/** Columns shown in the ranking table: name (when present), identifier, metric. */
export function rankingColumns(classification: ColumnClassification, metric: string): string[] {
  const cols = classification.nameColumn ? [classification.nameColumn] : []
  cols.push(classification.identifierColumn, metric)
  return cols
}

export function rankingTable(
  rows: readonly DataRow[],
  classification: ColumnClassification,
  metric: string
): DataRow[] {
  const cols = rankingColumns(classification, metric)
  return rows.map((row) => Object.fromEntries(cols.map((c) => [c, row[c] ?? null])))
}
