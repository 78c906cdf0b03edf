/**
 * Industry-level aggregation and wide <-> long reshaping.
 * toLongForm is shared by the industry view (aggregated rows) and the entity view (matched rows).
 */

import { mean } from 'simple-statistics'
import { ConfigurationError } from './errors'
import { isMissing, numericValue } from './cells'
import type {
  AggregatedGroup,
  AggregatedView,
  CellValue,
  ColumnClassification,
  DataRow,
  Dataset,
  GroupKey,
  LongRecord,
} from '../types'

/** Throws unless metrics is a non-empty subset of the classified metric columns. */
export function assertMetrics(classification: ColumnClassification, metrics: readonly string[]): void {
  if (metrics.length === 0) throw new ConfigurationError('at least one metric is required')
  const unknown = metrics.filter((m) => !classification.metricColumns.includes(m))
  if (unknown.length > 0) throw new ConfigurationError(`not a metric column: ${unknown.join(', ')}`)
}

export function requireGroupingColumn(classification: ColumnClassification): string {
  if (!classification.groupingColumn) throw new ConfigurationError('dataset has no industry column')
  return classification.groupingColumn
}

function groupKey(value: CellValue | undefined): GroupKey | undefined {
  if (isMissing(value)) return undefined
  return value
}

export function aggregateByGroup(
  dataset: Dataset,
  classification: ColumnClassification,
  metrics: readonly string[]
): AggregatedView {
  const groupingColumn = requireGroupingColumn(classification)
  assertMetrics(classification, metrics)

  // Map keeps insertion order: groups come out in first-appearance order
  const buckets = new Map<GroupKey, { count: number; values: Record<string, number[]> }>()
  for (const row of dataset.rows) {
    const key = groupKey(row[groupingColumn])
    if (key === undefined) continue
    let bucket = buckets.get(key)
    if (!bucket) {
      const values: Record<string, number[]> = {}
      for (const m of metrics) values[m] = []
      bucket = { count: 0, values }
      buckets.set(key, bucket)
    }
    bucket.count++
    for (const m of metrics) {
      const v = numericValue(row[m])
      if (v !== undefined) bucket.values[m].push(v)
    }
  }

  const groups: AggregatedGroup[] = []
  for (const [key, bucket] of buckets) {
    const means: Record<string, number | undefined> = {}
    for (const m of metrics) {
      const vals = bucket.values[m]
      means[m] = vals.length > 0 ? mean(vals) : undefined
    }
    groups.push({ key, count: bucket.count, means })
  }

  return { groupingColumn, metrics: [...metrics], groups }
}

/** The aggregated view as wide rows: grouping column plus one column per metric (null when absent). */
export function aggregatedRows(view: AggregatedView): DataRow[] {
  return view.groups.map((g) => {
    const row: DataRow = { [view.groupingColumn]: g.key }
    for (const m of view.metrics) row[m] = g.means[m] ?? null
    return row
  })
}

/** One record per (row, value column), row order then column order. No filtering. */
export function toLongForm(
  wideRows: readonly DataRow[],
  keyColumn: string,
  valueColumns: readonly string[]
): LongRecord[] {
  const out: LongRecord[] = []
  for (const row of wideRows) {
    const key = row[keyColumn] ?? null
    for (const metric of valueColumns) {
      out.push({ key, metric, value: row[metric] ?? null })
    }
  }
  return out
}

/** Inverse of toLongForm: group by key (first-appearance order), metric names back to columns. */
export function toWideForm(records: readonly LongRecord[], keyColumn: string): DataRow[] {
  const rows = new Map<CellValue, DataRow>()
  for (const r of records) {
    let row = rows.get(r.key)
    if (!row) {
      row = { [keyColumn]: r.key }
      rows.set(r.key, row)
    }
    row[r.metric] = r.value
  }
  return Array.from(rows.values())
}

/** Numeric values of a long-form sequence (missing and text dropped), e.g. for suggestRange. */
export function longFormValues(records: readonly LongRecord[]): number[] {
  const out: number[] = []
  for (const r of records) {
    const v = numericValue(r.value)
    if (v !== undefined) out.push(v)
  }
  return out
}

/**
 * Radial axis range with visual headroom: min*0.9 / max*1.1 for positive bounds,
 * unpadded when the bound is zero or negative so the sign never flips.
 */
export function suggestRange(values: readonly number[]): [number, number] {
  const finite = values.filter((v) => Number.isFinite(v))
  if (finite.length === 0) throw new ConfigurationError('cannot suggest a range for an empty value list')
  let lo = finite[0]
  let hi = finite[0]
  for (const v of finite) {
    if (v < lo) lo = v
    if (v > hi) hi = v
  }
  return [lo > 0 ? lo * 0.9 : lo, hi > 0 ? hi * 1.1 : hi]
}

/** Number of rows per industry, largest first; ties keep first-appearance order. */
export function countByGroup(
  dataset: Dataset,
  classification: ColumnClassification
): { key: GroupKey; count: number }[] {
  const groupingColumn = requireGroupingColumn(classification)
  const counts = new Map<GroupKey, number>()
  for (const row of dataset.rows) {
    const key = groupKey(row[groupingColumn])
    if (key === undefined) continue
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }
  return Array.from(counts, ([key, count]) => ({ key, count })).sort((a, b) => b.count - a.count)
}
