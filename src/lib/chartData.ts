/** Chart-ready shapes for Recharts, derived from long-form records. */

import { numericValue } from './cells'
import type { LongRecord } from '../types'

export interface SeriesTable {
  /** One row per category, one numeric column per series */
  data: Record<string, string | number>[]
  seriesKeys: string[]
}

/**
 * Rows per metric, columns per entity: the shape RadarChart (angle = metric) expects.
 * Missing values are left out of the row so the renderer shows a gap.
 */
export function seriesByMetric(records: readonly LongRecord[]): SeriesTable {
  const rows = new Map<string, Record<string, string | number>>()
  const series: string[] = []
  for (const r of records) {
    const seriesKey = String(r.key ?? '')
    if (!series.includes(seriesKey)) series.push(seriesKey)
    let row = rows.get(r.metric)
    if (!row) {
      row = { metric: r.metric }
      rows.set(r.metric, row)
    }
    const v = numericValue(r.value)
    if (v !== undefined) row[seriesKey] = v
  }
  return { data: Array.from(rows.values()), seriesKeys: series }
}

/** Rows per entity, columns per metric: grouped bar chart with one bar per metric. */
export function seriesByEntity(records: readonly LongRecord[], entityLabel = 'entity'): SeriesTable {
  const rows = new Map<string, Record<string, string | number>>()
  const series: string[] = []
  for (const r of records) {
    const entity = String(r.key ?? '')
    if (!series.includes(r.metric)) series.push(r.metric)
    let row = rows.get(entity)
    if (!row) {
      row = { [entityLabel]: entity }
      rows.set(entity, row)
    }
    const v = numericValue(r.value)
    if (v !== undefined) row[r.metric] = v
  }
  return { data: Array.from(rows.values()), seriesKeys: series }
}
