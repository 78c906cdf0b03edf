/**
 * Per-metric summaries behind the distribution and correlation charts.
 */

import { mean, median, min, max } from 'simple-statistics'
import { ConfigurationError } from './errors'
import { isMissing, numericValue, textValue } from './cells'
import { entityKeyColumn } from './comparison'
import type { ColumnClassification, Dataset, GroupKey } from '../types'

export interface MetricSummary {
  metric: string
  count: number
  missing: number
  mean?: number
  median?: number
  min?: number
  max?: number
}

export interface HistogramBin {
  x0: number
  x1: number
  count: number
}

export interface MetricPoint {
  label: string
  group?: GroupKey
  x: number
  y: number
}

function requireMetric(classification: ColumnClassification, metric: string): void {
  if (!classification.metricColumns.includes(metric)) throw new ConfigurationError(`not a metric column: ${metric}`)
}

export function metricValues(dataset: Dataset, metric: string): number[] {
  const out: number[] = []
  for (const row of dataset.rows) {
    const v = numericValue(row[metric])
    if (v !== undefined) out.push(v)
  }
  return out
}

export function describeMetric(dataset: Dataset, classification: ColumnClassification, metric: string): MetricSummary {
  requireMetric(classification, metric)
  const vals = metricValues(dataset, metric)
  const summary: MetricSummary = { metric, count: vals.length, missing: dataset.rows.length - vals.length }
  if (vals.length === 0) return summary
  return { ...summary, mean: mean(vals), median: median(vals), min: min(vals), max: max(vals) }
}

/** Equal-width bins; the last bin is closed on the right. A constant series gives one bin. */
export function histogram(values: readonly number[], binCount = 20): HistogramBin[] {
  if (!Number.isInteger(binCount) || binCount <= 0) throw new ConfigurationError('bin count must be a positive integer')
  const finite = values.filter((v) => Number.isFinite(v))
  if (finite.length === 0) return []
  const lo = min(finite)
  const hi = max(finite)
  if (lo === hi) return [{ x0: lo, x1: hi, count: finite.length }]

  const width = (hi - lo) / binCount
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    x0: lo + i * width,
    x1: i === binCount - 1 ? hi : lo + (i + 1) * width,
    count: 0,
  }))
  for (const v of finite) {
    const idx = Math.min(binCount - 1, Math.floor((v - lo) / width))
    bins[idx].count++
  }
  return bins
}

/** Scatter points for rows where both metrics are present. */
export function pairMetrics(
  dataset: Dataset,
  classification: ColumnClassification,
  xMetric: string,
  yMetric: string
): MetricPoint[] {
  requireMetric(classification, xMetric)
  requireMetric(classification, yMetric)
  const labelColumn = entityKeyColumn(classification)
  const { groupingColumn } = classification
  const points: MetricPoint[] = []
  for (const row of dataset.rows) {
    const x = numericValue(row[xMetric])
    const y = numericValue(row[yMetric])
    if (x === undefined || y === undefined) continue
    const point: MetricPoint = { label: textValue(row[labelColumn]) ?? '', x, y }
    if (groupingColumn) {
      const g = row[groupingColumn]
      if (!isMissing(g)) point.group = g
    }
    points.push(point)
  }
  return points
}
