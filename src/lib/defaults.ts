/**
 * Default selections for the dashboard controls. These live at the presentation
 * boundary: engine calls always receive an explicit metric and fail on unknown ones.
 */

import { DISPLAY_DEFAULTS } from '../config'
import type { ColumnClassification } from '../types'

/** Headline metric if classified, else the first metric; undefined when there are none. */
export function defaultMetric(classification: ColumnClassification): string | undefined {
  const { metricColumns } = classification
  return metricColumns.includes(DISPLAY_DEFAULTS.headlineMetric) ? DISPLAY_DEFAULTS.headlineMetric : metricColumns[0]
}

/** Scatter axes: headline vs technology application, falling back to the first two metrics. */
export function defaultAxes(classification: ColumnClassification): { x: string; y: string } | undefined {
  const { metricColumns } = classification
  if (metricColumns.length < 2) return undefined
  const x = defaultMetric(classification) ?? metricColumns[0]
  const y = metricColumns.includes(DISPLAY_DEFAULTS.secondaryMetric) ? DISPLAY_DEFAULTS.secondaryMetric : metricColumns[1]
  return { x, y }
}

/** Key metrics present in the dataset, else the first `fallbackCount` metrics. */
export function keyMetrics(
  classification: ColumnClassification,
  fallbackCount: number = DISPLAY_DEFAULTS.keyMetricFallbackCount
): string[] {
  const { metricColumns } = classification
  const available = DISPLAY_DEFAULTS.keyMetrics.filter((m) => metricColumns.includes(m))
  return available.length > 0 ? available : metricColumns.slice(0, fallbackCount)
}

export function radarMetrics(classification: ColumnClassification): string[] {
  return keyMetrics(classification, DISPLAY_DEFAULTS.radarMetricLimit)
}

export function compareMetrics(classification: ColumnClassification): string[] {
  return classification.metricColumns.slice(0, DISPLAY_DEFAULTS.compareMetricCount)
}

/** Entity radar is only drawn for small match counts. */
export function canDrawEntityRadar(matchCount: number): boolean {
  return matchCount > 0 && matchCount <= DISPLAY_DEFAULTS.entityRadarLimit
}
