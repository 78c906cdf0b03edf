import { aggregateByGroup, aggregatedRows, assertMetrics, toLongForm } from './aggregation'
import type { ColumnClassification, Dataset, LongRecord, MatchResult } from '../types'

/** Column that labels each entity in comparison views: company name when present, else stock code. */
export function entityKeyColumn(classification: ColumnClassification): string {
  return classification.nameColumn ?? classification.identifierColumn
}

/** Long-form metrics per matched company. No cap on entity count; the UI decides what to draw. */
export function buildEntityComparison(
  matchResult: MatchResult,
  classification: ColumnClassification,
  metrics: readonly string[]
): LongRecord[] {
  assertMetrics(classification, metrics)
  if (matchResult.length === 0) return []
  return toLongForm(matchResult, entityKeyColumn(classification), metrics)
}

/** Industry means in long form, industries in first-appearance order. */
export function buildIndustryComparison(
  dataset: Dataset,
  classification: ColumnClassification,
  metrics: readonly string[]
): LongRecord[] {
  const view = aggregateByGroup(dataset, classification, metrics)
  return toLongForm(aggregatedRows(view), view.groupingColumn, view.metrics)
}
