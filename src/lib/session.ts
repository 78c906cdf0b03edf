import { classify } from './schemaClassifier'
import { createLogger } from './logger'
import { DEFAULT_CONVENTIONS, type ColumnConventions } from '../config'
import type { AnalysisSession, DataRow, Dataset } from '../types'

const log = createLogger('session')

let sessionCount = 0

/**
 * Freeze a loaded dataset and classify it. A new upload builds a new session;
 * an existing one is never mutated.
 */
export function createSession(
  dataset: Dataset,
  conventions: ColumnConventions = DEFAULT_CONVENTIONS
): AnalysisSession {
  const frozen: Dataset = Object.freeze({
    columns: Object.freeze([...dataset.columns]),
    rows: Object.freeze(dataset.rows.map((r) => Object.freeze({ ...r }))),
  })
  const classification = classify(frozen, conventions)
  log.info('dataset classified', {
    rows: frozen.rows.length,
    columns: frozen.columns.length,
    identifier: classification.identifierColumn,
    grouping: classification.groupingColumn ?? null,
    name: classification.nameColumn ?? null,
    metrics: classification.metricColumns.length,
  })
  sessionCount++
  return Object.freeze({ id: sessionCount, dataset: frozen, classification, loadedAt: new Date().toISOString() })
}

export function previewDataset(dataset: Dataset, size = 5): { columns: readonly string[]; rows: readonly DataRow[] } {
  return { columns: dataset.columns, rows: dataset.rows.slice(0, Math.max(0, size)) }
}
