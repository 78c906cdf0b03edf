/**
 * Column role detection: identifier, industry grouping key, company name, numeric metrics.
 * Runs once per dataset load; every other engine call takes the frozen result.
 */

import { DEFAULT_CONVENTIONS, type ColumnConventions } from '../config'
import { SchemaError } from './errors'
import { isMissing } from './cells'
import type { ColumnClassification, Dataset } from '../types'

function firstPresent(columns: readonly string[], candidates: readonly string[]): string | undefined {
  return candidates.find((c) => columns.includes(c))
}

/** True when every non-missing value is a finite number and there is at least one. */
function isNumericColumn(dataset: Dataset, column: string): boolean {
  let seen = 0
  for (const row of dataset.rows) {
    const v = row[column]
    if (isMissing(v)) continue
    if (typeof v !== 'number' || !Number.isFinite(v)) return false
    seen++
  }
  return seen > 0
}

export function findIdentifierColumn(
  columns: readonly string[],
  conventions: ColumnConventions = DEFAULT_CONVENTIONS
): string | undefined {
  if (columns.includes(conventions.unnamedIndexColumn)) return conventions.unnamedIndexColumn
  return firstPresent(columns, conventions.identifierCandidates)
}

export function classify(
  dataset: Dataset,
  conventions: ColumnConventions = DEFAULT_CONVENTIONS
): ColumnClassification {
  const { columns } = dataset
  const identifierColumn = findIdentifierColumn(columns, conventions)
  if (!identifierColumn) {
    throw new SchemaError(
      `missing identifier column (expected one of: ${conventions.identifierCandidates.join(', ')})`,
      conventions.identifierCandidates
    )
  }

  const groupingColumn = firstPresent(columns, conventions.groupingCandidates)
  const nameColumn = firstPresent(columns, conventions.nameCandidates)
  const metricColumns = columns.filter((c) => c !== identifierColumn && isNumericColumn(dataset, c))

  const classification: ColumnClassification = {
    identifierColumn,
    metricColumns: Object.freeze([...metricColumns]),
  }
  if (groupingColumn !== undefined) classification.groupingColumn = groupingColumn
  if (nameColumn !== undefined) classification.nameColumn = nameColumn
  return Object.freeze(classification)
}
