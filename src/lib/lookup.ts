/**
 * Company lookup by stock code or name, exact or fuzzy.
 * Fuzzy is literal substring containment; results keep source order and are not relevance-ranked.
 */

import { ConfigurationError, ValidationError } from './errors'
import { identifierText, identifierValue, parseIntegerText, textValue } from './cells'
import type { ColumnClassification, DataRow, Dataset, LookupField, LookupMode, MatchResult } from '../types'

type RowPredicate = (row: DataRow) => boolean

function identifierPredicate(column: string, query: string, mode: LookupMode): RowPredicate {
  if (mode === 'exact') {
    const code = parseIntegerText(query)
    if (code === undefined) throw new ValidationError('non-integer identifier')
    return (row) => identifierValue(row[column]) === code
  }
  return (row) => identifierText(row[column])?.includes(query) ?? false
}

function namePredicate(column: string, query: string, mode: LookupMode): RowPredicate {
  if (mode === 'exact') return (row) => textValue(row[column]) === query
  return (row) => textValue(row[column])?.includes(query) ?? false
}

export function resolve(
  dataset: Dataset,
  classification: ColumnClassification,
  queryText: string,
  field: LookupField,
  mode: LookupMode
): MatchResult {
  const query = queryText.trim()
  if (query === '') throw new ValidationError('empty query')

  let predicate: RowPredicate
  if (field === 'identifier') {
    predicate = identifierPredicate(classification.identifierColumn, query, mode)
  } else {
    if (!classification.nameColumn) throw new ConfigurationError('dataset has no company name column')
    predicate = namePredicate(classification.nameColumn, query, mode)
  }
  return dataset.rows.filter(predicate)
}

/** Fields a lookup can use for this dataset. */
export function lookupFields(classification: ColumnClassification): LookupField[] {
  return classification.nameColumn ? ['identifier', 'name'] : ['identifier']
}
