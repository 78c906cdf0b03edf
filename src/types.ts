/** A single cell; null means missing */
export type CellValue = string | number | null

/** Row of data keyed by column name */
export type DataRow = Record<string, CellValue>

/** Loaded table: column order is the source's left-to-right order */
export interface Dataset {
  columns: readonly string[]
  rows: readonly DataRow[]
}

/** Roles derived once per dataset load */
export interface ColumnClassification {
  identifierColumn: string
  /** Industry column, when one of the known names is present */
  groupingColumn?: string
  /** Company name column, when present */
  nameColumn?: string
  /** Numeric columns minus the identifier, source order */
  metricColumns: readonly string[]
}

export type GroupKey = string | number

export interface AggregatedGroup {
  key: GroupKey
  /** Rows in the group */
  count: number
  /** Mean per metric; undefined when the group has no value for it */
  means: Record<string, number | undefined>
}

/** Industry-level means, groups in first-appearance order */
export interface AggregatedView {
  groupingColumn: string
  metrics: readonly string[]
  groups: AggregatedGroup[]
}

/** One (entity, metric) pair */
export interface LongRecord {
  key: CellValue
  metric: string
  value: CellValue
}

/** Rows matching a lookup, in source order */
export type MatchResult = readonly DataRow[]

export type RankDirection = 'descending' | 'ascending'

export type LookupField = 'identifier' | 'name'

export type LookupMode = 'exact' | 'fuzzy'

/** Immutable dataset + classification pair for one load */
export interface AnalysisSession {
  /** Increases with every load in this page */
  id: number
  dataset: Dataset
  classification: ColumnClassification
  loadedAt: string
}
