/** Column naming conventions of the exported metrics workbook. */
export interface ColumnConventions {
  /** Default-index artifact of spreadsheet export, treated as the identifier */
  unnamedIndexColumn: string
  /** Accepted identifier (stock code) names; the first is the canonical one */
  identifierCandidates: readonly string[]
  /** Industry column names in priority order */
  groupingCandidates: readonly string[]
  /** Company name column names in priority order */
  nameCandidates: readonly string[]
}

export const DEFAULT_CONVENTIONS: ColumnConventions = {
  unnamedIndexColumn: 'Unnamed: 0',
  identifierCandidates: ['股票代码', 'Stock Code', 'stock_code'],
  groupingCandidates: ['行业', '所属行业', '行业分类', 'industry', 'Industry'],
  nameCandidates: ['企业名称', 'Company Name', 'company_name'],
}

/** Presentation defaults (UI convenience only; the engine never falls back to them). */
export const DISPLAY_DEFAULTS = {
  headlineMetric: '数字化转型总指数',
  keyMetrics: ['数字化转型总指数', '战略转型', '技术应用', '组织变革', '数据价值', '流程优化'],
  secondaryMetric: '技术应用',
  keyMetricFallbackCount: 3,
  radarMetricLimit: 6,
  compareMetricCount: 3,
  entityRadarLimit: 10,
  histogramBins: 20,
  previewRows: 5,
  topN: { min: 5, max: 50, step: 5, initial: 10 },
} as const

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error'

function readLogLevel(): LogLevelName {
  const raw = (import.meta.env.VITE_LOG_LEVEL ?? (import.meta.env.MODE === 'test' ? 'warn' : 'info')).toLowerCase()
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info'
}

export const LOG_LEVEL: LogLevelName = readLogLevel()
