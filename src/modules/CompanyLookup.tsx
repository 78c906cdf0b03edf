import { useMemo, useState } from 'react'
import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import { resolve, lookupFields } from '../lib/lookup'
import { buildEntityComparison, entityKeyColumn } from '../lib/comparison'
import { seriesByEntity } from '../lib/chartData'
import { canDrawEntityRadar, compareMetrics, radarMetrics } from '../lib/defaults'
import { describeEngineError, noMatchesNotice, type Notice } from '../lib/messages'
import { createLogger } from '../lib/logger'
import type { AnalysisSession, LookupField, LookupMode, MatchResult } from '../types'
import { ComparisonRadar } from './ComparisonRadar'
import { DataTable } from './DataTable'
import { MetricPicker } from './MetricPicker'
import { NoticeBanner } from './NoticeBanner'
import { CHART_COLORS, styles } from '../theme'

const log = createLogger('lookup')

const FIELD_LABEL: Record<LookupField, string> = { identifier: 'Stock code', name: 'Company name' }
const MODE_LABEL: Record<LookupMode, string> = { exact: 'Exact', fuzzy: 'Fuzzy' }

function MatchCharts({ session, matches }: { session: AnalysisSession; matches: MatchResult }) {
  const { classification } = session
  const [selected, setSelected] = useState<string[]>(() => compareMetrics(classification))
  const keyColumn = entityKeyColumn(classification)

  const radarRecords = useMemo(() => {
    const metrics = radarMetrics(classification)
    if (metrics.length === 0 || !canDrawEntityRadar(matches.length)) return []
    return buildEntityComparison(matches, classification, metrics)
  }, [classification, matches])

  const bars = useMemo(
    () => (selected.length > 0 ? seriesByEntity(buildEntityComparison(matches, classification, selected), keyColumn) : null),
    [classification, matches, selected, keyColumn]
  )

  if (classification.metricColumns.length === 0) return null

  return (
    <div style={{ marginTop: 24 }}>
      <h3 style={{ ...styles.textLabel, marginBottom: 8 }}>Metric analysis</h3>
      {radarRecords.length > 0 && <ComparisonRadar title="Matched companies" records={radarRecords} />}
      <MetricPicker label="Metrics to compare" options={classification.metricColumns} selected={selected} onChange={setSelected} />
      {bars && (
        <div style={styles.chartContainer} data-testid="company-bar-chart">
          <ResponsiveContainer width="100%" height="100%">
            <BarChart data={bars.data}>
              <CartesianGrid strokeDasharray="3 3" />
              <XAxis dataKey={keyColumn} tick={{ fontSize: 12 }} />
              <YAxis tick={{ fontSize: 12 }} />
              <Tooltip />
              <Legend />
              {bars.seriesKeys.map((m, i) => (
                <Bar key={m} dataKey={m} name={m} fill={CHART_COLORS[i % CHART_COLORS.length]} />
              ))}
            </BarChart>
          </ResponsiveContainer>
        </div>
      )}
    </div>
  )
}

export function CompanyLookup({ session }: { session: AnalysisSession }) {
  const { dataset, classification } = session
  const fields = lookupFields(classification)
  const [query, setQuery] = useState('')
  const [field, setField] = useState<LookupField>('identifier')
  const [mode, setMode] = useState<LookupMode>('exact')
  const [matches, setMatches] = useState<MatchResult | null>(null)
  const [notice, setNotice] = useState<Notice | null>(null)
  const [searchCount, setSearchCount] = useState(0)

  const handleSearch = () => {
    setSearchCount((n) => n + 1)
    setNotice(null)
    setMatches(null)
    try {
      const result = resolve(dataset, classification, query, field, mode)
      log.debug('lookup resolved', { field, mode, matches: result.length })
      if (result.length === 0) setNotice(noMatchesNotice())
      else setMatches(result)
    } catch (err) {
      setNotice(describeEngineError(err))
    }
  }

  return (
    <section>
      <header style={styles.sectionHeader}>
        <h2 style={styles.textSection}>
          Company lookup<sup style={styles.sup}>5</sup>
        </h2>
      </header>
      <form
        style={styles.controls}
        onSubmit={(e) => {
          e.preventDefault()
          handleSearch()
        }}
      >
        <label style={{ ...styles.field, flex: 1, minWidth: 240 }}>
          Stock code or company name
          <input
            type="text"
            value={query}
            placeholder="e.g. 300884"
            onChange={(e) => setQuery(e.target.value)}
            style={{ padding: '6px 8px', fontSize: 13 }}
          />
        </label>
        <div role="radiogroup" aria-label="Search by" style={{ display: 'flex', gap: 12, fontSize: 13 }}>
          {fields.map((f) => (
            <label key={f} style={{ display: 'flex', gap: 4, alignItems: 'center' }}>
              <input type="radio" name="lookup-field" checked={field === f} onChange={() => setField(f)} />
              {FIELD_LABEL[f]}
            </label>
          ))}
        </div>
        <div role="radiogroup" aria-label="Match mode" style={{ display: 'flex', gap: 12, fontSize: 13 }}>
          {(['exact', 'fuzzy'] as const).map((m) => (
            <label key={m} style={{ display: 'flex', gap: 4, alignItems: 'center' }}>
              <input type="radio" name="lookup-mode" checked={mode === m} onChange={() => setMode(m)} />
              {MODE_LABEL[m]}
            </label>
          ))}
        </div>
        <button type="submit" style={{ ...styles.btn, ...styles.btnPrimary, marginTop: 0 }}>
          Search
        </button>
      </form>

      {notice && <NoticeBanner notice={notice} />}

      {matches && (
        <>
          <h3 style={{ ...styles.textLabel, margin: '16px 0 8px' }}>
            Found {matches.length} {matches.length === 1 ? 'company' : 'companies'}
          </h3>
          <DataTable rows={matches} columns={dataset.columns} maxHeight={300} testId="lookup-results" />
          <MatchCharts key={searchCount} session={session} matches={matches} />
        </>
      )}
    </section>
  )
}
