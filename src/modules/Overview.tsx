import { useMemo, useState } from 'react'
import { Bar, BarChart, CartesianGrid, Cell, Pie, PieChart, ReferenceLine, ResponsiveContainer, Tooltip, XAxis, YAxis, Legend } from 'recharts'
import { countByGroup } from '../lib/aggregation'
import { describeMetric, histogram, metricValues } from '../lib/metricStats'
import { defaultMetric } from '../lib/defaults'
import { DISPLAY_DEFAULTS } from '../config'
import type { AnalysisSession } from '../types'
import { CHART_COLORS, styles, theme } from '../theme'

export function Overview({ session }: { session: AnalysisSession }) {
  const { dataset, classification } = session
  const [metric, setMetric] = useState(() => defaultMetric(classification))

  const industryCounts = useMemo(
    () =>
      classification.groupingColumn
        ? countByGroup(dataset, classification).map((g) => ({ name: String(g.key), value: g.count }))
        : null,
    [dataset, classification]
  )

  const distribution = useMemo(() => {
    if (!metric) return null
    const summary = describeMetric(dataset, classification, metric)
    const bins = histogram(metricValues(dataset, metric), DISPLAY_DEFAULTS.histogramBins).map((b) => ({
      mid: (b.x0 + b.x1) / 2,
      count: b.count,
    }))
    return { summary, bins }
  }, [dataset, classification, metric])

  return (
    <section>
      <header style={styles.sectionHeader}>
        <h2 style={styles.textSection}>
          Industry distribution &amp; index overview<sup style={styles.sup}>1</sup>
        </h2>
      </header>
      <div style={styles.chartGrid}>
        <div>
          <h3 style={styles.textLabel}>Companies per industry</h3>
          {industryCounts ? (
            <div style={styles.chartContainer}>
              <ResponsiveContainer width="100%" height="100%">
                <PieChart>
                  <Pie data={industryCounts} dataKey="value" nameKey="name" outerRadius="70%" label>
                    {industryCounts.map((entry, i) => (
                      <Cell key={entry.name} fill={CHART_COLORS[i % CHART_COLORS.length]} />
                    ))}
                  </Pie>
                  <Tooltip />
                  <Legend />
                </PieChart>
              </ResponsiveContainer>
            </div>
          ) : (
            <p style={{ ...styles.textBody, color: theme.colors.textMuted, marginTop: 12 }}>
              No industry column found; the industry distribution is unavailable.
            </p>
          )}
        </div>

        <div>
          <h3 style={styles.textLabel}>Distribution</h3>
          {metric && distribution ? (
            <>
              <label style={{ ...styles.field, marginTop: 8 }}>
                Metric
                <select value={metric} onChange={(e) => setMetric(e.target.value)}>
                  {classification.metricColumns.map((m) => (
                    <option key={m} value={m}>
                      {m}
                    </option>
                  ))}
                </select>
              </label>
              <div style={styles.chartContainer}>
                <ResponsiveContainer width="100%" height="100%">
                  <BarChart data={distribution.bins} barCategoryGap={1}>
                    <CartesianGrid strokeDasharray="3 3" />
                    <XAxis dataKey="mid" type="number" domain={['dataMin', 'dataMax']} tick={{ fontSize: 11 }} tickFormatter={(v: number) => v.toFixed(1)} />
                    <YAxis allowDecimals={false} tick={{ fontSize: 11 }} />
                    <Tooltip />
                    <Bar dataKey="count" fill="#00A1FF" name="Companies" />
                    {distribution.summary.mean !== undefined && (
                      <ReferenceLine x={distribution.summary.mean} stroke="red" strokeDasharray="4 4" label={{ value: 'Mean', position: 'insideTopLeft' }} />
                    )}
                    {distribution.summary.median !== undefined && (
                      <ReferenceLine x={distribution.summary.median} stroke="green" strokeDasharray="4 4" label={{ value: 'Median', position: 'insideTopRight' }} />
                    )}
                  </BarChart>
                </ResponsiveContainer>
              </div>
              <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>
                n = {distribution.summary.count}
                {distribution.summary.missing > 0 && ` (${distribution.summary.missing} missing)`}
                {distribution.summary.mean !== undefined && ` · mean ${distribution.summary.mean.toFixed(2)}`}
                {distribution.summary.median !== undefined && ` · median ${distribution.summary.median.toFixed(2)}`}
              </p>
            </>
          ) : (
            <p style={{ ...styles.textBody, color: theme.colors.textMuted, marginTop: 12 }}>
              No numeric metric columns found; the distribution chart is unavailable.
            </p>
          )}
        </div>
      </div>
    </section>
  )
}
