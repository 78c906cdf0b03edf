import { useMemo, useState } from 'react'
import { CartesianGrid, Legend, ResponsiveContainer, Scatter, ScatterChart, Tooltip, XAxis, YAxis, type TooltipProps } from 'recharts'
import { pairMetrics, type MetricPoint } from '../lib/metricStats'
import { defaultAxes } from '../lib/defaults'
import type { AnalysisSession } from '../types'
import { CHART_COLORS, styles, theme } from '../theme'

const NO_GROUPING = ''

function isMetricPoint(value: unknown): value is MetricPoint {
  return typeof value === 'object' && value !== null && 'label' in value && 'x' in value && 'y' in value
}

/** Hover card titled with the company name. */
function PointTooltip({ active, payload, xName, yName }: TooltipProps<number, string> & { xName: string; yName: string }) {
  const point: unknown = payload?.[0]?.payload
  if (!active || !isMetricPoint(point)) return null
  return (
    <div style={{ background: '#fff', border: `1px solid ${theme.colors.border}`, padding: '6px 10px', fontSize: 12 }}>
      <strong>{point.label}</strong>
      {point.group !== undefined && <div style={{ color: theme.colors.textMuted }}>{point.group}</div>}
      <div>
        {xName}: {point.x}
      </div>
      <div>
        {yName}: {point.y}
      </div>
    </div>
  )
}

function splitByGroup(points: MetricPoint[], grouped: boolean): { name: string; points: MetricPoint[] }[] {
  if (!grouped) return [{ name: 'Companies', points }]
  const groups = new Map<string, MetricPoint[]>()
  for (const p of points) {
    const name = p.group === undefined ? 'Unclassified' : String(p.group)
    const list = groups.get(name)
    if (list) list.push(p)
    else groups.set(name, [p])
  }
  return Array.from(groups, ([name, pts]) => ({ name, points: pts }))
}

export function MetricCorrelation({ session }: { session: AnalysisSession }) {
  const { dataset, classification } = session
  const axes = useMemo(() => defaultAxes(classification), [classification])
  const [x, setX] = useState(axes?.x ?? '')
  const [y, setY] = useState(axes?.y ?? '')
  const [colorBy, setColorBy] = useState(classification.groupingColumn ?? NO_GROUPING)
  const [showTrend, setShowTrend] = useState(false)

  const series = useMemo(() => {
    if (!axes) return []
    return splitByGroup(pairMetrics(dataset, classification, x, y), colorBy !== NO_GROUPING)
  }, [axes, dataset, classification, x, y, colorBy])

  if (!axes) {
    return (
      <section>
        <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>
          Fewer than two numeric metrics; correlation analysis is unavailable.
        </p>
      </section>
    )
  }

  return (
    <section>
      <header style={styles.sectionHeader}>
        <h2 style={styles.textSection}>
          Metric correlation<sup style={styles.sup}>2</sup>
        </h2>
      </header>
      <div style={styles.controls}>
        <label style={styles.field}>
          X axis
          <select value={x} onChange={(e) => setX(e.target.value)}>
            {classification.metricColumns.map((m) => (
              <option key={m} value={m}>
                {m}
              </option>
            ))}
          </select>
        </label>
        <label style={styles.field}>
          Y axis
          <select value={y} onChange={(e) => setY(e.target.value)}>
            {classification.metricColumns.map((m) => (
              <option key={m} value={m}>
                {m}
              </option>
            ))}
          </select>
        </label>
        <label style={styles.field}>
          Colour by
          <select value={colorBy} onChange={(e) => setColorBy(e.target.value)}>
            <option value={NO_GROUPING}>No grouping</option>
            {classification.groupingColumn && <option value={classification.groupingColumn}>{classification.groupingColumn}</option>}
          </select>
        </label>
        <label style={{ fontSize: 13, display: 'flex', gap: 4, alignItems: 'center' }}>
          <input type="checkbox" checked={showTrend} onChange={(e) => setShowTrend(e.target.checked)} />
          Connect points
        </label>
      </div>
      <div style={{ ...styles.chartContainer, height: 500 }}>
        <ResponsiveContainer width="100%" height="100%">
          <ScatterChart margin={{ top: 8, right: 16, left: 8, bottom: 8 }}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="x" type="number" name={x} tick={{ fontSize: 12 }} />
            <YAxis dataKey="y" type="number" name={y} tick={{ fontSize: 12 }} />
            <Tooltip cursor={{ strokeDasharray: '3 3' }} content={<PointTooltip xName={x} yName={y} />} />
            <Legend />
            {series.map((s, i) => (
              <Scatter
                key={s.name}
                name={s.name}
                data={s.points}
                fill={CHART_COLORS[i % CHART_COLORS.length]}
                line={showTrend ? { stroke: '#000', strokeWidth: 2, strokeDasharray: '5 5' } : false}
              />
            ))}
          </ScatterChart>
        </ResponsiveContainer>
      </div>
    </section>
  )
}
