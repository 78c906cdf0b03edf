import { Legend, PolarAngleAxis, PolarGrid, PolarRadiusAxis, Radar, RadarChart, ResponsiveContainer, Tooltip } from 'recharts'
import { longFormValues, suggestRange } from '../lib/aggregation'
import { seriesByMetric } from '../lib/chartData'
import type { LongRecord } from '../types'
import { CHART_COLORS, styles } from '../theme'

interface ComparisonRadarProps {
  title: string
  records: readonly LongRecord[]
}

/** Radar with one closed polygon per entity; metrics around the angle axis. */
export function ComparisonRadar({ title, records }: ComparisonRadarProps) {
  const values = longFormValues(records)
  if (values.length === 0) return null
  const domain = suggestRange(values)
  const { data, seriesKeys } = seriesByMetric(records)

  return (
    <div>
      <h4 style={{ margin: '16px 0 0', fontSize: 14, color: '#555' }}>{title}</h4>
      <div style={{ ...styles.chartContainer, height: 480 }}>
        <ResponsiveContainer width="100%" height="100%">
          <RadarChart data={data} outerRadius="75%">
            <PolarGrid />
            <PolarAngleAxis dataKey="metric" tick={{ fontSize: 11 }} />
            <PolarRadiusAxis domain={domain} tick={{ fontSize: 10 }} tickFormatter={(v: number) => v.toFixed(1)} />
            {seriesKeys.map((key, i) => (
              <Radar
                key={key}
                name={key}
                dataKey={key}
                stroke={CHART_COLORS[i % CHART_COLORS.length]}
                fill={CHART_COLORS[i % CHART_COLORS.length]}
                fillOpacity={0.08}
              />
            ))}
            <Tooltip />
            <Legend />
          </RadarChart>
        </ResponsiveContainer>
      </div>
    </div>
  )
}
