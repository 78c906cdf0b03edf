import { useMemo, useState } from 'react'
import { rank, rankingColumns, rankingTable } from '../lib/ranking'
import { defaultMetric } from '../lib/defaults'
import { describeEngineError, type Notice } from '../lib/messages'
import { DISPLAY_DEFAULTS } from '../config'
import type { AnalysisSession, DataRow, RankDirection } from '../types'
import { DataTable } from './DataTable'
import { NoticeBanner } from './NoticeBanner'
import { styles, theme } from '../theme'

export function RankingBoard({ session }: { session: AnalysisSession }) {
  const { dataset, classification } = session
  const [metric, setMetric] = useState(() => defaultMetric(classification) ?? '')
  const [topN, setTopN] = useState<number>(DISPLAY_DEFAULTS.topN.initial)
  const [direction, setDirection] = useState<RankDirection>('descending')

  const outcome = useMemo((): { rows: DataRow[]; columns: string[] } | { notice: Notice } => {
    try {
      const rows = rank(dataset, classification, metric, direction, topN)
      return { rows: rankingTable(rows, classification, metric), columns: rankingColumns(classification, metric) }
    } catch (err) {
      return { notice: describeEngineError(err) }
    }
  }, [dataset, classification, metric, direction, topN])

  if (classification.metricColumns.length === 0) {
    return (
      <section>
        <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>No numeric metric columns found; rankings are unavailable.</p>
      </section>
    )
  }

  return (
    <section>
      <header style={styles.sectionHeader}>
        <h2 style={styles.textSection}>
          Company ranking<sup style={styles.sup}>4</sup>
        </h2>
      </header>
      <div style={styles.controls}>
        <label style={styles.field}>
          Ranking metric
          <select value={metric} onChange={(e) => setMetric(e.target.value)}>
            {classification.metricColumns.map((m) => (
              <option key={m} value={m}>
                {m}
              </option>
            ))}
          </select>
        </label>
        <label style={styles.field}>
          Show top {topN}
          <input
            type="range"
            min={DISPLAY_DEFAULTS.topN.min}
            max={DISPLAY_DEFAULTS.topN.max}
            step={DISPLAY_DEFAULTS.topN.step}
            value={topN}
            onChange={(e) => setTopN(Number(e.target.value))}
          />
        </label>
        <div role="radiogroup" aria-label="Sort order" style={{ display: 'flex', gap: 12, fontSize: 13 }}>
          {(['descending', 'ascending'] as const).map((d) => (
            <label key={d} style={{ display: 'flex', gap: 4, alignItems: 'center' }}>
              <input type="radio" name="rank-direction" checked={direction === d} onChange={() => setDirection(d)} />
              {d === 'descending' ? 'Highest first' : 'Lowest first'}
            </label>
          ))}
        </div>
      </div>
      {'notice' in outcome ? (
        <NoticeBanner notice={outcome.notice} />
      ) : (
        <DataTable rows={outcome.rows} columns={outcome.columns} numbered testId="ranking-table" />
      )}
    </section>
  )
}
