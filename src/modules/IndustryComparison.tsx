import { useMemo, useState } from 'react'
import { buildIndustryComparison } from '../lib/comparison'
import { keyMetrics } from '../lib/defaults'
import { describeEngineError, type Notice } from '../lib/messages'
import type { AnalysisSession, LongRecord } from '../types'
import { ComparisonRadar } from './ComparisonRadar'
import { DataTable } from './DataTable'
import { MetricPicker } from './MetricPicker'
import { NoticeBanner } from './NoticeBanner'
import { styles, theme } from '../theme'

export function IndustryComparison({ session }: { session: AnalysisSession }) {
  const { dataset, classification } = session
  const { groupingColumn } = classification
  const options = useMemo(() => keyMetrics(classification), [classification])
  const [selected, setSelected] = useState<string[]>(options)

  const outcome = useMemo((): { records: LongRecord[] } | { notice: Notice } => {
    if (selected.length === 0) return { notice: { severity: 'warning', message: 'Select at least one metric to compare.' } }
    try {
      return { records: buildIndustryComparison(dataset, classification, selected) }
    } catch (err) {
      return { notice: describeEngineError(err) }
    }
  }, [dataset, classification, selected])

  if (!groupingColumn || classification.metricColumns.length === 0) {
    return (
      <section>
        {!groupingColumn && (
          <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>No industry column found; industry comparison is unavailable.</p>
        )}
        {classification.metricColumns.length === 0 && (
          <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>No numeric metric columns found; metric comparison is unavailable.</p>
        )}
      </section>
    )
  }

  return (
    <section>
      <header style={styles.sectionHeader}>
        <h2 style={styles.textSection}>
          Industry comparison<sup style={styles.sup}>3</sup>
        </h2>
      </header>
      <MetricPicker label="Metrics to compare" options={options} selected={selected} onChange={setSelected} />
      {'notice' in outcome ? (
        <NoticeBanner notice={outcome.notice} />
      ) : (
        <>
          <ComparisonRadar title="Industry averages" records={outcome.records} />
          <DataTable
            columns={[groupingColumn, 'Metric', 'Mean']}
            rows={outcome.records.map((r) => ({ [groupingColumn]: r.key, Metric: r.metric, Mean: r.value }))}
            maxHeight={240}
          />
        </>
      )}
    </section>
  )
}
