import { useCallback, useState } from 'react'
import { parseDatasetCSV } from '../lib/csvParse'
import { createSession, previewDataset } from '../lib/session'
import { describeEngineError } from '../lib/messages'
import { createLogger } from '../lib/logger'
import { DISPLAY_DEFAULTS } from '../config'
import type { AnalysisSession } from '../types'
import { DataTable } from './DataTable'
import { styles, theme } from '../theme'

const log = createLogger('upload')

interface DataSourceProps {
  session: AnalysisSession | null
  onSessionChange: (session: AnalysisSession) => void
}

export function DataSource({ session, onSessionChange }: DataSourceProps) {
  const [error, setError] = useState<string | null>(null)
  const [uploadHover, setUploadHover] = useState(false)
  const [previewOpen, setPreviewOpen] = useState(false)

  /** Every upload builds a fresh session; views holding the old one are unaffected. */
  const loadText = useCallback(
    (text: string) => {
      const loaded = parseDatasetCSV(text)
      if (!loaded.ok) {
        setError(loaded.error)
        return
      }
      try {
        onSessionChange(createSession(loaded.dataset))
        setError(null)
      } catch (err) {
        log.error('could not classify dataset', err)
        setError(describeEngineError(err).message)
      }
    },
    [onSessionChange]
  )

  const handleFile = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      const file = e.target.files?.[0]
      if (!file) return
      setError(null)
      const reader = new FileReader()
      reader.onload = () => {
        loadText(String(reader.result ?? ''))
        e.target.value = ''
      }
      reader.onerror = () => {
        log.error('file read failed', reader.error)
        setError('Could not read the file.')
        e.target.value = ''
      }
      reader.readAsText(file, 'UTF-8')
    },
    [loadText]
  )

  const preview = session ? previewDataset(session.dataset, DISPLAY_DEFAULTS.previewRows) : null

  return (
    <section style={{ marginBottom: 32 }}>
      <header style={styles.sectionHeader}>
        <h2 style={styles.textSection}>Data source</h2>
      </header>
      <div
        style={{ ...styles.uploadZone, ...(uploadHover ? styles.uploadZoneHover : {}), padding: session ? 16 : 48 }}
        onMouseEnter={() => setUploadHover(true)}
        onMouseLeave={() => setUploadHover(false)}
        onClick={() => document.getElementById('datasetFileInput')?.click()}
      >
        <div style={styles.uploadIcon}>+</div>
        <div style={styles.textLabel}>{session ? 'Replace dataset' : 'Upload CSV dataset'}</div>
        <div style={{ fontSize: 11, opacity: 0.5, marginTop: 8 }}>Exported metrics table with a 股票代码 (stock code) column</div>
        <input type="file" id="datasetFileInput" accept=".csv" onChange={handleFile} style={{ display: 'none' }} />
      </div>
      {error && <p style={{ color: theme.colors.danger, marginTop: 12, fontSize: 13 }}>{error}</p>}

      {session && preview && (
        <div style={{ marginTop: 12 }}>
          <p style={{ ...styles.textBody, color: theme.colors.textMuted }}>
            <strong>{session.dataset.rows.length} companies</strong> · {session.classification.metricColumns.length} metrics
            {session.classification.groupingColumn && ` · grouped by ${session.classification.groupingColumn}`}
          </p>
          <label style={{ fontSize: 13, display: 'flex', gap: 4, alignItems: 'center', marginTop: 8 }}>
            <input type="checkbox" checked={previewOpen} onChange={(e) => setPreviewOpen(e.target.checked)} />
            Show data preview
          </label>
          {previewOpen && (
            <>
              <DataTable rows={preview.rows} columns={preview.columns} testId="data-preview" />
              <p style={{ ...styles.textBody, marginTop: 8 }}>Columns: {preview.columns.join(', ')}</p>
            </>
          )}
        </div>
      )}
    </section>
  )
}
