import { useState, useEffect, Component, type ErrorInfo } from 'react'
import { DataSource } from './modules/DataSource'
import { Overview } from './modules/Overview'
import { MetricCorrelation } from './modules/MetricCorrelation'
import { IndustryComparison } from './modules/IndustryComparison'
import { RankingBoard } from './modules/RankingBoard'
import { CompanyLookup } from './modules/CompanyLookup'
import { createLogger } from './lib/logger'
import type { AnalysisSession } from './types'
import { styles } from './theme'

const log = createLogger('app')

type ModuleId = 'overview' | 'correlation' | 'industries' | 'ranking' | 'lookup'

class MainErrorBoundary extends Component<{ children: React.ReactNode }, { error: Error | null }> {
  state: { error: Error | null } = { error: null }
  static getDerivedStateFromError(error: Error) {
    return { error }
  }
  componentDidCatch(error: Error, info: ErrorInfo) {
    log.error('render failed', error, { componentStack: info.componentStack ?? null })
  }
  render() {
    if (this.state.error) {
      return (
        <main style={{ ...styles.main, padding: 24 }}>
          <div style={{ padding: 24, background: '#fff5f5', border: '1px solid #e74c3c', borderRadius: 8 }}>
            <strong>Something went wrong</strong>
            <p style={{ margin: '12px 0 0', fontSize: 13 }}>{this.state.error.message}</p>
            <button
              type="button"
              style={{ marginTop: 16, padding: '8px 16px', cursor: 'pointer' }}
              onClick={() => this.setState({ error: null })}
            >
              Try again
            </button>
          </div>
        </main>
      )
    }
    return this.props.children
  }
}

function App() {
  const [session, setSession] = useState<AnalysisSession | null>(null)
  const [activeModule, setActiveModule] = useState<ModuleId>('overview')

  useEffect(() => {
    const style = document.createElement('style')
    style.textContent = `
      * { box-sizing: border-box; margin: 0; padding: 0; -webkit-font-smoothing: antialiased; }
      body { background-color: #F7F7F5; }
    `
    document.head.appendChild(style)
    return () => {
      document.head.removeChild(style)
    }
  }, [])

  const tabs: { id: ModuleId; label: string }[] = [
    { id: 'overview', label: 'Overview' },
    { id: 'correlation', label: 'Correlation' },
    { id: 'industries', label: 'Industries' },
    { id: 'ranking', label: 'Ranking' },
    { id: 'lookup', label: 'Company Lookup' },
  ]

  return (
    <div style={styles.root}>
      <header style={styles.appHeader}>
        <h1 style={styles.textHero}>
          Digital Transformation<br />
          Explorer
        </h1>
        <p style={styles.appDesc}>
          Interactive overview of listed AI-sector companies' digital transformation indices: industry
          distribution, metric correlations, industry comparisons and rankings, plus lookup of individual
          companies by stock code or name.
        </p>
      </header>

      <nav style={styles.appNav}>
        <div style={styles.navTabs}>
          {tabs.map((tab) => (
            <button
              key={tab.id}
              type="button"
              style={{
                ...styles.navTabBase,
                ...(activeModule === tab.id ? styles.navTabActive : styles.navTabInactive),
                ...(!session ? styles.navTabDisabled : {}),
              }}
              onClick={() => session && setActiveModule(tab.id)}
              disabled={!session}
            >
              {tab.label}
            </button>
          ))}
        </div>
        <div style={styles.navMeta}>
          <span>{session ? `${session.dataset.rows.length} rows` : 'No data'}</span>
        </div>
      </nav>

      <main style={styles.main}>
        <DataSource session={session} onSessionChange={setSession} />
        <MainErrorBoundary>
          {session && (
            // keyed per load so every view resets its selections on a new upload
            <div key={session.id}>
              {activeModule === 'overview' && <Overview session={session} />}
              {activeModule === 'correlation' && <MetricCorrelation session={session} />}
              {activeModule === 'industries' && <IndustryComparison session={session} />}
              {activeModule === 'ranking' && <RankingBoard session={session} />}
              {activeModule === 'lookup' && <CompanyLookup session={session} />}
            </div>
          )}
        </MainErrorBoundary>
      </main>
    </div>
  )
}

export default App
