import type { CSSProperties } from 'react'

export const theme = {
  colors: {
    background: '#F7F7F5',
    surface: '#FFFFFF',
    surfaceMuted: '#F0F0EC',
    border: '#DADAD4',
    text: '#1A1A1A',
    textMuted: '#6B6B66',
    textFaded: '#A3A39E',
    accent: '#1C35D4',
    danger: '#c0392b',
    warning: '#b7950b',
  },
  font: "'Inter', 'PingFang SC', 'Microsoft YaHei', system-ui, sans-serif",
} as const

/** Series palette shared by every chart */
export const CHART_COLORS = ['#1C35D4', '#2ecc71', '#e74c3c', '#9b59b6', '#f39c12', '#16a085', '#d35400', '#34495e', '#e84393', '#7f8c8d']

export const styles: Record<string, CSSProperties> = {
  root: { minHeight: '100vh', background: theme.colors.background, color: theme.colors.text, fontFamily: theme.font },
  appHeader: { display: 'grid', gridTemplateColumns: '1fr 1fr', gap: 32, padding: '40px 32px 24px' },
  textHero: { fontSize: 40, lineHeight: 1.05, fontWeight: 700, letterSpacing: -1 },
  appDesc: { fontSize: 14, lineHeight: 1.5, color: theme.colors.textMuted, maxWidth: 520 },
  appNav: {
    display: 'flex',
    justifyContent: 'space-between',
    alignItems: 'center',
    padding: '0 32px',
    borderTop: `1px solid ${theme.colors.border}`,
    borderBottom: `1px solid ${theme.colors.border}`,
  },
  navTabs: { display: 'flex', gap: 4 },
  navTabBase: { padding: '12px 16px', border: 'none', background: 'none', fontSize: 13, cursor: 'pointer' },
  navTabActive: { borderBottom: `2px solid ${theme.colors.accent}`, color: theme.colors.accent, fontWeight: 600 },
  navTabInactive: { color: theme.colors.textMuted },
  navTabDisabled: { opacity: 0.4, cursor: 'default' },
  navMeta: { display: 'flex', gap: 16, fontSize: 11, color: theme.colors.textFaded },
  main: { padding: '24px 32px 64px' },
  sectionHeader: { marginBottom: 16 },
  textSection: { fontSize: 22, fontWeight: 600 },
  sup: { fontSize: 11, marginLeft: 4, color: theme.colors.textFaded },
  textBody: { fontSize: 13, lineHeight: 1.5 },
  textLabel: { fontSize: 12, fontWeight: 600, textTransform: 'uppercase', letterSpacing: 0.5 },
  btn: { marginTop: 12, padding: '8px 16px', fontSize: 13, border: `1px solid ${theme.colors.border}`, background: theme.colors.surface, cursor: 'pointer' },
  btnPrimary: { background: theme.colors.accent, borderColor: theme.colors.accent, color: '#fff' },
  uploadZone: {
    padding: 48,
    textAlign: 'center',
    border: `1px dashed ${theme.colors.border}`,
    background: theme.colors.surface,
    cursor: 'pointer',
  },
  uploadZoneHover: { borderColor: theme.colors.accent },
  uploadIcon: { fontSize: 32, marginBottom: 8, color: theme.colors.accent },
  chartContainer: { width: '100%', height: 360, marginTop: 12 },
  chartGrid: { display: 'grid', gridTemplateColumns: '1fr 1fr', gap: 24 },
  tableHeader: { textAlign: 'left', padding: '6px 10px', fontSize: 12, borderBottom: `1px solid ${theme.colors.border}` },
  tableCell: { padding: '6px 10px', fontSize: 12, borderBottom: `1px solid ${theme.colors.surfaceMuted}` },
  field: { display: 'flex', flexDirection: 'column', gap: 4, fontSize: 12 },
  controls: { display: 'flex', flexWrap: 'wrap', gap: 16, alignItems: 'flex-end', marginBottom: 12 },
}
