import type { Notice } from '../lib/messages'
import { theme } from '../theme'

const NOTICE_STYLE: Record<Notice['severity'], { bg: string; border: string }> = {
  info: { bg: '#e8f4fd', border: theme.colors.accent },
  warning: { bg: '#fef9e7', border: '#f1c40f' },
  error: { bg: '#fadbd8', border: theme.colors.danger },
}

export function NoticeBanner({ notice }: { notice: Notice }) {
  const s = NOTICE_STYLE[notice.severity]
  return (
    <p
      role={notice.severity === 'error' ? 'alert' : 'status'}
      style={{ margin: '12px 0', padding: '8px 10px', background: s.bg, borderLeft: `4px solid ${s.border}`, fontSize: 13 }}
    >
      {notice.message}
    </p>
  )
}
