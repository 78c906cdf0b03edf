import type { DataRow } from '../types'
import { styles } from '../theme'

interface DataTableProps {
  rows: readonly DataRow[]
  columns: readonly string[]
  /** Show a 1-based rank column */
  numbered?: boolean
  maxHeight?: number
  testId?: string
}

function formatCell(value: DataRow[string] | undefined): string {
  if (value == null) return '—'
  if (typeof value === 'number' && !Number.isInteger(value)) return value.toFixed(2)
  return String(value)
}

export function DataTable({ rows, columns, numbered = false, maxHeight, testId }: DataTableProps) {
  return (
    <div style={{ overflow: 'auto', maxHeight }} data-testid={testId}>
      <table style={{ borderCollapse: 'collapse', width: '100%' }}>
        <thead>
          <tr>
            {numbered && <th style={styles.tableHeader}>#</th>}
            {columns.map((c) => (
              <th key={c} style={styles.tableHeader}>
                {c}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, i) => (
            <tr key={i}>
              {numbered && <td style={styles.tableCell}>{i + 1}</td>}
              {columns.map((c) => (
                <td key={c} style={styles.tableCell}>
                  {formatCell(row[c])}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
