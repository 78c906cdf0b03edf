import { styles } from '../theme'

interface MetricPickerProps {
  label: string
  options: readonly string[]
  selected: readonly string[]
  onChange: (next: string[]) => void
}

/** Multi-select as a row of checkboxes; keeps the options' order. */
export function MetricPicker({ label, options, selected, onChange }: MetricPickerProps) {
  const toggle = (metric: string) => {
    const next = selected.includes(metric) ? selected.filter((m) => m !== metric) : [...selected, metric]
    onChange(options.filter((o) => next.includes(o)))
  }
  return (
    <fieldset style={{ border: 'none', marginBottom: 12 }}>
      <legend style={{ ...styles.textLabel, marginBottom: 6 }}>{label}</legend>
      <div style={{ display: 'flex', flexWrap: 'wrap', gap: 12 }}>
        {options.map((m) => (
          <label key={m} style={{ fontSize: 13, display: 'flex', gap: 4, alignItems: 'center' }}>
            <input type="checkbox" checked={selected.includes(m)} onChange={() => toggle(m)} />
            {m}
          </label>
        ))}
      </div>
    </fieldset>
  )
}
