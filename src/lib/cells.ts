import type { CellValue } from '../types'

const INTEGER_TEXT = /^[+-]?\d+$/

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined || value === '' || (typeof value === 'number' && Number.isNaN(value))
}

/** Finite number, or undefined for anything else (text, missing). */
export function numericValue(value: CellValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

/** Parse integer text ("300884", "+12", "000001"); undefined when it is not one. */
export function parseIntegerText(text: string): number | undefined {
  const s = text.trim()
  if (!INTEGER_TEXT.test(s)) return undefined
  const n = Number(s)
  return Number.isSafeInteger(n) ? n : undefined
}

/** Identifier cell as an integer. Numeric-looking text counts, so "000001" is 1. */
export function identifierValue(value: CellValue | undefined): number | undefined {
  if (typeof value === 'number') return Number.isSafeInteger(value) ? value : undefined
  if (typeof value === 'string') return parseIntegerText(value)
  return undefined
}

/** Canonical base-10 form: no leading zeros, no separators. */
export function identifierText(value: CellValue | undefined): string | undefined {
  const id = identifierValue(value)
  return id === undefined ? undefined : String(id)
}

/** Text used for name matching; numbers are compared by their decimal form. */
export function textValue(value: CellValue | undefined): string | undefined {
  if (typeof value === 'string') return value === '' ? undefined : value
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return undefined
}
