/**
 * User-facing notices for engine errors. Only the presentation layer calls this.
 */

import { isEngineError } from './errors'

export type NoticeSeverity = 'info' | 'warning' | 'error'

export interface Notice {
  severity: NoticeSeverity
  message: string
}

export function describeEngineError(err: unknown): Notice {
  if (!isEngineError(err)) {
    return { severity: 'error', message: `Something went wrong: ${err instanceof Error ? err.message : String(err)}` }
  }
  switch (err.kind) {
    case 'schema':
      return { severity: 'error', message: `The dataset cannot be analysed: ${err.message}. Upload a file with a stock code column.` }
    case 'configuration':
      return { severity: 'warning', message: `Please adjust the selection: ${err.message}.` }
    case 'validation':
      if (err.message === 'non-integer identifier') {
        return { severity: 'error', message: 'Stock codes must be whole numbers. Enter a valid stock code.' }
      }
      if (err.message === 'empty query') return { severity: 'warning', message: 'Enter a stock code or company name.' }
      return { severity: 'warning', message: `Invalid input: ${err.message}.` }
  }
}

export function noMatchesNotice(): Notice {
  return {
    severity: 'info',
    message: 'No matching companies. Check the input, or open the data preview to see the available codes and names.',
  }
}
