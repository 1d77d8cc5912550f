/**
 * CSV export of the sample history
 */

import type { Sample } from '../../src'

export const CSV_COLUMNS = [
  'tick',
  'time',
  'temperature',
  'controlOutput',
  'emissionRate',
  'setpoint',
  'mode',
  'saturated',
  'outputSaturated',
] as const

/**
 * One header line plus one line per sample, newline-terminated
 */
export function formatCsv(samples: readonly Sample[]): string {
  const lines = [CSV_COLUMNS.join(',')]
  for (const sample of samples) {
    lines.push(CSV_COLUMNS.map((column) => String(sample[column])).join(','))
  }
  return lines.join('\n') + '\n'
}

/**
 * History is a bounded ring, so a long run only has its newest samples left to write
 */
export function describeCsvWindow(written: number, total: number): string {
  return written < total ? `last ${written} of ${total} samples` : `${written} samples`
}
