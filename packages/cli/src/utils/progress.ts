/**
 * Progress bar text for the run spinner
 */

import { DEFAULT_BAR_WIDTH } from '../config.js'

// room for the percentage after the bar
const PERCENT_ROOM = 7

/**
 * Half the terminal width, less room for the percentage
 */
export function getBarWidth(columns: number | undefined = process.stdout.columns): number {
  if (columns === undefined || columns <= 0) {
    return DEFAULT_BAR_WIDTH
  }
  return Math.max(Math.floor(columns / 2) - PERCENT_ROOM, 10)
}

/**
 * `[#####.....] 50.00%`
 */
export function formatProgressBar(done: number, total: number, width: number = getBarWidth()): string {
  const ratio = total > 0 ? Math.min(done / total, 1) : 1
  const complete = Math.round(ratio * width)
  const bar = `${'#'.repeat(complete)}${'.'.repeat(width - complete)}`
  return `[${bar}] ${(ratio * 100).toFixed(2)}%`
}
