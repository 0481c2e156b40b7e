/**
 * Survey export reader
 *
 * Forms exports are UTF-8 with a byte-order mark and carry non-breaking
 * spaces inside answers; both are normalized before any header matching.
 */

import { readFileSync } from 'fs'
import { parse } from 'csv-parse/sync'
import { SurveyInputError, getErrorMessage, isSurveyError } from '../errors/index.js'
import type { SurveyRow } from '../types/survey.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('reader')

const NBSP = /\u00a0/g
const BOM = /^\ufeff/

export function normalizeCell(cell: string): string {
  return cell.replace(NBSP, ' ').trim()
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  )
}

/**
 * Parse CSV text into rows of normalized cells. Blank lines and rows whose
 * every cell is empty are skipped.
 */
export function parseSurveyCsv(text: string): SurveyRow[] {
  const records: unknown = parse(text.replace(BOM, ''), {
    relax_column_count: true,
    // a quote inside an unquoted answer is kept as text
    relax_quotes: true,
    skip_empty_lines: true,
  })
  if (!isStringRows(records)) {
    throw new SurveyInputError('Survey export did not parse into rows of text')
  }
  return records
    .map((row) => row.map(normalizeCell))
    .filter((row) => row.some((cell) => cell !== ''))
}

export function readSurveyCsv(path: string): SurveyRow[] {
  log.info('Reading input file...')
  try {
    const rows = parseSurveyCsv(readFileSync(path, 'utf8'))
    log.info('Input file read successfully.', { rows: rows.length })
    return rows
  } catch (error) {
    if (isSurveyError(error)) {
      throw error
    }
    throw new SurveyInputError(`Error reading input file '${path}': ${getErrorMessage(error)}`, {
      path,
      cause: error,
    })
  }
}
