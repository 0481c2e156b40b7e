/**
 * Output writer
 *
 * One CSV per process, named `{process}_{team}.csv`. Existing files are
 * never overwritten: the writer falls back to `_1`, `_2` ... `_99` and
 * skips the output with a warning when every name is taken.
 */

import { existsSync, writeFileSync } from 'fs'
import { join } from 'path'
import { stringify } from 'csv-stringify/sync'
import {
  CURRENT_SKILL_COLUMNS,
  FUTURE_SKILL_COLUMNS,
  MAD_LIBS_RECORD_COLUMNS,
  type ProcessName,
  type SurveyResult,
} from '../types/survey.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('writer')

export const MAX_OUTPUT_VERSIONS = 100

export const PROCESS_LABELS: Readonly<Record<ProcessName, string>> = {
  mad_libs: 'Mad Libs',
  current_skills: 'Current Skills',
  future_skills: 'Future Skills',
}

const PROCESS_COLUMNS: Readonly<Record<ProcessName, readonly string[]>> = {
  mad_libs: MAD_LIBS_RECORD_COLUMNS,
  current_skills: CURRENT_SKILL_COLUMNS,
  future_skills: FUTURE_SKILL_COLUMNS,
}

export type OutputOutcome =
  | { process: ProcessName; status: 'written'; path: string; records: number }
  | { process: ProcessName; status: 'skipped'; reason: string }

export function outputBaseName(process: ProcessName, teamName: string): string {
  return `${process}_${teamName}`
}

/**
 * First free path among `base.csv`, `base_1.csv` ... `base_99.csv`,
 * or null when all are taken
 */
export function resolveOutputPath(dir: string, baseName: string): string | null {
  for (let version = 0; version < MAX_OUTPUT_VERSIONS; version++) {
    const fileName = version === 0 ? `${baseName}.csv` : `${baseName}_${version}.csv`
    const candidate = join(dir, fileName)
    if (!existsSync(candidate)) {
      return candidate
    }
  }
  return null
}

/**
 * Write a header row of `columns` followed by one row per record
 */
export function writeRecords(path: string, columns: readonly string[], records: readonly object[]): void {
  const content = stringify([...records], { header: true, columns: [...columns] })
  writeFileSync(path, content, { encoding: 'utf8', flag: 'wx' })
}

/**
 * Write every selected process's records to `dir`
 */
export function writeProcessOutputs(
  result: SurveyResult,
  processes: readonly ProcessName[],
  teamName: string,
  dir = '.'
): OutputOutcome[] {
  const outcomes: OutputOutcome[] = []

  for (const processName of processes) {
    const label = PROCESS_LABELS[processName]
    log.info(`Writing ${label}...`)

    const path = resolveOutputPath(dir, outputBaseName(processName, teamName))
    if (path === null) {
      log.warn(`Unable to create output file for ${processName}`)
      log.warn(`Please ensure there are less than ${MAX_OUTPUT_VERSIONS} versions for this file.`)
      outcomes.push({ process: processName, status: 'skipped', reason: 'no free file name' })
      continue
    }

    const records = result[processName]
    writeRecords(path, PROCESS_COLUMNS[processName], records)
    log.info(`${label} file: ${path} finished.`)
    outcomes.push({ process: processName, status: 'written', path, records: records.length })
  }

  return outcomes
}
