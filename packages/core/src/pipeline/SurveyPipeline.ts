/**
 * Survey Pipeline
 *
 * Single pass over the survey rows: the header row builds the column
 * tables, then each data row is reshaped by every selected process.
 * Output keeps input row order.
 */

import { loadRunConfig, resolveRunInputs, DEFAULT_CONFIG_PATH } from '../config/run-config.js'
import { ConfigurationError } from '../errors/index.js'
import { readSurveyCsv } from '../io/survey-reader.js'
import { writeProcessOutputs } from '../io/output-writer.js'
import { describeMissingColumn, findMissingColumns, matchHeaders } from '../matching/HeaderMatcher.js'
import { rowToCurrentSkills } from '../reshape/current-skills.js'
import { rowToFutureSkills } from '../reshape/future-skills.js'
import { mapMadLibsColumns, rowToMadLibs, type MadLibsColumns } from '../reshape/mad-libs.js'
import type { SurveyContext, SurveyResult, SurveyRow } from '../types/survey.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { ProcessOptions, RunOptions, RunResult } from './pipeline-types.js'

const defaultLog = createLogger('pipeline')

function reportMissingColumns(context: SurveyContext, log: Logger): void {
  for (const column of findMissingColumns(context)) {
    log.debug(`No survey column for ${describeMissingColumn(column)}`)
  }
  for (const header of context.unmapped) {
    log.debug(`Column not in team mapping: ${header}`)
  }
}

/**
 * Reshape parsed survey rows. The first row must be the header row.
 */
export function processSurvey(rows: readonly SurveyRow[], options: ProcessOptions): SurveyResult {
  const log = options.logger ?? defaultLog
  const { processes, onProgress } = options
  const result: SurveyResult = { mad_libs: [], current_skills: [], future_skills: [] }

  const [header, ...dataRows] = rows
  if (header === undefined) {
    log.warn('Survey export has no rows')
    return result
  }

  const runMadLibs = processes.includes('mad_libs')
  const runCurrent = processes.includes('current_skills')
  const runFuture = processes.includes('future_skills')

  let madLibsColumns: MadLibsColumns | null = null
  if (runMadLibs) {
    madLibsColumns = mapMadLibsColumns(header)
    for (const question of madLibsColumns.missing) {
      log.warn(`MISSING - ${question}`)
    }
  }

  let context: SurveyContext | null = null
  if (runCurrent || runFuture) {
    if (!options.mapping) {
      throw new ConfigurationError('A team mapping is required for current_skills and future_skills')
    }
    context = matchHeaders(header, options.mapping)
    reportMissingColumns(context, log)
  }

  log.info('Starting processing...')
  const total = rows.length
  onProgress?.(1, total)

  dataRows.forEach((row, index) => {
    if (madLibsColumns !== null) {
      result.mad_libs.push(rowToMadLibs(row, madLibsColumns))
    }
    if (context !== null && runCurrent) {
      result.current_skills.push(...rowToCurrentSkills(row, context))
    }
    if (context !== null && runFuture) {
      result.future_skills.push(...rowToFutureSkills(row, context))
    }
    onProgress?.(index + 2, total)
  })

  log.info('Processing completed.', {
    rows: dataRows.length,
    madLibs: result.mad_libs.length,
    currentSkills: result.current_skills.length,
    futureSkills: result.future_skills.length,
  })
  return result
}

/**
 * Full run: config -> survey export -> reshaped records -> output files
 */
export function runSurvey(options: RunOptions = {}): RunResult {
  const log = options.logger ?? defaultLog
  log.info('Starting skills analysis...')

  const config = loadRunConfig(options.configPath ?? DEFAULT_CONFIG_PATH)
  const inputs = resolveRunInputs(config)
  const rows = readSurveyCsv(inputs.csvFile)

  const result = processSurvey(rows, {
    processes: inputs.processes,
    mapping: inputs.mapping,
    onProgress: options.onProgress,
    logger: log,
  })
  const outputs = writeProcessOutputs(result, inputs.processes, inputs.teamName, options.outputDir)

  return {
    teamName: inputs.teamName,
    processes: inputs.processes,
    rowCount: Math.max(rows.length - 1, 0),
    result,
    outputs,
  }
}

/**
 * Header diagnostics for a configured run, without reshaping or writing
 */
export interface HeaderReport {
  teamName: string
  columnCount: number
  context: SurveyContext | null
  missing: string[]
  madLibsMissing: string[]
}

export function inspectSurveyHeaders(configPath: string = DEFAULT_CONFIG_PATH): HeaderReport {
  const config = loadRunConfig(configPath)
  const inputs = resolveRunInputs(config)
  const [header = []] = readSurveyCsv(inputs.csvFile)

  const context = inputs.mapping ? matchHeaders(header, inputs.mapping) : null
  const madLibsMissing = inputs.processes.includes('mad_libs') ? mapMadLibsColumns(header).missing : []

  return {
    teamName: inputs.teamName,
    columnCount: header.length,
    context,
    missing: context ? findMissingColumns(context).map(describeMissingColumn) : [],
    madLibsMissing,
  }
}
