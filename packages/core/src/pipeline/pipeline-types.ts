/**
 * Type definitions for the survey pipeline
 * @module pipeline/pipeline-types
 */

import type { OutputOutcome } from '../io/output-writer.js'
import type { ProcessName, SurveyResult, TeamMapping } from '../types/survey.js'
import type { Logger } from '../utils/logger.js'

/**
 * Progress callback. `done` counts rows handled so far, header included.
 */
export type ProgressCallback = (done: number, total: number) => void

/**
 * Options for reshaping rows already in memory
 */
export interface ProcessOptions {
  /** Processes to run, in output order */
  processes: readonly ProcessName[]
  /** Team mapping, required by current_skills and future_skills */
  mapping?: TeamMapping | null
  /** Callback for progress updates */
  onProgress?: ProgressCallback
  /** Logger, defaults to the pipeline logger */
  logger?: Logger
}

/**
 * Options for a full run from config.json
 */
export interface RunOptions {
  /** Path to config.json */
  configPath?: string
  /** Directory the output files are written to */
  outputDir?: string
  onProgress?: ProgressCallback
  logger?: Logger
}

/**
 * Result of a full run
 */
export interface RunResult {
  teamName: string
  processes: ProcessName[]
  /** Data rows reshaped, header excluded */
  rowCount: number
  result: SurveyResult
  outputs: OutputOutcome[]
}
