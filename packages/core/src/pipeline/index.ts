/**
 * Pipeline Module
 *
 * Drives a survey run from config.json to the reshaped output files.
 *
 * @module pipeline
 */

export { processSurvey, runSurvey, inspectSurveyHeaders, type HeaderReport } from './SurveyPipeline.js'
export type {
  ProgressCallback,
  ProcessOptions,
  RunOptions,
  RunResult,
} from './pipeline-types.js'
