export { parseSurveyCsv, readSurveyCsv, normalizeCell } from './survey-reader.js'
export {
  MAX_OUTPUT_VERSIONS,
  PROCESS_LABELS,
  outputBaseName,
  resolveOutputPath,
  writeRecords,
  writeProcessOutputs,
  type OutputOutcome,
} from './output-writer.js'
