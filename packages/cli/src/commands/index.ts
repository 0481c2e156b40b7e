/**
 * CLI Commands
 *
 * Export all CLI commands for registration.
 */

export { createRunCommand, executeRun, applyLogLevel, formatRunSummary } from './run.js'
export { createHeadersCommand, formatHeaderReport, formatHeaderReportJson } from './headers.js'
