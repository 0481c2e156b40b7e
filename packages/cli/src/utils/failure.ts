/**
 * Fatal error reporting for the CLI exit path
 */

import { createLogger, getErrorMessage, wrapError, type SurveyError } from '@skills-survey/core'
import { sanitizeError } from './sanitize.js'

const log = createLogger('cli')

/**
 * Log a fatal error at CRITICAL, with its cause chain at DEBUG
 */
export function logFailure(error: unknown): SurveyError {
  const failure = wrapError(error, getErrorMessage(error))
  log.critical(sanitizeError(failure), failure)
  log.debug('Failure details', {
    code: failure.code,
    context: failure.toJSON().context,
    chain: failure.getErrorChain().map((link) => sanitizeError(link)),
  })
  return failure
}
