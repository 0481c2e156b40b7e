/**
 * Error output sanitization
 *
 * Config, mapping and survey paths appear in error messages; home
 * directory prefixes are shown as ~ in CLI output.
 */

import { homedir } from 'os'
import { getErrorMessage } from '@skills-survey/core'

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Error message with the home directory replaced by ~
 */
export function sanitizeError(error: unknown, home: string = homedir()): string {
  const message = getErrorMessage(error)
  if (home === '' || home === '/') {
    return message
  }
  return message.replace(new RegExp(escapeRegExp(home), 'g'), '~')
}
