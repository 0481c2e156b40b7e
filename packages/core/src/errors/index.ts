/**
 * Error Classes Module
 *
 * @example
 * ```typescript
 * import { ConfigurationError, wrapError } from '@skills-survey/core'
 *
 * try {
 *   config = JSON.parse(raw)
 * } catch (error) {
 *   throw new ConfigurationError(`Could not decode JSON from '${path}'`, { cause: error, path })
 * }
 * ```
 *
 * @module errors
 */

export {
  SurveyError,
  ConfigurationError,
  SurveyInputError,
  SkillLevelError,
  TemplateError,
  ColumnLookupError,
  wrapError,
  getErrorMessage,
  isSurveyError,
} from './SurveyError.js'
