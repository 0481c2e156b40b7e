/**
 * Header Matching Module
 *
 * Recognizes the identity and question-template columns of a survey export.
 *
 * @module matching
 */

export {
  HEADER_PATTERNS,
  classifyHeader,
  createSurveyContext,
  matchHeaders,
  findMissingColumns,
  describeMissingColumn,
  isIdentityQuestion,
} from './HeaderMatcher.js'
