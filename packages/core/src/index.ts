/**
 * @skills-survey/core - Skills survey reshaping
 */

// Version
export const VERSION = '0.1.0'

// Types
export {
  PROCESS_NAMES,
  IDENTITY_QUESTIONS,
  SKILL_LEVEL_DESCS,
  CURRENT_SKILL_COLUMNS,
  FUTURE_SKILL_COLUMNS,
  MAD_LIBS_RECORD_COLUMNS,
} from './types/survey.js'
export type {
  TeamMapping,
  MappingFile,
  SurveyRow,
  ProcessName,
  IdentityField,
  IdentityQuestion,
  ColumnPosition,
  SkillColumnRole,
  IntentColumnRole,
  SkillColumns,
  IntentColumns,
  HeaderMatch,
  SurveyContext,
  MissingColumn,
  SkillLevelDesc,
  SkillLevelValue,
  SkillLevel,
  IdentityFields,
  CurrentSkillRecord,
  FutureSkillRecord,
  MadLibsRecord,
  SurveyResult,
} from './types/survey.js'

// Header matching
export * from './matching/index.js'

// Parsing
export { cleanSubcategory, parseSubcategoryList } from './parsing/subcategory.js'

// Reshapers
export { SKILL_LEVEL_VALUES, toSkillLevel, rowToCurrentSkills } from './reshape/current-skills.js'
export { mergeIntentLists, rowToFutureSkills, type SubcategoryIntent } from './reshape/future-skills.js'
export {
  MAD_LIBS_QUESTIONS,
  MAD_LIBS_TEMPLATE,
  mapMadLibsColumns,
  fillTemplate,
  rowToMadLibs,
  type MadLibsColumns,
} from './reshape/mad-libs.js'
export { readCell, readIdentityFields } from './reshape/row-fields.js'

// Pipeline
export * from './pipeline/index.js'

// Configuration
export * from './config/index.js'

// Input / output
export * from './io/index.js'

// Errors
export * from './errors/index.js'

// Logging
export * from './utils/index.js'
