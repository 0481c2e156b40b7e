/**
 * Survey Types
 *
 * Shapes shared by the header matcher, the reshapers and the output writer.
 */

/**
 * Category name -> ordered subcategory names for one team.
 * Subcategories are already in cleaned form.
 */
export type TeamMapping = Readonly<Record<string, readonly string[]>>

/**
 * Team name -> team mapping, as stored in the mapping file. Only the
 * selected team's entry is checked.
 */
export type MappingFile = Readonly<Record<string, unknown>>

/**
 * One row of the survey export, positionally aligned with the header row
 */
export type SurveyRow = readonly string[]

/**
 * The reshaping processes a run can select
 */
export const PROCESS_NAMES = ['mad_libs', 'current_skills', 'future_skills'] as const

export type ProcessName = (typeof PROCESS_NAMES)[number]

/**
 * Header text of the fixed identity questions
 */
export const IDENTITY_QUESTIONS = {
  name: 'Name',
  classification: 'Classification Level',
  team: 'What team are you on?',
} as const

export type IdentityField = keyof typeof IDENTITY_QUESTIONS

export type IdentityQuestion = (typeof IDENTITY_QUESTIONS)[IdentityField]

/**
 * Column position, or null when the header was never found
 */
export type ColumnPosition = number | null

/**
 * Which of the two current-skill questions a column answers
 */
export type SkillColumnRole = 'SELF' | 'TEAM'

/**
 * Which of the two future-skill questions a column answers
 */
export type IntentColumnRole = 'USE' | 'LEARN'

export type SkillColumns = Record<SkillColumnRole, ColumnPosition>

export type IntentColumns = Record<IntentColumnRole, ColumnPosition>

/**
 * A column recognized from its header text
 */
export type HeaderMatch =
  | { kind: 'identity'; field: IdentityField }
  | { kind: 'skill'; role: SkillColumnRole; category: string; subcategory: string }
  | { kind: 'intent'; role: IntentColumnRole; category: string }

/**
 * Column index tables built once from the header row and read by every
 * reshaper for the rest of the run.
 */
export interface SurveyContext {
  /** Identity question -> first column carrying it */
  identity: Map<IdentityField, number>
  /** Category -> subcategory -> self/team columns, in mapping order */
  skills: Map<string, Map<string, SkillColumns>>
  /** Category -> use/learn columns, in mapping order */
  intents: Map<string, IntentColumns>
  /** Headers that matched a question template for a category or subcategory not in the mapping */
  unmapped: string[]
}

/**
 * A mapping-declared column that no header matched
 */
export type MissingColumn =
  | { kind: 'identity'; field: IdentityField; header: IdentityQuestion }
  | { kind: 'skill'; role: SkillColumnRole; category: string; subcategory: string }
  | { kind: 'intent'; role: IntentColumnRole; category: string }

// =============================================================================
// Skill levels
// =============================================================================

export const SKILL_LEVEL_DESCS = ['None', 'Novice', 'Intermediate', 'Advanced', 'Expert', 'N/A'] as const

export type SkillLevelDesc = (typeof SKILL_LEVEL_DESCS)[number]

export type SkillLevelValue = 0 | 1 | 2 | 3 | 4 | 'N/A'

export interface SkillLevel {
  value: SkillLevelValue
  desc: SkillLevelDesc
}

// =============================================================================
// Output records
// =============================================================================

export interface IdentityFields {
  Name: string
  Classification: string
  Team: string
}

export interface CurrentSkillRecord extends IdentityFields {
  Category: string
  SubCategory: string
  'Skill Level Value': SkillLevelValue
  'Skill Level Desc': SkillLevelDesc
  'Team Need Value': SkillLevelValue
  'Team Need Desc': SkillLevelDesc
}

export interface FutureSkillRecord extends IdentityFields {
  Category: string
  SubCategory: string
  Use: 0 | 1
  Learn: 0 | 1
}

export interface MadLibsRecord {
  FullName: string
  'Mad Libs': string
}

export const CURRENT_SKILL_COLUMNS = [
  'Name',
  'Classification',
  'Team',
  'Category',
  'SubCategory',
  'Skill Level Value',
  'Skill Level Desc',
  'Team Need Value',
  'Team Need Desc',
] as const satisfies readonly (keyof CurrentSkillRecord)[]

export const FUTURE_SKILL_COLUMNS = [
  'Name',
  'Classification',
  'Team',
  'Category',
  'SubCategory',
  'Use',
  'Learn',
] as const satisfies readonly (keyof FutureSkillRecord)[]

export const MAD_LIBS_RECORD_COLUMNS = ['FullName', 'Mad Libs'] as const satisfies readonly (keyof MadLibsRecord)[]

/**
 * Records produced by one run, one list per process
 */
export interface SurveyResult {
  mad_libs: MadLibsRecord[]
  current_skills: CurrentSkillRecord[]
  future_skills: FutureSkillRecord[]
}
