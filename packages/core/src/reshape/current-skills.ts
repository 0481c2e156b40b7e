/**
 * Current-skills reshaper
 *
 * Pivots one respondent row into a record per (category, subcategory) of the
 * team mapping, pairing the self-rated level with the team-need level.
 */

import { SkillLevelError } from '../errors/index.js'
import {
  SKILL_LEVEL_DESCS,
  type ColumnPosition,
  type CurrentSkillRecord,
  type SkillLevel,
  type SkillLevelDesc,
  type SkillLevelValue,
  type SurveyContext,
  type SurveyRow,
} from '../types/survey.js'
import { readCell, readIdentityFields } from './row-fields.js'

export const SKILL_LEVEL_VALUES: Readonly<Record<SkillLevelDesc, SkillLevelValue>> = {
  None: 0,
  Novice: 1,
  Intermediate: 2,
  Advanced: 3,
  Expert: 4,
  'N/A': 'N/A',
}

const NOT_ANSWERED: SkillLevelDesc = 'N/A'

function isSkillLevelDesc(text: string): text is SkillLevelDesc {
  return SKILL_LEVEL_DESCS.some((desc) => desc === text)
}

/**
 * Map level text to its value. Empty text is "N/A"; anything outside the
 * scale throws SkillLevelError.
 */
export function toSkillLevel(text: string, column?: number): SkillLevel {
  const desc = text === '' ? NOT_ANSWERED : text
  if (!isSkillLevelDesc(desc)) {
    throw new SkillLevelError(text, { column })
  }
  return { value: SKILL_LEVEL_VALUES[desc], desc }
}

function readSkillLevel(row: SurveyRow, position: ColumnPosition): SkillLevel {
  return toSkillLevel(readCell(row, position), position ?? undefined)
}

/**
 * One record per mapping (category, subcategory), in mapping order
 */
export function rowToCurrentSkills(row: SurveyRow, context: SurveyContext): CurrentSkillRecord[] {
  const identity = readIdentityFields(row, context)
  const records: CurrentSkillRecord[] = []

  for (const [category, subcategories] of context.skills) {
    for (const [subcategory, columns] of subcategories) {
      const self = readSkillLevel(row, columns.SELF)
      const team = readSkillLevel(row, columns.TEAM)

      records.push({
        ...identity,
        Category: category,
        SubCategory: subcategory,
        'Skill Level Value': self.value,
        'Skill Level Desc': self.desc,
        'Team Need Value': team.value,
        'Team Need Desc': team.desc,
      })
    }
  }

  return records
}
