/**
 * Future-skills reshaper
 *
 * Respondents list the subcategories they want to use and to learn as
 * free text, one answer per category. Both lists are merged into one
 * record per distinct subcategory. Names are taken as typed (after
 * cleaning) and are not checked against the team mapping.
 */

import { parseSubcategoryList } from '../parsing/subcategory.js'
import type { FutureSkillRecord, SurveyContext, SurveyRow } from '../types/survey.js'
import { readCell, readIdentityFields } from './row-fields.js'

export interface SubcategoryIntent {
  subcategory: string
  use: 0 | 1
  learn: 0 | 1
}

/**
 * Union of both lists in first-seen order, use list first
 */
export function mergeIntentLists(
  useList: readonly string[],
  learnList: readonly string[]
): SubcategoryIntent[] {
  const use = new Set(useList)
  const learn = new Set(learnList)
  const seen = new Set<string>()
  const merged: SubcategoryIntent[] = []

  for (const subcategory of [...useList, ...learnList]) {
    if (seen.has(subcategory)) {
      continue
    }
    seen.add(subcategory)
    merged.push({
      subcategory,
      use: use.has(subcategory) ? 1 : 0,
      learn: learn.has(subcategory) ? 1 : 0,
    })
  }

  return merged
}

/**
 * Records for every category of the mapping, in mapping order
 */
export function rowToFutureSkills(row: SurveyRow, context: SurveyContext): FutureSkillRecord[] {
  const identity = readIdentityFields(row, context)
  const records: FutureSkillRecord[] = []

  for (const [category, columns] of context.intents) {
    const useList = parseSubcategoryList(readCell(row, columns.USE))
    const learnList = parseSubcategoryList(readCell(row, columns.LEARN))

    for (const intent of mergeIntentLists(useList, learnList)) {
      records.push({
        ...identity,
        Category: category,
        SubCategory: intent.subcategory,
        Use: intent.use,
        Learn: intent.learn,
      })
    }
  }

  return records
}
