/**
 * Header Matcher
 *
 * Binds the free-text survey question columns to the categories and
 * subcategories of a team mapping. Category and subcategory names are only
 * known at run time, so each header is matched against four fixed question
 * templates and the captured names are looked up in the mapping.
 */

import { cleanSubcategory } from '../parsing/subcategory.js'
import {
  IDENTITY_QUESTIONS,
  type HeaderMatch,
  type IdentityField,
  type IntentColumnRole,
  type IntentColumns,
  type MissingColumn,
  type SkillColumnRole,
  type SkillColumns,
  type SurveyContext,
  type TeamMapping,
} from '../types/survey.js'

/**
 * Question templates. Anchored at both ends and case-sensitive; the
 * current-skill questions carry the subcategory after a literal "?.".
 */
export const HEADER_PATTERNS = {
  SELF: /^How would you describe your current experience or comfort level with.(?<category>.*)\?\.(?<subcategory>.*)$/,
  TEAM: /^Based on what you know today, what level of.(?<category>.*).skills do you think your team will need over the next 12 months\?\.(?<subcategory>.*)$/,
  USE: /^Which.(?<category>.*).skills would you like to use in your day-to-day work, or feel are underused\?$/,
  LEARN: /^Are there.(?<category>.*).skills you are interested in learning or continuing to develop\?$/,
} as const satisfies Record<SkillColumnRole | IntentColumnRole, RegExp>

const SKILL_ROLES: readonly SkillColumnRole[] = ['SELF', 'TEAM']
const INTENT_ROLES: readonly IntentColumnRole[] = ['USE', 'LEARN']

const IDENTITY_FIELDS = Object.keys(IDENTITY_QUESTIONS).filter(
  (key): key is IdentityField => key in IDENTITY_QUESTIONS
)

/**
 * Identity question text is never a category, even if a mapping lists it
 */
export function isIdentityQuestion(text: string): boolean {
  return IDENTITY_FIELDS.some((field) => IDENTITY_QUESTIONS[field] === text)
}

/**
 * Recognize a single header cell. Returns null for columns the reshapers
 * do not read.
 */
export function classifyHeader(text: string): HeaderMatch | null {
  const field = IDENTITY_FIELDS.find((f) => IDENTITY_QUESTIONS[f] === text)
  if (field !== undefined) {
    return { kind: 'identity', field }
  }

  for (const role of SKILL_ROLES) {
    const groups = HEADER_PATTERNS[role].exec(text)?.groups
    if (groups?.category !== undefined && groups.subcategory !== undefined) {
      return {
        kind: 'skill',
        role,
        category: groups.category.trim(),
        subcategory: cleanSubcategory(groups.subcategory),
      }
    }
  }

  for (const role of INTENT_ROLES) {
    const category = HEADER_PATTERNS[role].exec(text)?.groups?.category
    if (category !== undefined) {
      return { kind: 'intent', role, category: category.trim() }
    }
  }

  return null
}

/**
 * Tables seeded with every mapping entry set to unset, so lookups never
 * miss a key for a header absent from the survey.
 */
export function createSurveyContext(mapping: TeamMapping): SurveyContext {
  const skills = new Map<string, Map<string, SkillColumns>>()
  const intents = new Map<string, IntentColumns>()

  for (const [category, subcategories] of Object.entries(mapping)) {
    if (isIdentityQuestion(category)) {
      continue
    }
    const columns = new Map<string, SkillColumns>()
    for (const subcategory of subcategories) {
      columns.set(subcategory, { SELF: null, TEAM: null })
    }
    skills.set(category, columns)
    intents.set(category, { USE: null, LEARN: null })
  }

  return { identity: new Map(), skills, intents, unmapped: [] }
}

/**
 * Build the column index tables from the header row.
 *
 * Identity columns keep their first position. A template match for a
 * category or subcategory the mapping does not declare is recorded in
 * `unmapped` and otherwise ignored.
 */
export function matchHeaders(header: readonly string[], mapping: TeamMapping): SurveyContext {
  const context = createSurveyContext(mapping)

  header.forEach((text, index) => {
    const match = classifyHeader(text)
    if (match === null) {
      return
    }

    switch (match.kind) {
      case 'identity':
        if (!context.identity.has(match.field)) {
          context.identity.set(match.field, index)
        }
        break
      case 'skill': {
        const columns = context.skills.get(match.category)?.get(match.subcategory)
        if (columns === undefined) {
          context.unmapped.push(text)
        } else {
          columns[match.role] = index
        }
        break
      }
      case 'intent': {
        const columns = context.intents.get(match.category)
        if (columns === undefined) {
          context.unmapped.push(text)
        } else {
          columns[match.role] = index
        }
        break
      }
    }
  })

  return context
}

/**
 * List every identity or mapping-declared column no header matched
 */
export function findMissingColumns(context: SurveyContext): MissingColumn[] {
  const missing: MissingColumn[] = []

  for (const field of IDENTITY_FIELDS) {
    if (!context.identity.has(field)) {
      missing.push({ kind: 'identity', field, header: IDENTITY_QUESTIONS[field] })
    }
  }

  for (const [category, subcategories] of context.skills) {
    for (const [subcategory, columns] of subcategories) {
      for (const role of SKILL_ROLES) {
        if (columns[role] === null) {
          missing.push({ kind: 'skill', role, category, subcategory })
        }
      }
    }
  }

  for (const [category, columns] of context.intents) {
    for (const role of INTENT_ROLES) {
      if (columns[role] === null) {
        missing.push({ kind: 'intent', role, category })
      }
    }
  }

  return missing
}

/**
 * Short human-readable label for a missing column
 */
export function describeMissingColumn(column: MissingColumn): string {
  switch (column.kind) {
    case 'identity':
      return `"${column.header}"`
    case 'skill':
      return `${column.category} / ${column.subcategory} (${column.role})`
    case 'intent':
      return `${column.category} (${column.role})`
  }
}
