/**
 * Mad-libs composer
 *
 * Fills a sentence template from the icebreaker answers of the survey.
 * Placeholders are the raw header text of the answer columns.
 */

import { TemplateError } from '../errors/index.js'
import type { MadLibsRecord, SurveyRow } from '../types/survey.js'

/**
 * Answer columns the template reads, plus "Name" for the record key
 */
export const MAD_LIBS_QUESTIONS = [
  'Name',
  'Your Name',
  'What team are you on?',
  'Adjective (how would you describe yourself?)',
  'Role/Title (Your role or what best describes your work)',
  'Tool/System/Approach (What do you love working with?)',
  "Skill or Strength (What’s something you're great at?)",
  'Biggest Challenge or Growth Area (What do you find tricky?)',
  'Notable Experience or Achievement (Something cool you’ve done)',
  'Favorite Part of Work (What makes your job fun, meaningful, or energizing)',
] as const

const FULL_NAME_QUESTION = 'Name'

export const MAD_LIBS_TEMPLATE =
  'Hi, my name is {Your Name}, and I am on the {What team are you on?} Team. and I am a' +
  ' {Adjective (how would you describe yourself?)}' +
  ' {Role/Title (Your role or what best describes your work)} who loves working with' +
  ' {Tool/System/Approach (What do you love working with?)}. My superpower is' +
  " {Skill or Strength (What’s something you're great at?)}, and my biggest challenge is" +
  ' {Biggest Challenge or Growth Area (What do you find tricky?)}. In the past, I have' +
  ' {Notable Experience or Achievement (Something cool you’ve done)}, and my favorite part of my' +
  ' work is {Favorite Part of Work (What makes your job fun, meaningful, or energizing)}!'

const PLACEHOLDER = /\{([^{}]+)\}/g

/**
 * Column position -> question, built once from the header row
 */
export interface MadLibsColumns {
  positions: Map<number, string>
  /** Expected questions with no matching header */
  missing: string[]
}

/**
 * Locate each expected question by exact header text (first occurrence)
 */
export function mapMadLibsColumns(
  header: readonly string[],
  questions: readonly string[] = MAD_LIBS_QUESTIONS
): MadLibsColumns {
  const positions = new Map<number, string>()
  const missing: string[] = []

  for (const question of questions) {
    const index = header.indexOf(question)
    if (index === -1) {
      missing.push(question)
    } else {
      positions.set(index, question)
    }
  }

  return { positions, missing }
}

/**
 * Substitute `{key}` placeholders. A placeholder without a value throws
 * TemplateError.
 */
export function fillTemplate(template: string, values: ReadonlyMap<string, string>): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = values.get(key)
    if (value === undefined) {
      throw new TemplateError(key)
    }
    return value
  })
}

export function rowToMadLibs(
  row: SurveyRow,
  columns: MadLibsColumns,
  template: string = MAD_LIBS_TEMPLATE
): MadLibsRecord {
  const values = new Map<string, string>()
  for (const [index, question] of columns.positions) {
    values.set(question, row[index] ?? '')
  }

  return {
    FullName: values.get(FULL_NAME_QUESTION) ?? '',
    'Mad Libs': fillTemplate(template, values),
  }
}
