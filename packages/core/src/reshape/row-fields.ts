import { ColumnLookupError } from '../errors/index.js'
import {
  IDENTITY_QUESTIONS,
  type ColumnPosition,
  type IdentityField,
  type IdentityFields,
  type SurveyContext,
  type SurveyRow,
} from '../types/survey.js'

/**
 * Cell at a column position. An unset column, or a row shorter than the
 * header, reads as an empty answer.
 */
export function readCell(row: SurveyRow, position: ColumnPosition): string {
  if (position === null) {
    return ''
  }
  return row[position] ?? ''
}

function identityCell(row: SurveyRow, context: SurveyContext, field: IdentityField): string {
  const position = context.identity.get(field)
  if (position === undefined) {
    throw new ColumnLookupError(IDENTITY_QUESTIONS[field])
  }
  return readCell(row, position)
}

/**
 * Name, classification and team shared by every record built from a row
 */
export function readIdentityFields(row: SurveyRow, context: SurveyContext): IdentityFields {
  return {
    Name: identityCell(row, context, 'name'),
    Classification: identityCell(row, context, 'classification'),
    Team: identityCell(row, context, 'team'),
  }
}
