/**
 * Subcategory text cleaning.
 *
 * Survey headers and free-text answers list subcategories with examples in
 * parentheses, e.g. "AWS (examples: EC2, S3)". Only the text before the
 * first "(" names the subcategory.
 */

const EXAMPLES_START = '('
const LIST_DELIMITER = ';'

/**
 * Drop everything from the first "(" onward and trim whitespace.
 * Idempotent.
 */
export function cleanSubcategory(raw: string): string {
  const examplesAt = raw.indexOf(EXAMPLES_START)
  const name = examplesAt === -1 ? raw : raw.slice(0, examplesAt)
  return name.trim()
}

/**
 * Split a semicolon-delimited answer into cleaned subcategory names.
 *
 * Fragments that are empty once cleaned are dropped, so "" yields [] and a
 * trailing ";" adds nothing. Duplicates are kept in order.
 *
 * @example
 * parseSubcategoryList('AWS (EC2); Terraform;') // ['AWS', 'Terraform']
 */
export function parseSubcategoryList(cell: string): string[] {
  if (cell === '') {
    return []
  }

  const names: string[] = []
  for (const fragment of cell.split(LIST_DELIMITER)) {
    const name = cleanSubcategory(fragment)
    if (name !== '') {
      names.push(name)
    }
  }
  return names
}
