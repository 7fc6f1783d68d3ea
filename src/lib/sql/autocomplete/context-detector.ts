/**
 * Context Detector Module
 *
 * Decides what kind of name the user is about to type from the last
 * significant token before the word under the cursor.
 */

import type { CompletionContext } from './types'
import { tokenize, isTrivia, tokenText } from '../tokenizer'

// Keywords after which a table (stream) name is expected
const TABLE_PRECEDING_KEYWORDS = new Set([
  'FROM', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'NATURAL', 'INTO',
])

// Keywords after which a column or expression is expected
const COLUMN_PRECEDING_KEYWORDS = new Set([
  'SELECT', 'WHERE', 'AND', 'OR', 'ON', 'HAVING', 'SET', 'BY',
  'WHEN', 'THEN', 'ELSE', 'CASE', 'DISTINCT', 'NOT', 'BETWEEN', 'LIKE', 'IN', 'IS',
])

// A comma continues the list opened by the nearest of these
const COLUMN_LIST_KEYWORDS = new Set(['SELECT', 'BY', 'WHERE', 'HAVING', 'ON'])
const TABLE_LIST_KEYWORDS = new Set(['FROM', 'JOIN'])

/**
 * Classify the completion context. `textBeforeCursor` should end where the
 * word being typed begins.
 */
export function determineContext(textBeforeCursor: string): CompletionContext {
  const words = tokenize(textBeforeCursor)
    .filter((token) => !isTrivia(token.kind))
    .map((token) => tokenText(textBeforeCursor, token).toUpperCase())

  if (words.length === 0) return 'general'
  const last = words[words.length - 1]

  if (TABLE_PRECEDING_KEYWORDS.has(last)) return 'tableRef'
  if (COLUMN_PRECEDING_KEYWORDS.has(last)) return 'columnRef'
  if (last === 'ORDER') return 'afterOrder'
  if (last === 'GROUP') return 'afterGroup'

  if (last === ',') {
    for (let i = words.length - 2; i >= 0; i--) {
      if (COLUMN_LIST_KEYWORDS.has(words[i])) return 'columnRef'
      if (TABLE_LIST_KEYWORDS.has(words[i])) return 'tableRef'
    }
    return 'columnRef'
  }

  return 'general'
}
