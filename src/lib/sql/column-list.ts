/**
 * Locates the projection list of a SELECT statement so the editor can swap it
 * (e.g. for `*` or an explicit field list) while everything else in the query,
 * comments and subqueries included, stays byte-for-byte the same.
 */

import { tokenize, isTrivia, isKeyword, type TextRange } from './tokenizer'
import { formatIdentifier } from './identifiers'

/**
 * Range of the column list between `SELECT [DISTINCT]` and the top-level
 * `FROM`, without the trivia that precedes `FROM`. Returns null when the text
 * is not a SELECT with a FROM clause.
 */
export function selectColumnListRange(sql: string): TextRange | null {
  const tokens = tokenize(sql)
  let idx = 0

  const skipTrivia = () => {
    while (idx < tokens.length && isTrivia(tokens[idx].kind)) idx++
  }

  skipTrivia()
  if (idx >= tokens.length || !isKeyword(tokens[idx].kind, 'SELECT')) return null
  idx++

  skipTrivia()
  if (idx < tokens.length && isKeyword(tokens[idx].kind, 'DISTINCT')) idx++

  skipTrivia()
  if (idx >= tokens.length) return null
  const columnStart = idx

  let depth = 0
  let fromIdx = -1
  for (let j = columnStart; j < tokens.length; j++) {
    const { kind } = tokens[j]
    if (kind.type === 'leftParen') {
      depth++
    } else if (kind.type === 'rightParen') {
      depth = Math.max(0, depth - 1)
    } else if (depth === 0 && isKeyword(kind, 'FROM')) {
      fromIdx = j
      break
    }
  }

  if (fromIdx <= columnStart) return null

  let lastColumn = fromIdx - 1
  while (lastColumn >= columnStart && isTrivia(tokens[lastColumn].kind)) lastColumn--
  if (lastColumn < columnStart) return null

  return { from: tokens[columnStart].range.from, to: tokens[lastColumn].range.to }
}

/**
 * Replace the column list with `*` or the given fields. Field names are quoted
 * where the remote engine needs it. Returns null when no column list is found.
 */
export function replaceSelectColumns(sql: string, columns: readonly string[] | '*'): string | null {
  const range = selectColumnListRange(sql)
  if (!range) return null

  const projection = columns === '*' || columns.length === 0
    ? '*'
    : columns.map(formatIdentifier).join(', ')

  return sql.slice(0, range.from) + projection + sql.slice(range.to)
}
