/**
 * Maps remote query errors back onto the editor text.
 *
 * The query engine reports positions as `Line: 1, Column 15` (sometimes
 * `Column: 15`) somewhere inside a free-text message. The position is turned
 * into an offset and widened to the token it points at, so the editor can
 * underline a whole word instead of a single character.
 */

import { tokenize, isTrivia, findTokenIndexAt, type TextRange } from './tokenizer'

export interface SQLErrorPosition {
  /** 1-based */
  line: number
  /** 1-based */
  column: number
}

const POSITION_PATTERN = /Line:\s*(\d+),\s*Column:?\s*(\d+)/

/**
 * Extract the first line/column pair from an error message, e.g.
 * `"Expected: an expression, found: FROM at Line: 1, Column 15"`.
 */
export function parsePosition(message: string): SQLErrorPosition | null {
  const match = POSITION_PATTERN.exec(message)
  if (!match) return null

  const line = Number.parseInt(match[1], 10)
  const column = Number.parseInt(match[2], 10)
  if (!Number.isSafeInteger(line) || !Number.isSafeInteger(column)) return null

  return { line, column }
}

/** Convert a 1-based line/column into an offset, or null when out of bounds. */
export function characterOffset(line: number, column: number, sql: string): number | null {
  if (line < 1 || column < 1) return null

  let currentLine = 1
  let i = 0
  while (currentLine < line) {
    const newline = sql.indexOf('\n', i)
    if (newline === -1) return null
    i = newline + 1
    currentLine++
  }

  const offset = i + (column - 1)
  return offset <= sql.length ? offset : null
}

/**
 * Range of the token at `offset`. Trivia snaps forward to the next real token;
 * an offset at or past the end resolves to the last real token.
 */
export function tokenRangeAtOffset(offset: number, sql: string): TextRange | null {
  const tokens = tokenize(sql)

  if (offset >= sql.length) {
    for (let i = tokens.length - 1; i >= 0; i--) {
      if (!isTrivia(tokens[i].kind)) return tokens[i].range
    }
    return null
  }

  const index = findTokenIndexAt(tokens, offset)
  if (index === -1) return null

  for (let i = index; i < tokens.length; i++) {
    if (!isTrivia(tokens[i].kind)) return tokens[i].range
  }
  return null
}

export function errorHighlightRange(line: number, column: number, sql: string): TextRange | null {
  const offset = characterOffset(line, column, sql)
  if (offset === null) return null
  return tokenRangeAtOffset(offset, sql)
}

/** Parse the message and resolve its position in one step. */
export function errorRangeFromMessage(message: string, sql: string): TextRange | null {
  const position = parsePosition(message)
  if (!position) return null
  return errorHighlightRange(position.line, position.column, sql)
}
