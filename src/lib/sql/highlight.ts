/**
 * Regex-based syntax classification for the query editor.
 *
 * Kept separate from the tokenizer: it has to produce sensible styling for
 * whatever half-typed text is in the editor. Comments and quoted runs are
 * found first and become protected ranges; numbers, keywords and functions
 * are only styled outside them, so `'select'` stays a string.
 */

import { SORTED_KEYWORDS, SORTED_FUNCTIONS } from './vocabulary'

export type HighlightStyle = 'comment' | 'string' | 'identifier' | 'number' | 'keyword' | 'function'

export interface HighlightRange {
  from: number
  to: number
  style: HighlightStyle
}

// One left-to-right pass so a quote inside a comment (or `--` inside a string)
// is not taken as the start of another run.
const PROTECTED_PATTERN = /--[^\n]*|\/\*[\s\S]*?(?:\*\/|$)|'[^']*(?:''[^']*)*'|"[^"]*(?:""[^"]*)*"/g
// `\b` only knows ASCII word characters, so word edges are spelled out:
// `or` inside `ñor` is not a keyword
const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]'
function wholeWord(body: string, flags: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})(?:${body})(?!${WORD_CHAR})`, flags)
}

const NUMBER_PATTERN = wholeWord('\\d+(?:\\.\\d+)?', 'gu')
const KEYWORD_PATTERN = wholeWord(SORTED_KEYWORDS.join('|'), 'giu')
const FUNCTION_PATTERN = wholeWord(SORTED_FUNCTIONS.join('|'), 'giu')

function protectedStyle(match: string): HighlightStyle {
  if (match.startsWith("'")) return 'string'
  if (match.startsWith('"')) return 'identifier'
  return 'comment'
}

function isProtected(from: number, to: number, protectedRanges: HighlightRange[]): boolean {
  return protectedRanges.some((p) => from >= p.from && to <= p.to)
}

function collectUnprotected(
  sql: string,
  pattern: RegExp,
  style: HighlightStyle,
  protectedRanges: HighlightRange[],
  out: HighlightRange[]
): void {
  for (const match of sql.matchAll(pattern)) {
    const from = match.index ?? 0
    const to = from + match[0].length
    if (!isProtected(from, to, protectedRanges)) {
      out.push({ from, to, style })
    }
  }
}

/**
 * Classify `sql` into styled ranges, sorted by start offset.
 */
export function classify(sql: string): HighlightRange[] {
  if (!sql) return []

  const protectedRanges: HighlightRange[] = []
  for (const match of sql.matchAll(PROTECTED_PATTERN)) {
    const from = match.index ?? 0
    protectedRanges.push({ from, to: from + match[0].length, style: protectedStyle(match[0]) })
  }

  const ranges = [...protectedRanges]
  collectUnprotected(sql, NUMBER_PATTERN, 'number', protectedRanges, ranges)
  collectUnprotected(sql, KEYWORD_PATTERN, 'keyword', protectedRanges, ranges)
  collectUnprotected(sql, FUNCTION_PATTERN, 'function', protectedRanges, ranges)

  return ranges.sort((a, b) => a.from - b.from)
}
