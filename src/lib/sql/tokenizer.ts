/**
 * SQL Tokenizer
 *
 * Single-pass, lossless tokenizer used by every structural tool of the editor.
 * Each character of the input belongs to exactly one token, so concatenating
 * the token slices in order reproduces the source text. Unterminated strings,
 * quoted identifiers and block comments run to the end of input.
 */

import { TOKENIZER_KEYWORDS } from './vocabulary'

/** Half-open span of UTF-16 offsets, the same units CodeMirror positions use. */
export interface TextRange {
  from: number
  to: number
}

export type TokenKind =
  | { type: 'keyword'; value: string }
  | { type: 'identifier'; value: string }
  | { type: 'quotedIdentifier'; value: string }
  | { type: 'stringLiteral'; value: string }
  | { type: 'number'; value: string }
  | { type: 'comma' }
  | { type: 'star' }
  | { type: 'leftParen' }
  | { type: 'rightParen' }
  | { type: 'whitespace' }
  | { type: 'lineComment' }
  | { type: 'blockComment' }
  | { type: 'other'; value: string }

export type TokenType = TokenKind['type']

export interface Token {
  kind: TokenKind
  range: TextRange
}

const LETTER = /\p{L}/u
const DIGIT = /\p{Nd}/u
// Letters may be followed by combining marks (decomposed accents)
const WORD_PART = /[\p{L}\p{M}\p{Nd}_]/u

const PUNCTUATION: Record<string, TokenKind> = {
  '(': { type: 'leftParen' },
  ')': { type: 'rightParen' },
  ',': { type: 'comma' },
  '*': { type: 'star' },
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r'
}

/** The full code point starting at `i`, or '' past the end. */
function codePointAt(sql: string, i: number): string {
  const code = sql.codePointAt(i)
  return code === undefined ? '' : String.fromCodePoint(code)
}

function isDigitAt(sql: string, i: number): boolean {
  return DIGIT.test(codePointAt(sql, i))
}

/**
 * Scans a quoted run starting at the opening quote. A doubled quote is an
 * escaped literal quote.
 */
function scanQuoted(sql: string, start: number, quote: string): { end: number; value: string } {
  let i = start + 1
  let value = ''
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        value += quote
        i += 2
        continue
      }
      return { end: i + 1, value }
    }
    value += sql[i]
    i++
  }
  return { end: i, value }
}

function scanNumber(sql: string, start: number): number {
  let i = start
  while (i < sql.length && (sql[i] === '.' || isDigitAt(sql, i))) {
    i += codePointAt(sql, i).length
  }

  // The exponent marker and sign belong to the number even without digits: `1e+` is one token
  if (sql[i] === 'e' || sql[i] === 'E') {
    i++
    if (sql[i] === '+' || sql[i] === '-') i++
    while (i < sql.length && isDigitAt(sql, i)) {
      i += codePointAt(sql, i).length
    }
  }
  return i
}

function scanWord(sql: string, start: number): number {
  let i = start
  while (i < sql.length) {
    const ch = codePointAt(sql, i)
    if (!WORD_PART.test(ch)) break
    i += ch.length
  }
  return i
}

/**
 * Tokenize SQL text. Total: any string produces a token list whose ranges are
 * contiguous and cover the whole input.
 */
export function tokenize(sql: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < sql.length) {
    const start = i
    const ch = codePointAt(sql, i)
    let kind: TokenKind

    if (isWhitespace(ch)) {
      while (i < sql.length && isWhitespace(sql[i])) i++
      kind = { type: 'whitespace' }
    } else if (ch === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i)
      i = newline === -1 ? sql.length : newline
      kind = { type: 'lineComment' }
    } else if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2)
      i = close === -1 ? sql.length : close + 2
      kind = { type: 'blockComment' }
    } else if (ch === "'" || ch === '"') {
      const { end, value } = scanQuoted(sql, i, ch)
      i = end
      kind = ch === "'" ? { type: 'stringLiteral', value } : { type: 'quotedIdentifier', value }
    } else if (ch in PUNCTUATION) {
      i++
      kind = PUNCTUATION[ch]
    } else if (DIGIT.test(ch) || (ch === '.' && isDigitAt(sql, i + 1))) {
      i = scanNumber(sql, i)
      kind = { type: 'number', value: sql.slice(start, i) }
    } else if (LETTER.test(ch) || ch === '_') {
      i = scanWord(sql, i)
      const word = sql.slice(start, i)
      const upper = word.toUpperCase()
      kind = TOKENIZER_KEYWORDS.has(upper)
        ? { type: 'keyword', value: upper }
        : { type: 'identifier', value: word }
    } else {
      i += ch.length
      kind = { type: 'other', value: ch }
    }

    tokens.push({ kind, range: { from: start, to: i } })
  }

  return tokens
}

/** Whitespace and comments: no structural meaning, but they occupy source text. */
export function isTrivia(kind: TokenKind): boolean {
  return kind.type === 'whitespace' || kind.type === 'lineComment' || kind.type === 'blockComment'
}

export function isKeyword(kind: TokenKind, keyword: string): boolean {
  return kind.type === 'keyword' && kind.value === keyword
}

/** The source slice a token covers. */
export function tokenText(sql: string, token: Token): string {
  return sql.slice(token.range.from, token.range.to)
}

/**
 * Index of the token containing `offset`, or -1 when the offset is at or past
 * the end of the text.
 */
export function findTokenIndexAt(tokens: Token[], offset: number): number {
  // Binary search: ranges are sorted and contiguous
  let lo = 0
  let hi = tokens.length - 1
  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    const { from, to } = tokens[mid].range
    if (offset < from) {
      hi = mid - 1
    } else if (offset >= to) {
      lo = mid + 1
    } else {
      return mid
    }
  }
  return -1
}
