// tests/sql-column-list.test.ts

import { describe, it, expect } from 'vitest'
import { selectColumnListRange, replaceSelectColumns } from '../src/lib/sql/column-list'
import { quoteIdentifier, formatIdentifier } from '../src/lib/sql/identifiers'

// ============================================================================
// TEST HELPERS
// ============================================================================

function columnListText(sql: string): string | null {
  const range = selectColumnListRange(sql)
  return range ? sql.slice(range.from, range.to) : null
}

// ============================================================================
// TEST DATA
// ============================================================================

interface ColumnListTestCase {
  name: string
  sql: string
  expected: string | null
}

const columnListTests: ColumnListTestCase[] = [
  { name: 'star', sql: 'SELECT * FROM t', expected: '*' },
  { name: 'two columns', sql: 'SELECT a, b FROM t', expected: 'a, b' },
  {
    name: 'subquery in the column list',
    sql: 'SELECT (SELECT count(*) FROM x), col FROM main',
    expected: '(SELECT count(*) FROM x), col',
  },
  { name: 'FROM inside a string literal', sql: "SELECT 'from' AS label FROM t", expected: "'from' AS label" },
  { name: 'FROM inside a quoted identifier', sql: 'SELECT "from", b FROM t', expected: '"from", b' },
  {
    name: 'FROM inside comments',
    sql: 'SELECT a /* FROM */, b -- from\nFROM t',
    expected: 'a /* FROM */, b',
  },
  { name: 'DISTINCT is not part of the list', sql: 'SELECT DISTINCT level FROM t', expected: 'level' },
  { name: 'lowercase keywords', sql: 'select a from t', expected: 'a' },
  { name: 'leading trivia', sql: '  -- latest\n SELECT a FROM t', expected: 'a' },
  { name: 'multi-line list', sql: 'SELECT\n  a,\n  b\nFROM t', expected: 'a,\n  b' },
  { name: 'stray closing paren floors depth at zero', sql: 'SELECT a) , b FROM t', expected: 'a) , b' },
  { name: 'no FROM', sql: 'SELECT a, b, c', expected: null },
  { name: 'FROM only inside an unclosed paren', sql: 'SELECT a, (b FROM t', expected: null },
  { name: 'empty list', sql: 'SELECT FROM t', expected: null },
  { name: 'SELECT alone', sql: 'SELECT', expected: null },
  { name: 'not a SELECT', sql: 'DELETE FROM t', expected: null },
  { name: 'empty input', sql: '', expected: null },
]

const ROUND_TRIP_QUERIES = [
  'SELECT * FROM t',
  'SELECT DISTINCT a, b FROM t WHERE c = 1',
  "SELECT 'from' AS label FROM t",
  'SELECT /* note */ a -- trailing\nFROM t',
]

// ============================================================================
// TEST RUNNER
// ============================================================================

describe('selectColumnListRange', () => {
  for (const tc of columnListTests) {
    it(tc.name, () => {
      expect(columnListText(tc.sql)).toBe(tc.expected)
    })
  }

  it('returns offsets into the original text', () => {
    expect(selectColumnListRange('SELECT a, b FROM t')).toEqual({ from: 7, to: 11 })
  })

  describe('replacing the range and locating it again yields the replacement', () => {
    for (const sql of ROUND_TRIP_QUERIES) {
      it(sql, () => {
        const range = selectColumnListRange(sql)
        expect(range).not.toBeNull()
        if (!range) return

        const replaced = sql.slice(0, range.from) + 'x, y' + sql.slice(range.to)
        expect(columnListText(replaced)).toBe('x, y')
      })
    }
  })
})

describe('replaceSelectColumns', () => {
  it('replaces the list with formatted field names', () => {
    expect(
      replaceSelectColumns(`SELECT * FROM "app" WHERE level = 'error'`, ['level', 'Message', 'p_timestamp'])
    ).toBe(`SELECT level, "Message", p_timestamp FROM "app" WHERE level = 'error'`)
  })

  it('keeps comments around the list', () => {
    expect(replaceSelectColumns('SELECT /* keep */ a, b FROM t -- tail', ['c'])).toBe(
      'SELECT /* keep */ c FROM t -- tail'
    )
  })

  it('replaces the list with a star', () => {
    expect(replaceSelectColumns('SELECT a, b FROM t', '*')).toBe('SELECT * FROM t')
  })

  it('uses a star for an empty field list', () => {
    expect(replaceSelectColumns('SELECT a FROM t', [])).toBe('SELECT * FROM t')
  })

  it('quotes keywords used as field names', () => {
    expect(replaceSelectColumns('SELECT * FROM t', ['from', 'host'])).toBe('SELECT "from", host FROM t')
  })

  it('returns null without a column list', () => {
    expect(replaceSelectColumns('DELETE FROM t', ['a'])).toBeNull()
  })
})

describe('identifiers', () => {
  interface IdentifierTestCase {
    name: string
    input: string
    quoted: string
    formatted: string
  }

  const identifierTests: IdentifierTestCase[] = [
    { name: 'plain lowercase', input: 'p_timestamp', quoted: '"p_timestamp"', formatted: 'p_timestamp' },
    { name: 'mixed case', input: 'Message', quoted: '"Message"', formatted: '"Message"' },
    { name: 'keyword', input: 'from', quoted: '"from"', formatted: '"from"' },
    { name: 'embedded quote', input: 'a"b', quoted: '"a""b"', formatted: '"a""b"' },
    { name: 'hyphen', input: 'user-agent', quoted: '"user-agent"', formatted: '"user-agent"' },
    { name: 'leading digit', input: '1st', quoted: '"1st"', formatted: '"1st"' },
  ]

  for (const tc of identifierTests) {
    it(tc.name, () => {
      expect(quoteIdentifier(tc.input)).toBe(tc.quoted)
      expect(formatIdentifier(tc.input)).toBe(tc.formatted)
    })
  }
})
