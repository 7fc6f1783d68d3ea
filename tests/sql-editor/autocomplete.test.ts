import { describe, it, expect } from 'vitest'
import { EditorState } from '@codemirror/state'
import { CompletionContext, type CompletionResult } from '@codemirror/autocomplete'
import {
  createCompletionSource,
  isInsideLiteralOrComment,
  toCompletion,
  sqlEditorExtensions,
  type CompletionVocabulary,
} from '../../src/components/sql-editor'

const vocabulary: CompletionVocabulary = {
  getTableNames: () => ['frontend', 'backend', 'billing'],
  getSchemaFields: () => [
    { name: 'level', dataType: 'Utf8' },
    { name: 'status', dataType: 'Int64' },
  ],
}

// | marks cursor position
function runSource(docWithCursor: string): CompletionResult | null {
  const pos = docWithCursor.indexOf('|')
  const doc = docWithCursor.replace('|', '')
  const state = EditorState.create({ doc })
  const source = createCompletionSource(vocabulary)
  return source(new CompletionContext(state, pos, false))
}

// ============================================================================
// TEST DATA
// ============================================================================

interface LiteralTestCase {
  name: string
  doc: string
  pos: number
  expected: boolean
}

const literalTests: LiteralTestCase[] = [
  { name: 'end of an unterminated string', doc: "SELECT 'ab", pos: 10, expected: true },
  { name: 'after a closed string', doc: "SELECT 'ab'", pos: 11, expected: false },
  { name: 'inside a closed string', doc: "SELECT 'abc' FROM t", pos: 9, expected: true },
  { name: 'end of a line comment', doc: '-- note', pos: 7, expected: true },
  { name: 'line after a line comment', doc: '-- note\n', pos: 8, expected: false },
  { name: 'after a closed block comment', doc: '/* a */', pos: 7, expected: false },
  { name: 'end of an unterminated block comment', doc: '/* a', pos: 4, expected: true },
  { name: 'end of an unterminated quoted identifier', doc: 'SELECT "Ho', pos: 10, expected: true },
  { name: 'after an identifier', doc: 'SELECT a', pos: 8, expected: false },
  { name: 'empty document', doc: '', pos: 0, expected: false },
]

// ============================================================================
// TEST RUNNER
// ============================================================================

describe('createCompletionSource', () => {
  it('offers tables after FROM', () => {
    const result = runSource('SELECT * FROM b|')
    expect(result).not.toBeNull()
    expect(result?.from).toBe(14)
    expect(result?.to).toBe(15)
    expect(result?.filter).toBe(false)
    expect(result?.options.map((o) => o.label)).toEqual(['"backend"', '"billing"'])
    expect(result?.options.map((o) => o.apply)).toEqual(['backend', 'billing'])
  })

  it('offers fields with their data type', () => {
    const result = runSource('SELECT st| FROM app')
    expect(result?.options).toEqual([
      { label: 'status', type: 'property', detail: 'Int64' },
      { label: 'STRING_AGG', type: 'function' },
    ])
  })

  it('returns null when nothing matches', () => {
    expect(runSource('SELECT * FROM zz|')).toBeNull()
  })

  it('returns null when the word is already complete', () => {
    expect(runSource('SELECT|')).toBeNull()
  })

  it('returns null inside a string literal', () => {
    expect(runSource("SELECT * FROM t WHERE level = 'b|")).toBeNull()
  })

  it('returns null inside a comment', () => {
    expect(runSource('-- b|')).toBeNull()
  })
})

describe('isInsideLiteralOrComment', () => {
  for (const tc of literalTests) {
    it(tc.name, () => {
      expect(isInsideLiteralOrComment(tc.doc, tc.pos)).toBe(tc.expected)
    })
  }
})

describe('toCompletion', () => {
  it('maps tables to variables inserted without quotes', () => {
    expect(toCompletion({ displayText: '"app"', kind: 'table', insertText: 'app' })).toEqual({
      label: '"app"',
      type: 'variable',
      apply: 'app',
    })
  })

  it('maps keywords without an apply override', () => {
    expect(toCompletion({ displayText: 'SELECT', kind: 'keyword', insertText: 'SELECT' })).toEqual({
      label: 'SELECT',
      type: 'keyword',
    })
  })
})

describe('sqlEditorExtensions', () => {
  it('can be installed in an editor state', () => {
    const state = EditorState.create({ doc: 'SELECT 1', extensions: sqlEditorExtensions(vocabulary) })
    expect(state.doc.toString()).toBe('SELECT 1')
  })

  it('takes editor settings from the caller', () => {
    const extensions = sqlEditorExtensions(vocabulary, { max_completions: 5, activate_on_typing: false })
    expect(extensions).toHaveLength(2)
    const state = EditorState.create({ doc: 'SELECT 1', extensions })
    expect(state.doc.length).toBe(8)
  })
})
