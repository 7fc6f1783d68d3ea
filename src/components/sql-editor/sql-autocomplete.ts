/**
 * SQL Autocomplete for CodeMirror
 *
 * BEHAVIORS:
 *
 * 1. FILTERING: The completion provider already filters by prefix, so
 *    CodeMirror's own fuzzy filter is turned off (`filter: false`).
 *
 * 2. TABLES: Stream names are listed quoted ("app_logs") but inserted bare.
 *
 * 3. LITERALS: No completions while the cursor is inside a string literal,
 *    quoted identifier or comment.
 *
 * Completion logic: src/lib/sql/autocomplete/
 */

import {
  autocompletion,
  type CompletionContext,
  type CompletionResult,
  type Completion,
} from '@codemirror/autocomplete'
import { completions, tokenize, findTokenIndexAt } from '@/lib/sql'
import type { CompletionItem, CompletionKind, SchemaField } from '@/lib/sql'
import { DEFAULT_CONFIG, type EditorConfig } from '@/lib/config'

/** Where the editor gets the current stream names and fields from. */
export interface CompletionVocabulary {
  getTableNames: () => readonly string[]
  getSchemaFields: () => readonly SchemaField[]
}

/** Maps completion kind to CodeMirror completion type (icon). */
const CODEMIRROR_TYPE_MAP: Record<CompletionKind, string> = {
  table: 'variable',
  column: 'property',
  function: 'function',
  keyword: 'keyword',
}

const LITERAL_TYPES = new Set(['stringLiteral', 'quotedIdentifier', 'lineComment', 'blockComment'])

/**
 * Check if the cursor sits inside a string, quoted identifier or comment.
 * Unterminated runs extend to the end of the document, so a cursor at the end
 * of one is still inside it.
 */
export function isInsideLiteralOrComment(doc: string, pos: number): boolean {
  if (pos <= 0) return false

  const tokens = tokenize(doc)
  const index = findTokenIndexAt(tokens, pos - 1)
  if (index === -1) return false

  const { kind, range } = tokens[index]
  if (!LITERAL_TYPES.has(kind.type)) return false
  if (pos < range.to) return true

  // Cursor right after the token: inside only if the token is still open,
  // i.e. it would swallow the next character typed
  const [probe] = tokenize(doc.slice(range.from, pos) + 'x')
  return probe.range.to > pos - range.from
}

export function toCompletion(item: CompletionItem): Completion {
  const completion: Completion = {
    label: item.displayText,
    type: CODEMIRROR_TYPE_MAP[item.kind],
    detail: item.detail,
  }
  if (item.insertText !== item.displayText) {
    completion.apply = item.insertText
  }
  return completion
}

export function createCompletionSource(vocabulary: CompletionVocabulary) {
  return (ctx: CompletionContext): CompletionResult | null => {
    const doc = ctx.state.doc.toString()
    if (isInsideLiteralOrComment(doc, ctx.pos)) return null

    const result = completions(doc, ctx.pos, vocabulary.getTableNames(), vocabulary.getSchemaFields())
    if (result.items.length === 0) return null

    return {
      from: result.range.from,
      to: result.range.to,
      options: result.items.map(toCompletion),
      filter: false,
    }
  }
}

export function sqlAutocomplete(vocabulary: CompletionVocabulary, config: EditorConfig = DEFAULT_CONFIG.editor) {
  return autocompletion({
    override: [createCompletionSource(vocabulary)],
    activateOnTyping: config.activate_on_typing,
    maxRenderedOptions: config.max_completions,
  })
}
