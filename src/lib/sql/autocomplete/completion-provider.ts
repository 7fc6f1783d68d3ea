/**
 * Completion Provider
 *
 * Combines the detected context with case-insensitive prefix matching over the
 * keyword, function, table and field vocabularies. Every source is sorted
 * alphabetically before filtering so results are deterministic.
 */

import type { CompletionContext, CompletionItem, CompletionResult, SchemaField } from './types'
import { determineContext } from './context-detector'
import { SORTED_KEYWORDS, SORTED_FUNCTIONS } from '../vocabulary'
import type { TextRange } from '../tokenizer'

const WORD_CHAR = /[A-Za-z0-9_]/

/**
 * Find the word being typed: the run of `[A-Za-z0-9_]` ending at the cursor.
 */
export function findPrefix(text: string, cursorPosition: number): { prefix: string; range: TextRange } {
  let wordStart = cursorPosition
  while (wordStart > 0 && WORD_CHAR.test(text[wordStart - 1])) {
    wordStart--
  }
  return {
    prefix: text.slice(wordStart, cursorPosition),
    range: { from: wordStart, to: cursorPosition },
  }
}

function matches(name: string, upperPrefix: string): boolean {
  return name.toUpperCase().startsWith(upperPrefix)
}

function keywordItems(upperPrefix: string): CompletionItem[] {
  return SORTED_KEYWORDS
    .filter((kw) => matches(kw, upperPrefix))
    .map((kw): CompletionItem => ({ displayText: kw, kind: 'keyword', insertText: kw }))
}

function functionItems(upperPrefix: string): CompletionItem[] {
  return SORTED_FUNCTIONS
    .filter((fn) => matches(fn, upperPrefix))
    .map((fn): CompletionItem => ({ displayText: fn, kind: 'function', insertText: fn }))
}

function tableItems(tableNames: readonly string[], upperPrefix: string): CompletionItem[] {
  return [...tableNames]
    .sort()
    .filter((name) => matches(name, upperPrefix))
    .map((name): CompletionItem => ({ displayText: `"${name}"`, kind: 'table', insertText: name }))
}

function columnItems(fields: readonly SchemaField[], upperPrefix: string): CompletionItem[] {
  return [...fields]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .filter((field) => matches(field.name, upperPrefix))
    .map((field): CompletionItem => ({
      displayText: field.name,
      kind: 'column',
      detail: field.dataType,
      insertText: field.name,
    }))
}

function candidatesFor(
  context: CompletionContext,
  upperPrefix: string,
  tableNames: readonly string[],
  schemaFields: readonly SchemaField[]
): CompletionItem[] {
  switch (context) {
    case 'tableRef':
      return tableItems(tableNames, upperPrefix)
    case 'columnRef':
      return [
        ...columnItems(schemaFields, upperPrefix),
        ...functionItems(upperPrefix),
        ...keywordItems(upperPrefix),
      ]
    case 'afterOrder':
    case 'afterGroup':
      return matches('BY', upperPrefix)
        ? [{ displayText: 'BY', kind: 'keyword', insertText: 'BY' }]
        : []
    case 'general':
      return [
        ...keywordItems(upperPrefix),
        ...functionItems(upperPrefix),
        ...tableItems(tableNames, upperPrefix),
        ...columnItems(schemaFields, upperPrefix),
      ]
  }
}

/**
 * Completion items for the word ending at `cursorPosition`.
 */
export function completions(
  text: string,
  cursorPosition: number,
  tableNames: readonly string[],
  schemaFields: readonly SchemaField[]
): CompletionResult {
  if (cursorPosition <= 0 || cursorPosition > text.length) {
    return { items: [], prefix: '', range: { from: 0, to: 0 } }
  }

  const { prefix, range } = findPrefix(text, cursorPosition)
  if (!prefix) {
    return { items: [], prefix: '', range }
  }

  const context = determineContext(text.slice(0, range.from))
  const upperPrefix = prefix.toUpperCase()

  const items = candidatesFor(context, upperPrefix, tableNames, schemaFields)

  // The only match is what the user already typed: nothing to offer
  if (items.length === 1 && items[0].displayText.toUpperCase() === upperPrefix) {
    return { items: [], prefix, range }
  }

  return { items, prefix, range }
}
