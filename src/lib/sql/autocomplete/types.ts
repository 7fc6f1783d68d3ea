/**
 * Autocomplete Types
 *
 * Text before cursor → ContextDetector → CompletionProvider → CompletionResult
 */

import type { TextRange } from '../tokenizer'

// ============================================================================
// CONTEXT
// ============================================================================

export type CompletionContext =
  | 'general'
  | 'tableRef'   // After FROM, JOIN, INTO
  | 'columnRef'  // After SELECT, WHERE, AND, ... or a comma in a column list
  | 'afterOrder' // After ORDER, before BY
  | 'afterGroup' // After GROUP, before BY

// ============================================================================
// SCHEMA INPUT
// ============================================================================

export interface SchemaField {
  name: string
  /** Shown next to the field name, e.g. "Utf8" or "Timestamp(Millisecond, None)" */
  dataType: string
}

// ============================================================================
// OUTPUT
// ============================================================================

export type CompletionKind = 'keyword' | 'function' | 'table' | 'column'

export interface CompletionItem {
  displayText: string
  kind: CompletionKind
  detail?: string
  /** Text to insert; tables are displayed quoted but inserted bare */
  insertText: string
}

export interface CompletionResult {
  items: CompletionItem[]
  /** The word being completed */
  prefix: string
  /** Where the prefix sits in the text; replaced on accept */
  range: TextRange
}
