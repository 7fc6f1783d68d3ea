// Tokenizer functions and types
export { tokenize, isTrivia, isKeyword, tokenText, findTokenIndexAt } from './tokenizer'
export type { Token, TokenKind, TokenType, TextRange } from './tokenizer'

// Column list
export { selectColumnListRange, replaceSelectColumns } from './column-list'
export { quoteIdentifier, formatIdentifier } from './identifiers'

// Error positions
export {
  parsePosition,
  characterOffset,
  tokenRangeAtOffset,
  errorHighlightRange,
  errorRangeFromMessage,
} from './error-position'
export type { SQLErrorPosition } from './error-position'

// Highlighting
export { classify } from './highlight'
export type { HighlightRange, HighlightStyle } from './highlight'

// Vocabularies
export { SQL_KEYWORDS, SQL_FUNCTIONS, SORTED_KEYWORDS, SORTED_FUNCTIONS, TOKENIZER_KEYWORDS } from './vocabulary'

// Generators
export { generateStreamQuery, generateColumnsQuery } from './generate'
export type { StreamQueryOptions } from './generate'

// Autocomplete
export { completions, determineContext, findPrefix } from './autocomplete'
export type {
  CompletionContext,
  CompletionItem,
  CompletionKind,
  CompletionResult,
  SchemaField,
} from './autocomplete'
