import vocabulary from './sql-vocabulary.json'

/**
 * Structural keywords recognized by the tokenizer. Matching is case-insensitive;
 * entries are stored uppercase.
 */
export const TOKENIZER_KEYWORDS: ReadonlySet<string> = new Set(vocabulary.tokenizerKeywords)

/** Keywords offered by completion and styled by the highlighter. */
export const SQL_KEYWORDS: ReadonlySet<string> = new Set(vocabulary.keywords)

/** Built-in functions of the remote query engine. */
export const SQL_FUNCTIONS: ReadonlySet<string> = new Set(vocabulary.functions)

// Pre-sorted for completion ordering and regex construction
export const SORTED_KEYWORDS: readonly string[] = [...SQL_KEYWORDS].sort()
export const SORTED_FUNCTIONS: readonly string[] = [...SQL_FUNCTIONS].sort()

export function isTokenizerKeyword(word: string): boolean {
  return TOKENIZER_KEYWORDS.has(word.toUpperCase())
}
