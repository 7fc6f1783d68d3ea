import { isTokenizerKeyword } from './vocabulary'

const BARE_IDENTIFIER = /^[a-z_][a-z0-9_]*$/

/** Always double-quote, doubling any embedded quote. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

/**
 * Quote only when needed: the remote engine folds unquoted names to lowercase,
 * so anything other than a plain lowercase name (or a keyword) gets quotes.
 */
export function formatIdentifier(name: string): string {
  if (BARE_IDENTIFIER.test(name) && !isTokenizerKeyword(name)) {
    return name
  }
  return quoteIdentifier(name)
}
