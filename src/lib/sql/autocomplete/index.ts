/**
 * SQL Autocomplete
 *
 * Context-sensitive completion for the query editor.
 *
 * @example
 * ```ts
 * import { completions } from './autocomplete'
 *
 * const result = completions('SELECT * FROM app', 17, ['application_logs'], [])
 *
 * console.log(result.items)  // [{ displayText: '"application_logs"', kind: 'table', insertText: 'application_logs' }]
 * console.log(result.prefix) // 'app'
 * ```
 */

export { completions, findPrefix } from './completion-provider'
export { determineContext } from './context-detector'

export type {
  CompletionContext,
  CompletionItem,
  CompletionKind,
  CompletionResult,
  SchemaField,
} from './types'
