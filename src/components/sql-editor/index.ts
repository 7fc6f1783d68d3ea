import type { Extension } from '@codemirror/state'
import type { EditorConfig } from '@/lib/config'
import { sqlHighlight } from './sql-highlight'
import { sqlAutocomplete, type CompletionVocabulary } from './sql-autocomplete'

export { sqlHighlight, buildHighlightDecorations } from './sql-highlight'
export {
  sqlAutocomplete,
  createCompletionSource,
  toCompletion,
  isInsideLiteralOrComment,
} from './sql-autocomplete'
export type { CompletionVocabulary } from './sql-autocomplete'
export { sqlErrorDiagnostics, remoteErrorTransaction, setRemoteError, clearRemoteError } from './sql-lint'

/** Everything the query editor needs on top of a basic CodeMirror setup. */
export function sqlEditorExtensions(vocabulary: CompletionVocabulary, config?: EditorConfig): Extension[] {
  return [sqlHighlight(), sqlAutocomplete(vocabulary, config)]
}
