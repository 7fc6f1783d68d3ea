import { setDiagnostics, type Diagnostic } from '@codemirror/lint'
import type { EditorState, TransactionSpec } from '@codemirror/state'
import type { EditorView } from '@codemirror/view'
import { errorRangeFromMessage, parsePosition } from '@/lib/sql'

/** Fallback span when the message carries no usable position: the first line. */
function firstLineRange(doc: string): [number, number] {
  const newline = doc.indexOf('\n')
  return [0, newline === -1 ? doc.length : newline]
}

/**
 * Turn an error message returned by the query server into editor diagnostics.
 * The underline covers the token the reported line/column points at.
 */
export function sqlErrorDiagnostics(doc: string, message: string): Diagnostic[] {
  const errorMessage = message.trim() || 'Query failed'
  const range = errorRangeFromMessage(errorMessage, doc)

  if (!range && parsePosition(errorMessage)) {
    console.warn('Query error position is outside the editor text:', errorMessage)
  }
  const [from, to] = range ? [range.from, range.to] : firstLineRange(doc)

  return [{ from, to, severity: 'error', message: errorMessage, source: 'query' }]
}

export function remoteErrorTransaction(state: EditorState, message: string): TransactionSpec {
  return setDiagnostics(state, sqlErrorDiagnostics(state.doc.toString(), message))
}

export function setRemoteError(view: EditorView, message: string): void {
  view.dispatch(remoteErrorTransaction(view.state, message))
}

export function clearRemoteError(view: EditorView): void {
  view.dispatch(setDiagnostics(view.state, []))
}
