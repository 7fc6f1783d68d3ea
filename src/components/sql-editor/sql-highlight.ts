import { ViewPlugin, Decoration, type DecorationSet, type ViewUpdate, EditorView } from '@codemirror/view'
import { RangeSetBuilder } from '@codemirror/state'
import { classify } from '@/lib/sql'

// Cache decorations by class name
const decorationCache = new Map<string, Decoration>()
function getDecoration(className: string): Decoration {
  let decoration = decorationCache.get(className)
  if (!decoration) {
    decoration = Decoration.mark({ class: className })
    decorationCache.set(className, decoration)
  }
  return decoration
}

export function buildHighlightDecorations(doc: string): DecorationSet {
  const ranges = classify(doc)
  if (ranges.length === 0) {
    return Decoration.none
  }

  const builder = new RangeSetBuilder<Decoration>()
  for (const range of ranges) {
    if (range.from < range.to) {
      builder.add(range.from, range.to, getDecoration(`sql-${range.style}`))
    }
  }
  return builder.finish()
}

// ViewPlugin that manages syntax highlighting
const sqlHighlightPlugin = ViewPlugin.fromClass(
  class {
    decorations: DecorationSet

    constructor(view: EditorView) {
      this.decorations = buildHighlightDecorations(view.state.doc.toString())
    }

    update(update: ViewUpdate) {
      if (update.docChanged) {
        this.decorations = buildHighlightDecorations(update.state.doc.toString())
      }
    }
  },
  {
    decorations: (v) => v.decorations,
  }
)

// Colors are defined in global CSS (.sql-keyword, .sql-string, ...)
export function sqlHighlight() {
  return sqlHighlightPlugin
}
