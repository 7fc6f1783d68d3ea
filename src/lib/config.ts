/**
 * Configuration shape, defaults and TOML parsing. Loading from disk is in
 * server/lib/config.ts.
 */

import { parse } from 'smol-toml'

export interface QueryConfig {
  /** Column the default stream query orders by */
  timestamp_column: string
  default_limit: number
}

export interface EditorConfig {
  /** Upper bound on rendered completion options */
  max_completions: number
  activate_on_typing: boolean
}

export interface Config {
  query: QueryConfig
  editor: EditorConfig
}

const KNOWN_SECTIONS = new Set(['query', 'editor'])

export const DEFAULT_CONFIG: Config = {
  query: { timestamp_column: 'p_timestamp', default_limit: 1000 },
  editor: { max_completions: 50, activate_on_typing: true },
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function readSection(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = parsed[name]
  if (section === undefined) return {}
  if (!isRecord(section)) {
    throw new Error(`[${name}] must be a table`)
  }
  return section
}

function readPositiveInteger(section: Record<string, unknown>, key: string, path: string, fallback: number): number {
  const value = section[key]
  if (value === undefined) return fallback
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`${path}.${key} must be a positive integer`)
  }
  return value
}

/**
 * Parse TOML configuration content. Missing keys take their defaults;
 * invalid values throw with the offending key in the message.
 */
export function parseConfig(content: string): Config {
  const parsed: Record<string, unknown> = parse(content)

  for (const key of Object.keys(parsed)) {
    if (!KNOWN_SECTIONS.has(key)) {
      console.warn(`Ignoring unknown config section: [${key}]`)
    }
  }

  // Parse [query] section
  const q = readSection(parsed, 'query')
  let timestampColumn = DEFAULT_CONFIG.query.timestamp_column
  if (q.timestamp_column !== undefined) {
    if (typeof q.timestamp_column !== 'string' || !q.timestamp_column.trim()) {
      throw new Error('query.timestamp_column must be a non-empty string')
    }
    timestampColumn = q.timestamp_column.trim()
  }
  const query: QueryConfig = {
    timestamp_column: timestampColumn,
    default_limit: readPositiveInteger(q, 'default_limit', 'query', DEFAULT_CONFIG.query.default_limit),
  }

  // Parse [editor] section
  const e = readSection(parsed, 'editor')
  let activateOnTyping = DEFAULT_CONFIG.editor.activate_on_typing
  if (e.activate_on_typing !== undefined) {
    if (typeof e.activate_on_typing !== 'boolean') {
      throw new Error('editor.activate_on_typing must be a boolean')
    }
    activateOnTyping = e.activate_on_typing
  }
  const editor: EditorConfig = {
    max_completions: readPositiveInteger(e, 'max_completions', 'editor', DEFAULT_CONFIG.editor.max_completions),
    activate_on_typing: activateOnTyping,
  }

  return { query, editor }
}
