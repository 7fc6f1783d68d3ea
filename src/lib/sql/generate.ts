/**
 * Query generators for stream actions in the sidebar.
 */

import { DEFAULT_CONFIG } from '../config'
import { quoteIdentifier, formatIdentifier } from './identifiers'
import { replaceSelectColumns } from './column-list'

export interface StreamQueryOptions {
  timestampColumn?: string
  limit?: number
}

/**
 * Generate the default query for a stream: newest records first. Options
 * left out take the `[query]` defaults.
 */
export function generateStreamQuery(stream: string, options?: StreamQueryOptions): string {
  const timestampColumn = options?.timestampColumn ?? DEFAULT_CONFIG.query.timestamp_column
  const limit = options?.limit ?? DEFAULT_CONFIG.query.default_limit
  return `SELECT * FROM ${quoteIdentifier(stream)} ORDER BY ${formatIdentifier(timestampColumn)} DESC LIMIT ${limit}`
}

/**
 * Generate the default stream query restricted to the given fields.
 */
export function generateColumnsQuery(
  stream: string,
  columns: readonly string[],
  options?: StreamQueryOptions
): string {
  const sql = generateStreamQuery(stream, options)
  return replaceSelectColumns(sql, columns) ?? sql
}
