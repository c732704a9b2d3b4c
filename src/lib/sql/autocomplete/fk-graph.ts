/**
 * FK Graph Module
 *
 * Breadth-first search over foreign keys, starting from the tables already in
 * the query, to suggest JOIN targets up to a hop limit. Tables in the query
 * are never suggested and no table is reached twice.
 */

import type { Candidate, SchemaTable } from './types'
import {
  runMetadataRequest,
  type ForeignKeyConstraint,
  type MetadataRequestContext,
  type MetadataResolver,
} from './metadata'

export interface FKPathEntry {
  key: string
  table: SchemaTable
  /** Constraint followed out of this table */
  constraint: ForeignKeyConstraint
}

export interface FKChainResult {
  table: SchemaTable
  hopCount: number
  /** Tables traversed before reaching `table`, source first */
  path: FKPathEntry[]
  /** Immediate predecessor, for results more than one hop away */
  viaTable?: string
  constraint: ForeignKeyConstraint
  sourceTable: SchemaTable
}

export interface MetadataFailure {
  operation: 'resolveTable' | 'getConstraints'
  table: string
  error: Error
}

export interface JoinCandidateOptions {
  maxDepth?: number
  signal?: AbortSignal
  connectionId?: string
}

export interface JoinCandidateResult {
  byHop: Map<number, FKChainResult[]>
  /** Lookups that failed; the walk treats them as tables without foreign keys */
  errors: MetadataFailure[]
  cancelled: boolean
}

export const DEFAULT_MAX_FK_DEPTH = 2

interface QueueEntry {
  table: SchemaTable
  depth: number
  path: FKPathEntry[]
}

export function tableKey(table: { schema?: string; name: string }): string {
  const name = table.name.toLowerCase()
  return table.schema ? `${table.schema.toLowerCase()}.${name}` : name
}

/**
 * Find JOIN targets reachable from `sources` through foreign keys.
 */
export async function findJoinCandidates(
  sources: SchemaTable[],
  resolver: MetadataResolver,
  options: JoinCandidateOptions = {}
): Promise<JoinCandidateResult> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_FK_DEPTH
  const signal = options.signal ?? new AbortController().signal
  const context: MetadataRequestContext = { signal }
  if (options.connectionId) context.connectionId = options.connectionId

  const byHop = new Map<number, FKChainResult[]>()
  for (let hop = 1; hop <= maxDepth; hop++) byHop.set(hop, [])
  const errors: MetadataFailure[] = []

  // Source tables are visited up front so they are never suggested
  const visited = new Set<string>()
  const queue: QueueEntry[] = []
  for (const table of sources) {
    visited.add(tableKey(table))
    queue.push({ table, depth: 0, path: [] })
  }

  while (queue.length > 0) {
    const current = queue.shift()
    if (!current || current.depth >= maxDepth) continue

    const constraints = await runMetadataRequest(signal, () => resolver.getConstraints(current.table, context))
    if (constraints.status === 'cancelled') return { byHop, errors, cancelled: true }
    if (constraints.status === 'error') {
      errors.push({ operation: 'getConstraints', table: tableKey(current.table), error: constraints.error })
      continue
    }

    for (const constraint of constraints.value) {
      const targetName = { name: constraint.referencedTable, schema: constraint.referencedSchema }
      const resolved = await runMetadataRequest(signal, () => resolver.resolveTable(targetName, context))
      if (resolved.status === 'cancelled') return { byHop, errors, cancelled: true }
      if (resolved.status === 'error') {
        errors.push({ operation: 'resolveTable', table: tableKey(targetName), error: resolved.error })
        continue
      }

      const target = resolved.value
      if (!target) continue
      const targetKey = tableKey(target)
      if (visited.has(targetKey) || current.path.some((entry) => entry.key === targetKey)) continue
      visited.add(targetKey)

      const path = [...current.path, { key: tableKey(current.table), table: current.table, constraint }]
      const hopCount = current.depth + 1
      const result: FKChainResult = {
        table: target,
        hopCount,
        path,
        constraint,
        sourceTable: current.table,
      }
      if (current.depth > 0) result.viaTable = current.table.name

      byHop.get(hopCount)?.push(result)
      queue.push({ table: target, depth: hopCount, path })
    }
  }

  return { byHop, errors, cancelled: false }
}

/**
 * All results as one list, nearest first, then by table name.
 */
export function flattenJoinCandidates(byHop: Map<number, FKChainResult[]>): FKChainResult[] {
  const flat: FKChainResult[] = []
  for (const results of byHop.values()) flat.push(...results)
  return flat.sort((a, b) => {
    if (a.hopCount !== b.hopCount) return a.hopCount - b.hopCount
    return a.table.name.localeCompare(b.table.name)
  })
}

export interface FormattedJoinCandidate {
  label: string
  detail: string
  /** Markdown */
  documentation: string
}

export function formatJoinCandidate(result: FKChainResult): FormattedJoinCandidate {
  const name = result.table.name
  const via = result.viaTable ?? result.path[result.path.length - 1]?.table.name

  const label = result.hopCount === 1 || !via ? name : `${name} (via ${via})`
  const detail = result.hopCount === 1
    ? 'JOIN suggestion (FK)'
    : `JOIN suggestion (FK chain: ${result.hopCount} hops)`

  const lines = [`**${name}**`, '']
  if (result.hopCount === 1) {
    lines.push('Direct foreign key relationship')
    const { columns, referencedColumns } = result.constraint
    if (columns.length > 0 && referencedColumns.length > 0) {
      lines.push('', `FK: ${columns.join(', ')} → ${referencedColumns.join(', ')}`)
    }
  } else {
    lines.push(`FK chain (${result.hopCount} hops)`, '')
    const names = [...result.path.map((entry) => entry.table.name), name]
    lines.push(`Path: ${names.join(' → ')}`)
  }

  return { label, detail, documentation: lines.join('\n') }
}

/**
 * A JOIN suggestion as a completion candidate. The inserted name carries its
 * schema unless that is the default one.
 */
export function toJoinCandidate(result: FKChainResult, defaultSchema: string): Candidate {
  const { label, detail } = formatJoinCandidate(result)
  const { schema, name } = result.table
  const value = schema.toLowerCase() === defaultSchema.toLowerCase() ? name : `${schema}.${name}`
  return { type: 'join', value, displayText: label, detail, source: 'foreign_key' }
}
