/**
 * Metadata Module
 *
 * The asynchronous side of completion: resolving names against schema
 * metadata and fetching foreign keys. Requests are cancellable through an
 * AbortSignal, and a newer completion request supersedes the previous one.
 * Failures come back as values; nothing here throws at the caller.
 */

import type { QualifiedName, SchemaInfo, SchemaTable } from './types'
import { findTableInSchema } from './scope-analyzer'

export interface ForeignKeyConstraint {
  type: 'FOREIGN KEY'
  name: string
  columns: string[]
  referencedSchema: string
  referencedTable: string
  referencedColumns: string[]
}

export interface MetadataRequestContext {
  /** Connection the lookup is for; resolvers bound to one schema ignore it */
  connectionId?: string
  signal?: AbortSignal
}

export interface MetadataResolver {
  resolveTable(name: QualifiedName, context?: MetadataRequestContext): Promise<SchemaTable | null>
  getConstraints(table: SchemaTable, context?: MetadataRequestContext): Promise<ForeignKeyConstraint[]>
}

export type MetadataOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'error'; error: Error }
  | { status: 'cancelled' }

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Run one metadata lookup. The signal is checked before the call and again
 * when it settles, so a superseded request never yields a value.
 */
export async function runMetadataRequest<T>(
  signal: AbortSignal,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<MetadataOutcome<T>> {
  if (signal.aborted) return { status: 'cancelled' }
  try {
    const value = await fn(signal)
    if (signal.aborted) return { status: 'cancelled' }
    return { status: 'ok', value }
  } catch (error) {
    if (signal.aborted) return { status: 'cancelled' }
    return { status: 'error', error: toError(error) }
  }
}

/**
 * Resolver over an in-memory SchemaInfo. Name matching is case-insensitive
 * with the default schema preferred for unqualified names.
 */
export function createSchemaMetadataResolver(schema: SchemaInfo): MetadataResolver {
  return {
    async resolveTable(name) {
      if (name.database && schema.database && name.database.toLowerCase() !== schema.database.toLowerCase()) {
        return null
      }
      return findTableInSchema(name.name, name.schema, schema) ?? null
    },

    async getConstraints(table) {
      return (table.foreignKeys ?? []).map((fk): ForeignKeyConstraint => ({
        type: 'FOREIGN KEY',
        name: fk.name,
        columns: fk.columns,
        referencedSchema: fk.referencedSchema,
        referencedTable: fk.referencedTable,
        referencedColumns: fk.referencedColumns,
      }))
    },
  }
}

// ============================================================================
// Request tracking
// ============================================================================

export interface CompletionRequest {
  id: number
  signal: AbortSignal
}

/**
 * Latest-request-wins tracking: beginning a request aborts the one before
 * it, and only the latest request may deliver results.
 */
export class CompletionRequestTracker {
  private lastId = 0
  private controller: AbortController | null = null

  begin(): CompletionRequest {
    this.controller?.abort()
    this.controller = new AbortController()
    this.lastId++
    return { id: this.lastId, signal: this.controller.signal }
  }

  isCurrent(id: number): boolean {
    return id === this.lastId && this.controller !== null && !this.controller.signal.aborted
  }

  /** Abort the in-flight request, if any */
  cancel(): void {
    this.controller?.abort()
  }

  get currentId(): number {
    return this.lastId
  }
}
