import type { SchemaColumn, SchemaForeignKey, SchemaInfo, SchemaTable } from '../../src/lib/sql/autocomplete/types'
import { withConnection, type ConnectionDetails } from './db'
import { logSchemaLoaded } from './logger'

export interface CachedSchemaInfo {
  schema: SchemaInfo
  lastUpdated: number // Timestamp
}

// Cache: connectionId -> schema info
const schemaCache = new Map<string, CachedSchemaInfo>()

// Rows as returned by the catalog queries
export interface ColumnRow {
  schema_name: string
  table_name: string
  object_type: string
  column_name: string
  data_type: string
  is_nullable: boolean
}

export interface KeyRow {
  schema_name: string
  table_name: string
  constraint_name: string
  constraint_type: string
  columns: string[]
  foreign_schema: string | null
  foreign_table: string | null
  foreign_columns: string[]
}

export interface ProcedureRow {
  schema_name: string
  proc_name: string
  arguments: string
}

export function getSchemaCache(connectionId: string): CachedSchemaInfo | null {
  return schemaCache.get(connectionId) || null
}

export async function refreshSchemaCache(
  connectionId: string,
  connectionDetails: ConnectionDetails,
  defaultSchema = 'public'
): Promise<CachedSchemaInfo> {
  const start = Date.now()
  const schema = await loadSchemaInfo(connectionId, connectionDetails, defaultSchema)
  const cached: CachedSchemaInfo = {
    schema,
    lastUpdated: Date.now(),
  }
  schemaCache.set(connectionId, cached)
  logSchemaLoaded(connectionId, schema.tables.length, schema.procedures.length, cached.lastUpdated - start)
  return cached
}

/**
 * Cached schema for a connection, loading it on first use.
 */
export async function getSchema(
  connectionId: string,
  connectionDetails: ConnectionDetails,
  defaultSchema = 'public'
): Promise<SchemaInfo> {
  const cached = getSchemaCache(connectionId)
  if (cached) return cached.schema
  return (await refreshSchemaCache(connectionId, connectionDetails, defaultSchema)).schema
}

export function clearSchemaCache(connectionId?: string): void {
  if (connectionId) {
    schemaCache.delete(connectionId)
  } else {
    schemaCache.clear()
  }
}

/**
 * Build the analyzer's schema snapshot from catalog rows.
 * Column rows arrive ordered by table, then ordinal position.
 */
export function assembleSchemaInfo(
  database: string,
  defaultSchema: string,
  columns: ColumnRow[],
  keys: KeyRow[],
  procedures: ProcedureRow[]
): SchemaInfo {
  const tableMap = new Map<string, SchemaTable>()
  const primaryKeys = new Map<string, Set<string>>()
  const foreignKeyColumns = new Map<string, Set<string>>()
  const foreignKeys = new Map<string, SchemaForeignKey[]>()

  for (const key of keys) {
    const tableId = `${key.schema_name}.${key.table_name}`
    if (key.constraint_type === 'p') {
      const set = primaryKeys.get(tableId) ?? new Set<string>()
      for (const col of key.columns) set.add(col)
      primaryKeys.set(tableId, set)
    } else if (key.constraint_type === 'f' && key.foreign_table) {
      const set = foreignKeyColumns.get(tableId) ?? new Set<string>()
      for (const col of key.columns) set.add(col)
      foreignKeyColumns.set(tableId, set)

      const list = foreignKeys.get(tableId) ?? []
      list.push({
        name: key.constraint_name,
        columns: key.columns,
        referencedSchema: key.foreign_schema ?? key.schema_name,
        referencedTable: key.foreign_table,
        referencedColumns: key.foreign_columns,
      })
      foreignKeys.set(tableId, list)
    }
  }

  for (const row of columns) {
    const tableId = `${row.schema_name}.${row.table_name}`
    let table = tableMap.get(tableId)
    if (!table) {
      table = {
        schema: row.schema_name,
        name: row.table_name,
        type: row.object_type === 'VIEW' ? 'view' : 'table',
        columns: [],
      }
      const fks = foreignKeys.get(tableId)
      if (fks) table.foreignKeys = fks
      tableMap.set(tableId, table)
    }

    const column: SchemaColumn = {
      name: row.column_name,
      type: row.data_type,
      nullable: row.is_nullable,
      isPrimaryKey: primaryKeys.get(tableId)?.has(row.column_name) ?? false,
      isForeignKey: foreignKeyColumns.get(tableId)?.has(row.column_name) ?? false,
    }
    table.columns.push(column)
  }

  return {
    database,
    defaultSchema,
    tables: [...tableMap.values()],
    procedures: procedures.map((p) => ({
      schema: p.schema_name,
      name: p.proc_name,
      signature: `${p.proc_name}(${p.arguments})`,
    })),
  }
}

async function loadSchemaInfo(
  connectionId: string,
  details: ConnectionDetails,
  defaultSchema: string
): Promise<SchemaInfo> {
  return withConnection(details, async (client) => {
    // Tables and views with their columns
    const columns = await client<ColumnRow[]>`
      SELECT
        n.nspname as schema_name,
        c.relname as table_name,
        CASE c.relkind WHEN 'v' THEN 'VIEW' WHEN 'm' THEN 'VIEW' ELSE 'TABLE' END as object_type,
        a.attname as column_name,
        format_type(a.atttypid, a.atttypmod) as data_type,
        NOT a.attnotnull as is_nullable
      FROM pg_class c
      JOIN pg_namespace n ON n.oid = c.relnamespace
      JOIN pg_attribute a ON a.attrelid = c.oid
      WHERE c.relkind IN ('r', 'p', 'v', 'm')
        AND n.nspname NOT IN ('pg_catalog', 'information_schema', 'pg_toast')
        AND a.attnum > 0
        AND NOT a.attisdropped
      ORDER BY n.nspname, c.relname, a.attnum
    `

    // Primary and foreign keys
    const keys = await client<KeyRow[]>`
      SELECT
        n.nspname as schema_name,
        c.relname as table_name,
        con.conname as constraint_name,
        con.contype as constraint_type,
        array_agg(a.attname ORDER BY array_position(con.conkey, a.attnum)) as columns,
        fn.nspname as foreign_schema,
        fc.relname as foreign_table,
        CASE con.contype
          WHEN 'f' THEN array_agg(af.attname ORDER BY array_position(con.confkey, af.attnum))
          ELSE ARRAY[]::text[]
        END as foreign_columns
      FROM pg_constraint con
      JOIN pg_class c ON c.oid = con.conrelid
      JOIN pg_namespace n ON n.oid = c.relnamespace
      LEFT JOIN pg_class fc ON fc.oid = con.confrelid
      LEFT JOIN pg_namespace fn ON fn.oid = fc.relnamespace
      LEFT JOIN pg_attribute a ON a.attrelid = c.oid AND a.attnum = ANY(con.conkey)
      LEFT JOIN pg_attribute af ON af.attrelid = con.confrelid AND af.attnum = ANY(con.confkey)
      WHERE n.nspname NOT IN ('pg_catalog', 'information_schema', 'pg_toast')
        AND con.contype IN ('p', 'f')
      GROUP BY n.nspname, c.relname, con.conname, con.contype, fn.nspname, fc.relname
      ORDER BY n.nspname, c.relname, con.conname
    `

    // Procedures
    const procedures = await client<ProcedureRow[]>`
      SELECT
        n.nspname as schema_name,
        p.proname as proc_name,
        pg_get_function_arguments(p.oid) as arguments
      FROM pg_proc p
      JOIN pg_namespace n ON n.oid = p.pronamespace
      WHERE p.prokind = 'p'
        AND n.nspname NOT IN ('pg_catalog', 'information_schema')
      ORDER BY n.nspname, p.proname
    `

    return assembleSchemaInfo(details.database, defaultSchema, columns, keys, procedures)
  }, connectionId)
}
