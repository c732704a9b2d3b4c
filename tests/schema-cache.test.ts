import { describe, it, expect } from 'vitest'
import {
  assembleSchemaInfo,
  clearSchemaCache,
  getSchemaCache,
  type ColumnRow,
  type KeyRow,
  type ProcedureRow,
} from '../server/lib/schema-cache'
import { autocomplete } from '../src/lib/sql/autocomplete/pipeline'

function column(table: string, name: string, dataType: string, nullable: boolean, schema = 'public'): ColumnRow {
  return {
    schema_name: schema,
    table_name: table,
    object_type: 'TABLE',
    column_name: name,
    data_type: dataType,
    is_nullable: nullable,
  }
}

const columns: ColumnRow[] = [
  column('orders', 'id', 'integer', false),
  column('orders', 'customer_id', 'integer', true),
  column('customers', 'id', 'integer', false),
  column('customers', 'region_id', 'integer', true),
  column('regions', 'id', 'integer', false),
  { ...column('order_totals', 'amount', 'numeric', true, 'reporting'), object_type: 'VIEW' },
]

const keys: KeyRow[] = [
  {
    schema_name: 'public',
    table_name: 'orders',
    constraint_name: 'orders_pkey',
    constraint_type: 'p',
    columns: ['id'],
    foreign_schema: null,
    foreign_table: null,
    foreign_columns: [],
  },
  {
    schema_name: 'public',
    table_name: 'orders',
    constraint_name: 'orders_customer_id_fkey',
    constraint_type: 'f',
    columns: ['customer_id'],
    foreign_schema: 'public',
    foreign_table: 'customers',
    foreign_columns: ['id'],
  },
  {
    schema_name: 'public',
    table_name: 'customers',
    constraint_name: 'customers_region_id_fkey',
    constraint_type: 'f',
    columns: ['region_id'],
    foreign_schema: null,
    foreign_table: 'regions',
    foreign_columns: ['id'],
  },
]

const procedures: ProcedureRow[] = [{ schema_name: 'public', proc_name: 'refresh_totals', arguments: 'since date' }]

describe('assembleSchemaInfo', () => {
  const schema = assembleSchemaInfo('shop', 'public', columns, keys, procedures)

  it('groups columns into tables in row order', () => {
    expect(schema.database).toBe('shop')
    expect(schema.defaultSchema).toBe('public')
    expect(schema.tables.map((t) => `${t.schema}.${t.name}:${t.type}`)).toEqual([
      'public.orders:table',
      'public.customers:table',
      'public.regions:table',
      'reporting.order_totals:view',
    ])
  })

  it('marks key columns', () => {
    expect(schema.tables[0].columns).toEqual([
      { name: 'id', type: 'integer', nullable: false, isPrimaryKey: true, isForeignKey: false },
      { name: 'customer_id', type: 'integer', nullable: true, isPrimaryKey: false, isForeignKey: true },
    ])
  })

  it('attaches foreign keys, defaulting the referenced schema', () => {
    expect(schema.tables[0].foreignKeys).toEqual([
      {
        name: 'orders_customer_id_fkey',
        columns: ['customer_id'],
        referencedSchema: 'public',
        referencedTable: 'customers',
        referencedColumns: ['id'],
      },
    ])
    expect(schema.tables[1].foreignKeys?.[0].referencedSchema).toBe('public')
    expect(schema.tables[2].foreignKeys).toBeUndefined()
  })

  it('formats procedure signatures', () => {
    expect(schema.procedures).toEqual([{ schema: 'public', name: 'refresh_totals', signature: 'refresh_totals(since date)' }])
  })

  it('drives completion', () => {
    const sql = 'SELECT o. FROM orders o'
    const output = autocomplete(sql, 1, 10, schema)
    expect(output.suggestions.map((s) => s.value)).toEqual(['customer_id', 'id'])
  })
})

describe('schema cache', () => {
  it('is empty until loaded', () => {
    clearSchemaCache()
    expect(getSchemaCache('local')).toBeNull()
  })
})
