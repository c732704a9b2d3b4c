/**
 * Autocomplete Pipeline Types
 *
 * This file defines all interfaces for the T-SQL analysis pipeline:
 * SQL + Cursor → Tokenizer → StatementParser → Classifier → ScopeAnalyzer → CandidateGenerator → Ranker
 *
 * Positions are 1-indexed (line, col). Columns count UTF-16 code units, the
 * same unit editors report for a JavaScript string.
 */

// ============================================================================
// 1. TOKENIZER TYPES
// ============================================================================

export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'bracket_id'
  | 'string'
  | 'number'
  | 'operator'
  | 'paren_open'
  | 'paren_close'
  | 'comma'
  | 'dot'
  | 'semicolon'
  | 'star'
  | 'go'
  | 'at'
  | 'variable'
  | 'global_variable'
  | 'system_procedure'
  | 'temp_table'
  | 'hash'
  | 'comment'
  | 'line_comment'

export type KeywordCategory =
  | 'statement'
  | 'clause'
  | 'function'
  | 'datatype'
  | 'operator'
  | 'constraint'
  | 'modifier'
  | 'misc'
  | 'global_variable'
  | 'system_procedure'

export interface Token {
  type: TokenType
  text: string
  line: number
  col: number
  keywordCategory?: KeywordCategory
}

export interface TokenizedSQL {
  tokens: Token[]
  /** Number of characters consumed (the input length) */
  totalChars: number
}

export interface SourcePosition {
  line: number
  col: number
}

// ============================================================================
// 2. STATEMENT PARSER TYPES
// ============================================================================

export interface ClausePosition {
  startLine: number
  startCol: number
  endLine: number
  endCol: number
  /** The clause is still being typed; it has no upper bound until a terminator appears */
  openEnded?: boolean
}

export type ClauseName =
  | 'select'
  | 'into'
  | 'from'
  | 'where'
  | 'group_by'
  | 'having'
  | 'order_by'
  | 'limit'
  | 'offset'
  | 'fetch'
  | 'set'
  | 'output'
  | 'values'
  | 'insert_columns'
  | 'update'
  | 'delete'
  | 'merge'
  | 'using'
  | 'create_table'
  | 'column_definitions'
  | 'alter_table'
  | 'alter_add'
  | 'drop_table'
  | 'declare'

export type ClauseKey = ClauseName | `join_${number}` | `on_${number}`

export type ClausePositions = Partial<Record<ClauseKey, ClausePosition>>

export interface QualifiedName {
  server?: string
  database?: string
  schema?: string
  name: string
}

export interface TableReference extends QualifiedName {
  alias?: string
  isTemp: boolean
  isGlobalTemp: boolean
  isTableVariable: boolean
  isCte: boolean
  /** Table-valued function called in FROM/APPLY */
  isTvf?: boolean
  /** Pseudo-table standing for an aliased derived table or VALUES constructor */
  isSubquery?: boolean
  columns?: ColumnInfo[]
}

export interface ExpressionColumn {
  name: string
  sourceTable?: string
}

export interface ColumnInfo {
  name: string
  sourceTable?: string
  parentTable?: string
  parentSchema?: string
  isStar: boolean
  expressionColumns?: ExpressionColumn[]
  /** Declared type for column definitions (CREATE TABLE, table variables) */
  dataType?: string
}

export interface ParameterInfo {
  /** Name without the leading @ or @@ */
  name: string
  fullName: string
  line: number
  col: number
  isSystem: boolean
}

export interface SubqueryInfo {
  alias?: string
  columns: ColumnInfo[]
  tables: TableReference[]
  subqueries: SubqueryInfo[]
  parameters: ParameterInfo[]
  startPos: SourcePosition
  /** Position of the closing parenthesis; null while the subquery is unterminated */
  endPos: SourcePosition | null
  clausePositions: ClausePositions
  isValues?: boolean
}

export interface CTEInfo {
  name: string
  columns: ColumnInfo[]
  tables: TableReference[]
  subqueries: SubqueryInfo[]
  parameters: ParameterInfo[]
  /** Explicit column list: WITH name (a, b) AS (...) */
  columnList?: string[]
  isRecursive?: boolean
  /** Body range, from the opening parenthesis to the closing one */
  startPos?: SourcePosition
  endPos?: SourcePosition
  clausePositions?: ClausePositions
}

export type StatementType =
  | 'SELECT'
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE'
  | 'MERGE'
  | 'CREATE'
  | 'ALTER'
  | 'DROP'
  | 'DECLARE'
  | 'TRUNCATE'
  | 'EXEC'
  | 'SET'
  | 'USE'
  | 'OTHER'

export interface DdlObject {
  kind: string
  name: string
  schema?: string
}

export interface StatementChunk {
  statementType: StatementType
  tables: TableReference[]
  /** Lowercase alias (or table name) → table, rebuilt from `tables` at finalization */
  aliases: Map<string, TableReference>
  columns?: ColumnInfo[]
  subqueries: SubqueryInfo[]
  ctes: CTEInfo[]
  parameters: ParameterInfo[]
  tempTableName?: string
  isGlobalTemp?: boolean
  insertColumns?: string[]
  execProcedure?: QualifiedName
  updateTarget?: TableReference
  deleteTarget?: TableReference
  ddlObject?: DdlObject
  hasFromClause?: boolean
  startLine: number
  startCol: number
  endLine: number
  endCol: number
  batchIndex: number
  clausePositions: ClausePositions
  tokenStartIdx: number
  tokenEndIdx: number
}

export interface TempTableInfo {
  name: string
  columns: ColumnInfo[]
  createdInBatch: number
  createdAtLine: number
  isGlobal: boolean
  isTableVariable?: boolean
  droppedAtLine?: number
}

export interface ParsedDocument {
  tokens: Token[]
  chunks: StatementChunk[]
  /** Keyed by lowercase name (including the # / @ prefix) */
  tempTables: Map<string, TempTableInfo>
}

export interface FromClauseResult {
  tables: TableReference[]
  clausePosition: ClausePosition | null
  /** In discovery order; recorded as join_1, join_2, ... */
  joinPositions: ClausePosition[]
  onPositions: ClausePosition[]
}

// ============================================================================
// 3. CLASSIFIER TYPES
// ============================================================================

export type ContextType = 'table' | 'column' | 'procedure' | 'database' | 'schema' | 'keyword' | 'none'

export type TableMode =
  | 'from'
  | 'join'
  | 'update'
  | 'delete'
  | 'truncate'
  | 'alter'
  | 'insert'
  | 'merge'
  | 'merge_using'
  | 'into'

export type CompletionMode =
  | TableMode
  | `${TableMode}_qualified`
  | `${TableMode}_cross_db_qualified`
  | 'select'
  | 'where'
  | 'on'
  | 'having'
  | 'group_by'
  | 'order_by'
  | 'set'
  | 'set_value'
  | 'values'
  | 'insert_columns'
  | 'merge_insert_columns'
  | 'output'
  | 'case_expression'
  | 'qualified'
  | 'procedure'
  | 'database'
  | 'schema'
  | 'start'
  | 'general'
  | 'string'
  | 'comment'

export interface ContextFilters {
  schema?: string
  database?: string
  /** Alias or table name typed before the dot in a column context */
  tableRef?: string
  /** Schema of a `schema.table.` reference */
  tableRefSchema?: string
  /** The typed qualifier already includes the schema */
  omitSchema?: boolean
  /** A single `name.` in a table context may be a database rather than a schema */
  potentialDatabase?: string
  /** `inserted` / `deleted` inside OUTPUT */
  pseudoTable?: 'inserted' | 'deleted'
  insertTable?: string
  insertSchema?: string
  /** Zero-based position inside a VALUES tuple */
  valuePosition?: number
  /** Column on the other side of a comparison: `a.x = |` */
  leftSide?: ColumnReference
}

export interface ColumnReference {
  column: string
  /** Alias or table name before the column */
  table?: string
  schema?: string
}

export interface CompletionContext {
  type: ContextType
  mode: CompletionMode
  filters: ContextFilters
  /** Partial word being typed at the cursor */
  prefix: string
  chunk: StatementChunk | null
  subquery: SubqueryInfo | null
}

// ============================================================================
// 4. SCOPE ANALYZER TYPES
// ============================================================================

export interface ScopedTable {
  ref: TableReference
  /** Depth of the scope the table was found in (0 = statement) */
  depth: number
}

export interface ScopeInfo {
  /** Innermost scope first */
  tables: ScopedTable[]
  ctes: CTEInfo[]
  /** Temp tables and table variables alive at the cursor */
  tempTables: TempTableInfo[]
  /** Every subquery of the statement, nested ones included, for derived-table columns */
  subqueries: SubqueryInfo[]
  /** Resolve an alias or table name against the scope chain at the cursor */
  resolveAlias: (name: string) => TableReference | null
}

export interface ResolvedColumn {
  name: string
  dataType?: string
  nullable?: boolean
}

// ============================================================================
// 5. CANDIDATE GENERATOR TYPES
// ============================================================================

export type CandidateType =
  | 'column'
  | 'table'
  | 'view'
  | 'cte'
  | 'temp_table'
  | 'procedure'
  | 'schema'
  | 'database'
  | 'keyword'
  | 'join'

export type CandidateSource = 'context' | 'schema' | 'keyword' | 'foreign_key'

export interface Candidate {
  type: CandidateType
  value: string
  displayText: string
  detail?: string
  source: CandidateSource
}

// ============================================================================
// 6. RANKER TYPES
// ============================================================================

export type MatchType = 'exact' | 'prefix' | 'contains' | 'fuzzy' | 'none'

export interface RankedSuggestion extends Candidate {
  score: number
  matchType: MatchType
}

export interface RankingConfig {
  typePreference: CandidateType[]
}

// ============================================================================
// 7. SCHEMA TYPES
// ============================================================================

export interface SchemaColumn {
  name: string
  type: string
  nullable: boolean
  isPrimaryKey: boolean
  isForeignKey: boolean
}

export interface SchemaForeignKey {
  name: string
  columns: string[]
  referencedSchema: string
  referencedTable: string
  referencedColumns: string[]
}

export interface SchemaTable {
  schema: string
  name: string
  type: 'table' | 'view'
  columns: SchemaColumn[]
  foreignKeys?: SchemaForeignKey[]
}

export interface SchemaProcedure {
  schema: string
  name: string
  signature: string
}

export interface SchemaInfo {
  database?: string
  databases?: string[]
  defaultSchema: string
  tables: SchemaTable[]
  procedures: SchemaProcedure[]
}

// ============================================================================
// 8. PIPELINE INPUT/OUTPUT
// ============================================================================

export interface AutocompleteInput {
  sql: string
  line: number
  col: number
  schema: SchemaInfo
}

export interface AutocompleteOutput {
  suggestions: RankedSuggestion[]
  context: CompletionContext
  document: ParsedDocument
  timing?: {
    tokenize: number
    parse: number
    classify: number
    analyzeScope: number
    generateCandidates: number
    rank: number
    total: number
  }
}
