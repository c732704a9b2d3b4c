/**
 * CREATE, ALTER, DROP, DECLARE and TRUNCATE.
 *
 * Only what completion needs is modelled: the object being defined, temp
 * table and table variable columns, and the clause ranges the classifier
 * looks up. Everything else is skipped to the end of the statement.
 */

import type { DdlObject, QualifiedName, StatementChunk, TempTableInfo, Token } from '../types'
import { isGlobalTempTableName, isTempTableName, parseQualifiedName, parseTableReference } from '../names'
import type { ParserState } from '../parser-state'
import { clauseSpan } from '../positions'
import { parseAddedColumns, parseColumnDefinitions } from '../clauses/column-defs'
import { createChunk, finalizeChunk, setClause, type StatementContext } from './base'

const OBJECT_KINDS: Record<string, string> = {
  TABLE: 'TABLE',
  VIEW: 'VIEW',
  PROC: 'PROCEDURE',
  PROCEDURE: 'PROCEDURE',
  FUNCTION: 'FUNCTION',
  TRIGGER: 'TRIGGER',
  INDEX: 'INDEX',
  SCHEMA: 'SCHEMA',
  DATABASE: 'DATABASE',
  SEQUENCE: 'SEQUENCE',
  TYPE: 'TYPE',
}

function toDdlObject(kind: string, name: QualifiedName): DdlObject {
  const object: DdlObject = { kind, name: name.name }
  if (name.schema) object.schema = name.schema
  return object
}

/** Type and default of a scalar declaration, up to the next top-level comma */
function skipDeclaration(state: ParserState): void {
  while (!state.atEnd() && !state.isType('comma') && !state.isStatementBoundary(0)) {
    if (state.isType('paren_open')) {
      if (!state.skipParenContents()) return
      continue
    }
    state.advance()
  }
}

/** Object kind at the cursor, skipping UNIQUE/CLUSTERED ahead of INDEX */
function readObjectKind(context: StatementContext): string | null {
  const { state } = context
  while (state.isKeyword('UNIQUE') || state.isKeyword('CLUSTERED') || state.isKeyword('NONCLUSTERED')) state.advance()
  const word = state.current()?.text.toUpperCase()
  const kind = word ? OBJECT_KINDS[word] : undefined
  if (!kind) return null
  state.advance()
  return kind
}

export function parseCreateStatement(context: StatementContext): StatementChunk {
  const { state, scope, tempTables } = context
  const chunk = createChunk(state, 'CREATE')
  const createToken = state.advance()
  if (state.isKeyword('OR') && state.peek()?.text.toUpperCase() === 'ALTER') {
    state.advance()
    state.advance()
  }

  const kind = readObjectKind(context)
  const name = kind ? parseQualifiedName(state) : null
  if (kind && name) chunk.ddlObject = toDdlObject(kind, name)

  if (kind === 'TABLE' && createToken) {
    setClause(chunk, 'create_table', clauseSpan(createToken, state.previous()))
    if (name && isTempTableName(name.name)) {
      chunk.tempTableName = name.name
      chunk.isGlobalTemp = isGlobalTempTableName(name.name)
    }
    // Registered before the body so the table completes while it is being defined
    const temp: TempTableInfo | null =
      name && isTempTableName(name.name)
        ? {
            name: name.name,
            columns: [],
            createdInBatch: state.batchIndex,
            createdAtLine: createToken.line,
            isGlobal: isGlobalTempTableName(name.name),
          }
        : null
    if (temp) tempTables.set(temp.name.toLowerCase(), temp)
    if (state.isType('paren_open')) {
      const definitions = parseColumnDefinitions(state)
      setClause(chunk, 'column_definitions', definitions.clausePosition)
      if (temp) temp.columns = definitions.columns
    }
  }

  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}

export function parseAlterStatement(context: StatementContext): StatementChunk {
  const { state, scope, tempTables } = context
  const chunk = createChunk(state, 'ALTER')
  const alterToken = state.advance()

  const kind = readObjectKind(context)
  const name = kind ? parseQualifiedName(state) : null
  if (kind && name) chunk.ddlObject = toDdlObject(kind, name)

  if (kind === 'TABLE' && alterToken) {
    setClause(chunk, 'alter_table', clauseSpan(alterToken, state.previous()))
    if (state.isKeyword('ADD')) {
      const addToken = state.advance()
      const columns = parseAddedColumns(state)
      if (addToken) setClause(chunk, 'alter_add', clauseSpan(addToken, state.previous()))
      const existing = name && isTempTableName(name.name) ? tempTables.get(name.name.toLowerCase()) : undefined
      if (existing) existing.columns.push(...columns)
    }
  }

  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}

export function parseDropStatement(context: StatementContext): StatementChunk {
  const { state, scope, tempTables } = context
  const chunk = createChunk(state, 'DROP')
  const dropToken = state.advance()

  const kind = readObjectKind(context)
  if (kind && state.isKeyword('IF') && state.peek()?.text.toUpperCase() === 'EXISTS') {
    state.advance()
    state.advance()
  }

  if (kind && dropToken) {
    let first: QualifiedName | null = null
    while (!state.atEnd()) {
      const name = parseQualifiedName(state)
      if (!name) break
      first = first ?? name
      if (kind === 'TABLE' && isTempTableName(name.name)) {
        const existing = tempTables.get(name.name.toLowerCase())
        if (existing) existing.droppedAtLine = dropToken.line
      }
      if (!state.isType('comma')) break
      state.advance()
    }
    if (first) chunk.ddlObject = toDdlObject(kind, first)
    if (kind === 'TABLE') setClause(chunk, 'drop_table', clauseSpan(dropToken, state.previous()))
  }

  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}

/**
 * DECLARE @a INT = 1, @b TABLE (...). Table variables are registered with
 * their columns.
 */
export function parseDeclareStatement(context: StatementContext): StatementChunk {
  const { state, scope, tempTables } = context
  const chunk = createChunk(state, 'DECLARE')
  const declareToken = state.advance()

  // DECLARE @a INT = 1, @b TABLE (...), ...
  while (state.isType('variable')) {
    const variable = state.advance()
    if (!variable) break
    state.consumeKeyword('AS')
    if (state.isKeyword('TABLE')) {
      state.advance()
      const definitions = parseColumnDefinitions(state)
      setClause(chunk, 'column_definitions', definitions.clausePosition)
      tempTables.set(variable.text.toLowerCase(), {
        name: variable.text,
        columns: definitions.columns,
        createdInBatch: state.batchIndex,
        createdAtLine: variable.line,
        isGlobal: false,
        isTableVariable: true,
      })
    } else {
      skipDeclaration(state)
    }
    if (!state.isType('comma')) break
    state.advance()
  }

  const last: Token | null = state.consumeUntilStatementEnd() ?? state.previous()
  if (declareToken) setClause(chunk, 'declare', clauseSpan(declareToken, last))
  return finalizeChunk(state, chunk, scope)
}

export function parseTruncateStatement(context: StatementContext): StatementChunk {
  const { state, scope } = context
  const chunk = createChunk(state, 'TRUNCATE')
  state.advance()
  state.consumeKeyword('TABLE')
  const target = parseTableReference(state, scope.knownCteNames())
  if (target) {
    chunk.tables.push(target)
    scope.addTable(target)
  }
  state.consumeUntilStatementEnd()
  return finalizeChunk(state, chunk, scope)
}
