/**
 * T-SQL keyword tables.
 *
 * Category lookup is first-match-wins in the order below, so a word listed
 * under both `clause` and `misc` (NEXT) is a clause keyword.
 */

import keywordData from './keywords.json'
import type { KeywordCategory } from './types'

const CATEGORY_ORDER = [
  'statement',
  'clause',
  'function',
  'datatype',
  'operator',
  'constraint',
  'modifier',
  'misc',
] as const

const KEYWORD_TO_CATEGORY = new Map<string, KeywordCategory>()
for (const category of CATEGORY_ORDER) {
  for (const word of keywordData[category]) {
    if (!KEYWORD_TO_CATEGORY.has(word)) {
      KEYWORD_TO_CATEGORY.set(word, category)
    }
  }
}

const GLOBAL_VARIABLES = new Set(keywordData.globalVariables)
const SYSTEM_PROCEDURES = new Set(keywordData.systemProcedures)
const SYSTEM_PROCEDURES_LOWER = new Set(keywordData.systemProcedures.map((p) => p.toLowerCase()))

export function getKeywordCategory(text: string): KeywordCategory | undefined {
  return KEYWORD_TO_CATEGORY.get(text.toUpperCase())
}

/** Keywords whose first-match category is `category` */
export function getKeywordsByCategory(category: KeywordCategory): string[] {
  const words: string[] = []
  for (const [word, found] of KEYWORD_TO_CATEGORY) {
    if (found === category) words.push(word)
  }
  return words
}

export function isKeyword(text: string): boolean {
  return KEYWORD_TO_CATEGORY.has(text.toUpperCase())
}

/** Name after @@ (SERVERNAME, ROWCOUNT, ...) */
export function isGlobalVariableName(name: string): boolean {
  return GLOBAL_VARIABLES.has(name.toUpperCase())
}

export function isSystemProcedure(text: string): boolean {
  return SYSTEM_PROCEDURES.has(text) || SYSTEM_PROCEDURES_LOWER.has(text.toLowerCase())
}

/** Keywords that begin a new top-level statement */
export const STATEMENT_STARTERS = new Set([
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'MERGE',
  'CREATE', 'ALTER', 'DROP', 'TRUNCATE',
  'WITH', 'EXEC', 'EXECUTE', 'DECLARE', 'SET', 'USE', 'PRINT',
  'IF', 'WHILE', 'BEGIN', 'RETURN', 'BREAK', 'CONTINUE', 'GOTO', 'WAITFOR', 'THROW', 'RAISERROR',
  'GRANT', 'REVOKE', 'DENY', 'COMMIT', 'ROLLBACK', 'SAVE',
  'OPEN', 'CLOSE', 'DEALLOCATE', 'BACKUP', 'RESTORE', 'DBCC', 'CHECKPOINT',
])

export function isStatementStarter(word: string): boolean {
  return STATEMENT_STARTERS.has(word.toUpperCase())
}

export const JOIN_MODIFIERS = new Set(['INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'CROSS', 'NATURAL'])

/** Keywords that introduce or continue a FROM clause */
export const FROM_KEYWORDS = new Set(['FROM', 'JOIN', ...JOIN_MODIFIERS])

/** Keywords that end a FROM clause at paren depth 0 */
export const FROM_TERMINATORS = new Set([
  'WHERE', 'GROUP', 'HAVING', 'ORDER', 'OPTION', 'FOR', 'LIMIT', 'OFFSET', 'FETCH',
  'WINDOW', 'RETURNING', 'OUTPUT', 'INTO', 'VALUES', 'WHEN', 'THEN', 'ELSE', 'END', 'SET',
])

export const SET_OPERATIONS = new Set(['UNION', 'INTERSECT', 'EXCEPT'])

/** Keywords that start a constraint inside a column definition list */
export const CONSTRAINT_STARTERS = new Set([
  'PRIMARY', 'FOREIGN', 'UNIQUE', 'CHECK', 'CONSTRAINT', 'INDEX', 'CLUSTERED', 'NONCLUSTERED',
])

/** Statement keywords offered at the start of a statement */
export const STATEMENT_KEYWORDS: readonly string[] = [
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'WITH',
  'CREATE', 'ALTER', 'DROP', 'TRUNCATE',
  'DECLARE', 'SET', 'EXEC', 'USE', 'PRINT',
  'IF', 'WHILE', 'BEGIN', 'RETURN',
]
