/**
 * Scope Context Module
 *
 * One scope per statement and per subquery nesting level. CTEs are copied
 * into a child when it is created, so a child may add or shadow CTEs without
 * touching its parent. Tables and aliases stay local; lookups that need the
 * outer query (correlated subqueries) walk the parent chain explicitly.
 */

import type { CTEInfo, SubqueryInfo, TableReference } from './types'
import type { ParserState } from './parser-state'

/**
 * Parses a `(SELECT ...)` body. The state is positioned on SELECT; the
 * closing parenthesis is left for the caller to consume.
 */
export type SubqueryParser = (state: ParserState, parent: ScopeContext) => SubqueryInfo

export class ScopeContext {
  readonly parent: ScopeContext | null
  readonly depth: number
  readonly tables: TableReference[] = []
  readonly aliases = new Map<string, TableReference>()
  readonly ctes: Map<string, CTEInfo>
  readonly subqueries: SubqueryInfo[] = []

  constructor(parent: ScopeContext | null = null) {
    this.parent = parent
    this.depth = parent ? parent.depth + 1 : 0
    this.ctes = new Map(parent?.ctes)
  }

  createChild(): ScopeContext {
    return new ScopeContext(this)
  }

  addTable(table: TableReference): void {
    this.tables.push(table)
    if (table.alias) {
      this.aliases.set(table.alias.toLowerCase(), table)
    } else if (!this.aliases.has(table.name.toLowerCase())) {
      this.aliases.set(table.name.toLowerCase(), table)
    }
  }

  addCte(cte: CTEInfo): void {
    this.ctes.set(cte.name.toLowerCase(), cte)
  }

  isCte(name: string): boolean {
    return this.ctes.has(name.toLowerCase())
  }

  getCte(name: string): CTEInfo | null {
    return this.ctes.get(name.toLowerCase()) ?? null
  }

  /** Lowercase CTE names, for table-reference parsing */
  knownCteNames(): ReadonlySet<string> {
    return new Set(this.ctes.keys())
  }

  addSubquery(subquery: SubqueryInfo): void {
    this.subqueries.push(subquery)
  }

  /** Local tables first, then each ancestor's */
  getVisibleTables(): TableReference[] {
    const tables = [...this.tables]
    if (this.parent) tables.push(...this.parent.getVisibleTables())
    return tables
  }

  /** Aliases visible here; inner scopes shadow outer ones */
  getVisibleAliases(): Map<string, TableReference> {
    const visible = this.parent ? this.parent.getVisibleAliases() : new Map<string, TableReference>()
    for (const [key, table] of this.aliases) visible.set(key, table)
    return visible
  }

  resolveAlias(name: string): TableReference | null {
    const local = this.aliases.get(name.toLowerCase())
    if (local) return local
    return this.parent ? this.parent.resolveAlias(name) : null
  }
}
