/**
 * T-SQL Autocomplete
 *
 * Context-sensitive analysis for SQL editing:
 * - Error-tolerant tokenizing and statement parsing (handles incomplete SQL)
 * - Nested scopes for CTEs, subqueries and correlated references
 * - Cursor classification into completion modes
 * - Candidate generation, ranking and foreign-key JOIN suggestions
 *
 * @example
 * ```ts
 * import { autocomplete } from './autocomplete'
 *
 * const result = autocomplete('SELECT e. FROM Employees e', 1, 10, schema)
 *
 * console.log(result.context.mode) // 'qualified'
 * console.log(result.suggestions) // [{ value: 'EmployeeID', type: 'column', ... }, ...]
 * ```
 */

// Pipeline
export { runAutocompletePipeline, createPipeline, autocomplete } from './pipeline'
export type { PipelineOptions } from './pipeline'

// Types
export type * from './types'

// Module functions (for unit testing and advanced usage)
export {
  tokenize,
  getTokenAtPosition,
  getTokensBeforeCursor,
  getPartialWord,
  isInsideStringOrComment,
  offsetToPosition,
} from './tokenizer'
export type { TokenizerOptions } from './tokenizer'
export { ParserState } from './parser-state'
export { ScopeContext } from './scope'
export {
  parse,
  parseDocument,
  getChunkAtPosition,
  getSubqueryAtPosition,
  getSubqueryChain,
  getClauseAtPosition,
} from './statement-parser'
export { classify } from './classifier'
export { analyzeScope, getColumnsForTable, getVisibleTempTables, findTableInSchema } from './scope-analyzer'
export { generateCandidates } from './candidate-generator'
export { rankCandidates, deduplicateCandidates, limitSuggestions, computeMatchType, isMatch } from './ranker'

// Metadata and JOIN suggestions
export {
  createSchemaMetadataResolver,
  runMetadataRequest,
  CompletionRequestTracker,
} from './metadata'
export type {
  ForeignKeyConstraint,
  MetadataResolver,
  MetadataOutcome,
  MetadataRequestContext,
  CompletionRequest,
} from './metadata'
export {
  findJoinCandidates,
  flattenJoinCandidates,
  formatJoinCandidate,
  toJoinCandidate,
  DEFAULT_MAX_FK_DEPTH,
} from './fk-graph'
export type { FKChainResult, FKPathEntry, JoinCandidateOptions, JoinCandidateResult, MetadataFailure } from './fk-graph'
