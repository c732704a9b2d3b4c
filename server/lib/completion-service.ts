import { runAutocompletePipeline } from '../../src/lib/sql/autocomplete/pipeline'
import { rankCandidates, deduplicateCandidates } from '../../src/lib/sql/autocomplete/ranker'
import {
  CompletionRequestTracker,
  createSchemaMetadataResolver,
  runMetadataRequest,
  type MetadataResolver,
} from '../../src/lib/sql/autocomplete/metadata'
import { findJoinCandidates, flattenJoinCandidates, toJoinCandidate } from '../../src/lib/sql/autocomplete/fk-graph'
import type {
  AutocompleteOutput,
  CompletionContext,
  RankedSuggestion,
  SchemaInfo,
  SchemaTable,
} from '../../src/lib/sql/autocomplete/types'
import { getAnalyzerConfig, getConnectionById, type AnalyzerConfig } from './config'
import { toConnectionDetails } from './db'
import { logAnalysisCompleted, logCompletionSuperseded, logMetadataFailed } from './logger'
import { getSchema } from './schema-cache'

export interface CompletionServiceOptions {
  connectionId: string
  schema: SchemaInfo
  analyzer: AnalyzerConfig
  /** Defaults to a resolver over `schema` */
  resolver?: MetadataResolver
}

export interface CompletionResult {
  requestId: number
  suggestions: RankedSuggestion[]
  context: CompletionContext
  /** Metadata lookups that failed while building JOIN suggestions */
  metadataErrors: number
}

/**
 * Completion for one connection. Each call supersedes the one before it;
 * a superseded call resolves to null.
 */
export class CompletionService {
  private readonly tracker = new CompletionRequestTracker()
  private readonly resolver: MetadataResolver

  constructor(private readonly options: CompletionServiceOptions) {
    this.resolver = options.resolver ?? createSchemaMetadataResolver(options.schema)
  }

  async complete(sql: string, line: number, col: number): Promise<CompletionResult | null> {
    const request = this.tracker.begin()
    const { connectionId, schema, analyzer } = this.options

    const start = performance.now()
    const output = runAutocompletePipeline(
      { sql, line, col, schema },
      {
        tokenizer: {
          batchSeparator: analyzer.batch_separator,
          progressInterval: analyzer.progress_interval,
        },
      }
    )
    logAnalysisCompleted(
      connectionId,
      output.context.mode,
      output.document.chunks.length,
      output.document.tokens.length,
      output.suggestions.length,
      Math.round(performance.now() - start)
    )

    let suggestions = output.suggestions
    let metadataErrors = 0

    if (output.context.mode === 'join') {
      const joins = await this.joinSuggestions(output, request.signal)
      if (joins === null) {
        logCompletionSuperseded(connectionId, request.id)
        return null
      }
      metadataErrors = joins.errors
      if (joins.suggestions.length > 0) {
        suggestions = deduplicateCandidates(
          rankCandidates([...joins.suggestions, ...suggestions], output.context.prefix || null)
        )
      }
    }

    if (!this.tracker.isCurrent(request.id)) {
      logCompletionSuperseded(connectionId, request.id)
      return null
    }

    return { requestId: request.id, suggestions, context: output.context, metadataErrors }
  }

  /** Abort whatever request is in flight */
  cancel(): void {
    this.tracker.cancel()
  }

  /**
   * FK-reachable tables from the statement's catalog tables. Null when the
   * request was cancelled; lookup failures are logged and skipped.
   */
  private async joinSuggestions(
    output: AutocompleteOutput,
    signal: AbortSignal
  ): Promise<{ suggestions: RankedSuggestion[]; errors: number } | null> {
    const { connectionId, analyzer, schema } = this.options
    const chunk = output.context.chunk
    if (!chunk) return { suggestions: [], errors: 0 }

    let errors = 0
    const sources: SchemaTable[] = []
    for (const ref of chunk.tables) {
      if (ref.isCte || ref.isTemp || ref.isTableVariable || ref.isSubquery || ref.isTvf) continue
      const resolved = await runMetadataRequest(signal, (s) =>
        this.resolver.resolveTable(ref, { connectionId, signal: s })
      )
      if (resolved.status === 'cancelled') return null
      if (resolved.status === 'error') {
        errors++
        logMetadataFailed(connectionId, 'resolveTable', resolved.error, ref.name)
        continue
      }
      if (resolved.value) sources.push(resolved.value)
    }
    if (sources.length === 0) return { suggestions: [], errors }

    const result = await findJoinCandidates(sources, this.resolver, {
      maxDepth: analyzer.max_fk_depth,
      signal,
      connectionId,
    })
    if (result.cancelled) return null

    for (const failure of result.errors) {
      logMetadataFailed(connectionId, failure.operation, failure.error, failure.table)
    }
    errors += result.errors.length

    const suggestions = rankCandidates(
      flattenJoinCandidates(result.byHop).map((candidate) => toJoinCandidate(candidate, schema.defaultSchema)),
      output.context.prefix || null
    )
    return { suggestions, errors }
  }
}

/**
 * Completion service for a configured connection, backed by its cached schema.
 */
export async function openCompletionService(connectionId: string, defaultSchema = 'public'): Promise<CompletionService> {
  const connection = getConnectionById(connectionId)
  if (!connection) throw new Error(`Unknown connection: ${connectionId}`)
  const schema = await getSchema(connectionId, toConnectionDetails(connection), defaultSchema)
  return new CompletionService({ connectionId, schema, analyzer: getAnalyzerConfig() })
}
