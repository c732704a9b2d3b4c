/**
 * Autocomplete Pipeline Orchestrator
 *
 * Coordinates all modules to produce autocomplete suggestions:
 * SQL + Cursor → Tokenize → Parse → Classify → AnalyzeScope → GenerateCandidates → Rank
 *
 * Every stage is synchronous; metadata that needs a round trip (foreign keys
 * for JOIN suggestions) is layered on top by the caller.
 */

import type { AutocompleteInput, AutocompleteOutput, RankingConfig, SchemaInfo } from './types'
import { tokenize, type TokenizerOptions } from './tokenizer'
import { parseDocument } from './statement-parser'
import { classify } from './classifier'
import { analyzeScope } from './scope-analyzer'
import { generateCandidates } from './candidate-generator'
import { rankCandidates, deduplicateCandidates } from './ranker'

export interface PipelineOptions {
  /** Ranking configuration */
  rankingConfig?: Partial<RankingConfig>
  /** Enable timing measurements */
  measureTiming?: boolean
  /** Batch separator and progress reporting */
  tokenizer?: TokenizerOptions
}

type Timing = NonNullable<AutocompleteOutput['timing']>

/**
 * Run the complete autocomplete pipeline.
 */
export function runAutocompletePipeline(input: AutocompleteInput, options: PipelineOptions = {}): AutocompleteOutput {
  const timing: Timing | undefined = options.measureTiming
    ? { tokenize: 0, parse: 0, classify: 0, analyzeScope: 0, generateCandidates: 0, rank: 0, total: 0 }
    : undefined

  function measure<T>(stage: Exclude<keyof Timing, 'total'>, fn: () => T): T {
    if (!timing) return fn()
    const start = performance.now()
    const result = fn()
    timing[stage] = performance.now() - start
    return result
  }

  const totalStart = timing ? performance.now() : 0
  const cursor = { line: input.line, col: input.col }

  // 1. Tokenize
  const { tokens } = measure('tokenize', () => tokenize(input.sql, options.tokenizer))

  // 2. Parse statements
  const document = measure('parse', () => parseDocument(tokens))

  // 3. Classify the cursor position
  const context = measure('classify', () => classify(tokens, document.chunks, input.line, input.col))

  // 4. Analyze scope
  const scope = measure('analyzeScope', () => analyzeScope(context, document, cursor))

  // 5. Generate candidates
  const candidates = measure('generateCandidates', () => generateCandidates(context, scope, input.schema))

  // 6. Rank, then deduplicate (no limit - let display layer handle that)
  const suggestions = measure('rank', () =>
    deduplicateCandidates(rankCandidates(candidates, context.prefix || null, options.rankingConfig))
  )

  if (timing) timing.total = performance.now() - totalStart

  const output: AutocompleteOutput = { suggestions, context, document }
  if (timing) output.timing = timing
  return output
}

/**
 * Create a configured pipeline runner.
 */
export function createPipeline(defaultOptions?: PipelineOptions) {
  return (input: AutocompleteInput, overrideOptions?: PipelineOptions) => {
    return runAutocompletePipeline(input, { ...defaultOptions, ...overrideOptions })
  }
}

/**
 * Convenience function for quick autocomplete.
 */
export function autocomplete(sql: string, line: number, col: number, schema: SchemaInfo): AutocompleteOutput {
  return runAutocompletePipeline({ sql, line, col, schema })
}
