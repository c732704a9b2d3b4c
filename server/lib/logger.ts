// Analyzer event logging - emits JSON lines to stdout

interface BaseEvent {
  type: 'analyzer'
  ts: string
}

interface AnalysisCompletedEvent extends BaseEvent {
  action: 'analysis.completed'
  connection: string
  mode: string
  statement_count: number
  token_count: number
  suggestion_count: number
  duration_ms: number
}

interface MetadataFailedEvent extends BaseEvent {
  action: 'metadata.failed'
  connection: string
  operation: string
  table?: string
  error: string
}

interface CompletionSupersededEvent extends BaseEvent {
  action: 'completion.superseded'
  connection: string
  request_id: number
}

interface SchemaLoadedEvent extends BaseEvent {
  action: 'schema.loaded'
  connection: string
  table_count: number
  procedure_count: number
  duration_ms: number
}

export type AnalyzerEvent = AnalysisCompletedEvent | MetadataFailedEvent | CompletionSupersededEvent | SchemaLoadedEvent

type EventSink = (line: string) => void

let sink: EventSink = (line) => console.log(line)

/**
 * Redirect event output. Returns the previous sink so it can be restored.
 */
export function setEventSink(next: EventSink): EventSink {
  const previous = sink
  sink = next
  return previous
}

function emit(event: AnalyzerEvent): void {
  sink(JSON.stringify(event))
}

function now(): string {
  return new Date().toISOString()
}

export function logAnalysisCompleted(
  connection: string,
  mode: string,
  statement_count: number,
  token_count: number,
  suggestion_count: number,
  duration_ms: number
): void {
  emit({
    type: 'analyzer',
    ts: now(),
    action: 'analysis.completed',
    connection,
    mode,
    statement_count,
    token_count,
    suggestion_count,
    duration_ms,
  })
}

export function logMetadataFailed(connection: string, operation: string, error: Error, table?: string): void {
  const event: MetadataFailedEvent = {
    type: 'analyzer',
    ts: now(),
    action: 'metadata.failed',
    connection,
    operation,
    error: error.message,
  }
  if (table) event.table = table
  emit(event)
}

export function logCompletionSuperseded(connection: string, request_id: number): void {
  emit({
    type: 'analyzer',
    ts: now(),
    action: 'completion.superseded',
    connection,
    request_id,
  })
}

export function logSchemaLoaded(connection: string, table_count: number, procedure_count: number, duration_ms: number): void {
  emit({
    type: 'analyzer',
    ts: now(),
    action: 'schema.loaded',
    connection,
    table_count,
    procedure_count,
    duration_ms,
  })
}
