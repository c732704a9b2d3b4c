import { describe, it, expect, vi, beforeEach } from 'vitest'
import { CompletionService, openCompletionService } from '../server/lib/completion-service'
import { getConnectionById, type AnalyzerConfig } from '../server/lib/config'
import { logAnalysisCompleted, logCompletionSuperseded, logMetadataFailed } from '../server/lib/logger'
import { getSchema } from '../server/lib/schema-cache'
import { createSchemaMetadataResolver, type MetadataResolver } from '../src/lib/sql/autocomplete/metadata'
import { splitCursor, testSchema } from './test-utils'

vi.mock('../server/lib/logger', () => ({
  logAnalysisCompleted: vi.fn(),
  logMetadataFailed: vi.fn(),
  logCompletionSuperseded: vi.fn(),
  logSchemaLoaded: vi.fn(),
}))

vi.mock('../server/lib/config', () => ({
  getConnectionById: vi.fn(),
  getAnalyzerConfig: vi.fn(() => ({ batch_separator: 'GO', max_fk_depth: 1, progress_interval: 0 })),
}))

vi.mock('../server/lib/schema-cache', () => ({
  getSchema: vi.fn(),
}))

const analyzer: AnalyzerConfig = { batch_separator: 'GO', max_fk_depth: 2, progress_interval: 0 }
const base = createSchemaMetadataResolver(testSchema)

function createService(resolver?: MetadataResolver, config: AnalyzerConfig = analyzer): CompletionService {
  return new CompletionService({ connectionId: 'local', schema: testSchema, analyzer: config, resolver })
}

function run(service: CompletionService, sqlWithCursor: string) {
  const { sql, line, col } = splitCursor(sqlWithCursor)
  return service.complete(sql, line, col)
}

/** Resolver whose table lookups wait until `release` is called */
function gatedResolver(): { resolver: MetadataResolver; release: () => void } {
  let release: () => void = () => {}
  const gate = new Promise<void>((resolve) => {
    release = resolve
  })
  const resolver: MetadataResolver = {
    resolveTable: async (name, context) => {
      await gate
      return base.resolveTable(name, context)
    },
    getConstraints: (table, context) => base.getConstraints(table, context),
  }
  return { resolver, release: () => release() }
}

const JOIN_SQL = 'SELECT * FROM Employees e JOIN |'

describe('CompletionService', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('puts foreign-key targets ahead of plain tables after JOIN', async () => {
    const result = await run(createService(), JOIN_SQL)
    expect(result?.requestId).toBe(1)
    expect(result?.metadataErrors).toBe(0)
    expect(result?.suggestions.map((s) => [s.type, s.value])).toEqual([
      ['join', 'Departments'],
      ['table', 'Departments'],
      ['table', 'Projects'],
      ['table', 'sales.Orders'],
      ['view', 'ActiveEmployees'],
    ])
  })

  it('completes columns without metadata lookups', async () => {
    const result = await run(createService(), 'SELECT * FROM Employees e WHERE e.Sal|')
    expect(result?.context.mode).toBe('qualified')
    expect(result?.suggestions.map((s) => s.value)).toEqual(['Salary'])
    expect(logAnalysisCompleted).toHaveBeenCalledWith('local', 'qualified', 1, expect.any(Number), 1, expect.any(Number))
  })

  it('resolves a superseded request to null', async () => {
    const { resolver, release } = gatedResolver()
    const service = createService(resolver)

    const first = run(service, JOIN_SQL)
    const second = await run(service, 'SELECT * FROM Employees e WHERE e.Sal|')
    release()

    expect(await first).toBeNull()
    expect(second?.requestId).toBe(2)
    expect(logCompletionSuperseded).toHaveBeenCalledWith('local', 1)
  })

  it('resolves a cancelled request to null', async () => {
    const { resolver, release } = gatedResolver()
    const service = createService(resolver)

    const pending = run(service, JOIN_SQL)
    service.cancel()
    release()

    expect(await pending).toBeNull()
    expect(logCompletionSuperseded).toHaveBeenCalledWith('local', 1)
  })

  it('counts and logs failed lookups', async () => {
    const failure = new Error('connection reset')
    const resolver: MetadataResolver = {
      resolveTable: (name, context) => base.resolveTable(name, context),
      getConstraints: async () => {
        throw failure
      },
    }
    const result = await run(createService(resolver), JOIN_SQL)
    expect(result?.metadataErrors).toBe(1)
    expect(result?.suggestions.map((s) => s.type)).not.toContain('join')
    expect(logMetadataFailed).toHaveBeenCalledWith('local', 'getConstraints', failure, 'dbo.employees')
  })

  it('splits batches on the configured separator', async () => {
    const service = createService(undefined, { ...analyzer, batch_separator: 'BATCH' })
    const result = await run(service, 'CREATE TABLE #scratch (Id INT)\nBATCH\nSELECT * FROM |')
    expect(result?.context.chunk?.batchIndex).toBe(1)
    expect(result?.suggestions.map((s) => s.value)).not.toContain('#scratch')
  })

  describe('openCompletionService', () => {
    it('loads the connection schema', async () => {
      vi.mocked(getConnectionById).mockReturnValue({
        id: 'local',
        name: 'Local',
        host: 'localhost',
        port: 5432,
        database: 'hr',
        username: 'app',
        password: 'test-secret',
        ssl_mode: 'disable',
      })
      vi.mocked(getSchema).mockResolvedValue(testSchema)

      const service = await openCompletionService('local', 'dbo')
      expect(getSchema).toHaveBeenCalledWith(
        'local',
        {
          host: 'localhost',
          port: 5432,
          database: 'hr',
          username: 'app',
          password: 'test-secret',
          sslMode: 'disable',
          statementTimeout: '10s',
        },
        'dbo'
      )
      const result = await run(service, 'SELECT * FROM Employees e WHERE e.Sal|')
      expect(result?.suggestions.map((s) => s.value)).toEqual(['Salary'])
    })

    it('rejects an unknown connection', async () => {
      vi.mocked(getConnectionById).mockReturnValue(undefined)
      await expect(openCompletionService('missing')).rejects.toThrow('Unknown connection: missing')
      expect(getSchema).not.toHaveBeenCalled()
    })
  })
})
