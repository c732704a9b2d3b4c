import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'

export interface AnalyzerConfig {
  batch_separator: string
  max_fk_depth: number
  progress_interval: number
}

export type SslMode = 'disable' | 'prefer' | 'require' | 'verify-full'

export interface ConnectionConfig {
  id: string
  name: string
  host: string
  port: number
  database: string
  username: string
  password?: string
  ssl_mode: SslMode
}

export interface Config {
  analyzer: AnalyzerConfig
  connections: ConnectionConfig[]
}

const validSslModes: readonly SslMode[] = ['disable', 'prefer', 'require', 'verify-full']

const MAX_FK_DEPTH_LIMIT = 5

const DEFAULT_ANALYZER: AnalyzerConfig = { batch_separator: 'GO', max_fk_depth: 2, progress_interval: 0 }

const DEFAULT_CONFIG: Config = { analyzer: { ...DEFAULT_ANALYZER }, connections: [] }

let loadedConfig: Config = { analyzer: { ...DEFAULT_ANALYZER }, connections: [] }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isSslMode(value: string): value is SslMode {
  return validSslModes.some((mode) => mode === value)
}

function parseAnalyzer(section: unknown): AnalyzerConfig {
  const analyzer = { ...DEFAULT_ANALYZER }
  if (section === undefined) return analyzer
  if (!isRecord(section)) {
    throw new Error('analyzer must be a table')
  }

  if (section.batch_separator !== undefined) {
    const separator = section.batch_separator
    if (typeof separator !== 'string' || separator.length === 0 || /\s/.test(separator)) {
      throw new Error('analyzer.batch_separator must be a non-empty string without whitespace')
    }
    analyzer.batch_separator = separator
  }

  if (section.max_fk_depth !== undefined) {
    const depth = section.max_fk_depth
    if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 1 || depth > MAX_FK_DEPTH_LIMIT) {
      throw new Error(`analyzer.max_fk_depth must be an integer between 1 and ${MAX_FK_DEPTH_LIMIT}`)
    }
    analyzer.max_fk_depth = depth
  }

  if (section.progress_interval !== undefined) {
    const interval = section.progress_interval
    if (typeof interval !== 'number' || !Number.isInteger(interval) || interval < 0) {
      throw new Error('analyzer.progress_interval must be a non-negative integer')
    }
    analyzer.progress_interval = interval
  }

  return analyzer
}

function parseConnections(section: unknown): ConnectionConfig[] {
  if (section === undefined) return []
  if (!Array.isArray(section)) {
    throw new Error('connections must be an array of tables')
  }

  const connections: ConnectionConfig[] = []
  const seenIds = new Set<string>()

  for (const c of section) {
    if (!isRecord(c)) {
      throw new Error('connections must be an array of tables')
    }

    // Validate required fields
    if (!c.id || typeof c.id !== 'string') {
      throw new Error('Connection missing required field: id')
    }
    if (!c.name || typeof c.name !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: name`)
    }
    if (!c.host || typeof c.host !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: host`)
    }
    if (!c.database || typeof c.database !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: database`)
    }
    if (!c.username || typeof c.username !== 'string') {
      throw new Error(`Connection ${c.id} missing required field: username`)
    }
    if (c.port !== undefined && (typeof c.port !== 'number' || !Number.isInteger(c.port) || c.port < 1 || c.port > 65535)) {
      throw new Error(`Connection ${c.id} has invalid port`)
    }

    // Check unique ID
    if (seenIds.has(c.id)) {
      throw new Error(`Duplicate connection id: ${c.id}`)
    }
    seenIds.add(c.id)

    // Validate ssl_mode if provided
    const sslMode = typeof c.ssl_mode === 'string' ? c.ssl_mode : 'prefer'
    if (!isSslMode(sslMode)) {
      throw new Error(`Connection ${c.id} has invalid ssl_mode: ${sslMode}`)
    }

    const connection: ConnectionConfig = {
      id: c.id,
      name: c.name,
      host: c.host,
      port: typeof c.port === 'number' ? c.port : 5432,
      database: c.database,
      username: c.username,
      ssl_mode: sslMode,
    }
    if (typeof c.password === 'string') connection.password = c.password
    connections.push(connection)
  }

  return connections
}

/**
 * Parse configuration text. Throws with the offending key on invalid values.
 */
export function parseConfig(content: string): Config {
  const parsed = parse(content)
  return {
    analyzer: parseAnalyzer(parsed.analyzer),
    connections: parseConnections(parsed.connections),
  }
}

/**
 * Load configuration from a TOML file. A missing file leaves the defaults.
 */
export async function loadConfig(configPath: string): Promise<Config> {
  if (!existsSync(configPath)) {
    loadedConfig = { analyzer: { ...DEFAULT_CONFIG.analyzer }, connections: [] }
    return loadedConfig
  }

  const content = readFileSync(configPath, 'utf-8')
  loadedConfig = parseConfig(content)
  return loadedConfig
}

export function getAnalyzerConfig(): AnalyzerConfig {
  return loadedConfig.analyzer
}

export function getConnections(): ConnectionConfig[] {
  return loadedConfig.connections
}

export function getConnectionById(id: string): ConnectionConfig | undefined {
  return loadedConfig.connections.find((c) => c.id === id)
}
