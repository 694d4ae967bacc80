import { promises as fs } from 'node:fs'
import path from 'node:path'
import process from 'node:process'
import {
  catalogSchema,
  configSchema,
  type BehaviorCatalogData,
  type DispatchServiceConfig,
  type TimedBehaviorDefaults,
} from './schema'

export interface ResolvedTransportConfig {
  endpoint: string
  token?: string
  timeoutMs: number
}

export interface ResolvedPaths {
  configPath: string
  catalogPath: string
}

export interface ResolvedConfig {
  server: DispatchServiceConfig['server']
  transport: ResolvedTransportConfig
  sequence: TimedBehaviorDefaults
  repeated: TimedBehaviorDefaults
  timing: DispatchServiceConfig['timing']
  catalog: BehaviorCatalogData
  paths: ResolvedPaths
}

export const loadConfig = async (configPath: string): Promise<ResolvedConfig> => {
  const raw = await fs.readFile(configPath, 'utf8')
  const parsed = configSchema.parse(JSON.parse(raw))

  const baseDir = path.dirname(configPath)
  const catalogPath = resolveCatalogPath(baseDir, parsed.catalogPath)
  const catalog = await loadCatalog(catalogPath)

  const endpoint = process.env.DEVICE_RELAY_URL?.trim() || parsed.transport.endpoint
  const token = process.env.DEVICE_RELAY_TOKEN?.trim() || parsed.transport.token

  return {
    server: parsed.server,
    transport: {
      endpoint,
      token,
      timeoutMs: parsed.transport.timeoutMs,
    },
    sequence: parsed.sequence,
    repeated: parsed.repeated,
    timing: parsed.timing,
    catalog,
    paths: {
      configPath,
      catalogPath,
    },
  }
}

export const loadCatalog = async (catalogPath: string): Promise<BehaviorCatalogData> => {
  let raw: string
  try {
    raw = await fs.readFile(catalogPath, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`ビヘイビアカタログが見つかりません (${catalogPath})`)
    }
    throw error
  }
  return catalogSchema.parse(JSON.parse(raw))
}

const resolveCatalogPath = (baseDir: string, catalogPath: string) => {
  const trimmed = catalogPath.trim()
  if (path.isAbsolute(trimmed)) {
    return trimmed
  }
  return path.resolve(baseDir, trimmed)
}
