import express from 'express'
import path from 'node:path'
import { loadConfig, type ResolvedConfig } from './config/loader'
import { BehaviorCatalog } from './services/behavior-catalog'
import { HttpDeviceTransport, type DeviceTransport } from './services/device-transport'
import { RepeatedDispatcher } from './services/repeated-dispatcher'
import { BehaviorCommandService } from './services/behavior.service'
import { createBehaviorRouter } from './api/behavior.controller'
import { createDocsRouter } from './api/docs'
import { createErrorHandler, notFoundHandler } from './api/middleware/error-handler'
import { logger } from './utils/logger'

export interface CreateAppOptions {
  configPath?: string
  /** テストや別ブリッジ用に差し替える送信口 */
  transport?: DeviceTransport
}

export const createApp = async (options: CreateAppOptions = {}) => {
  const configPath = options.configPath ?? path.resolve(process.cwd(), 'config/behavior-profile.json')
  const config = await loadConfig(configPath)

  const transport =
    options.transport ??
    new HttpDeviceTransport({
      endpoint: config.transport.endpoint,
      token: config.transport.token,
      timeoutMs: config.transport.timeoutMs,
    })
  const catalog = new BehaviorCatalog(config.catalog)
  const dispatcher = new RepeatedDispatcher({ transport, logger })
  const behaviorService = new BehaviorCommandService({ config, catalog, transport, dispatcher })

  const app = express()
  app.use(express.json({ limit: '1mb' }))

  app.use('/api', createBehaviorRouter(behaviorService, catalog, { apiKey: config.server.apiKey }))
  app.use('/docs', createDocsRouter())
  app.get('/health', (_req, res) => res.json({ status: 'ok' }))
  app.use(notFoundHandler)
  app.use(createErrorHandler(logger))

  return { app, config, dispatcher }
}

export type { ResolvedConfig }
