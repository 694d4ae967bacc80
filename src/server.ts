import { createApp } from './app'
import { logger } from './utils/logger'

export interface StartOptions {
  exit?: (code?: number) => never
}

export const start = async (options: StartOptions = {}) => {
  try {
    const { app, config, dispatcher } = await createApp()
    const port = Number(process.env.PORT?.trim() || config.server.port)
    const host = process.env.HOST?.trim() || config.server.host
    const server = app.listen(port, host, () => {
      logger.info({ port, host }, 'Server started')
    })

    // 実行中の繰り返し送信を止めてから終了する
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutting down')
      void dispatcher
        .stopAll()
        .catch((err) => logger.error({ err }, 'Failed to stop repeated dispatches'))
        .finally(() => server.close())
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server')
    const exit = options.exit ?? ((code?: number) => process.exit(code))
    exit(1)
  }
}

const isMainModule = typeof require !== 'undefined' && typeof module !== 'undefined' && require.main === module

if (isMainModule) {
  void start()
}
