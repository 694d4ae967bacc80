import { Router, type NextFunction, type Request, type Response } from 'express'
import type { BehaviorCatalog } from '../services/behavior-catalog'
import type { BehaviorCommandService } from '../services/behavior.service'
import { deviceCommandSchema, type DeviceCommand } from './schema'

export interface BehaviorRouterOptions {
  apiKey?: string
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>

// 例外は error-handler ミドルウェアへ渡してステータスへ変換する
const asyncRoute =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next)
  }

const execute = async (service: BehaviorCommandService, deviceId: string, command: DeviceCommand) => {
  switch (command.command) {
    case 'laugh_sequence': {
      const { command: _name, ...overrides } = command
      return service.handlePrebuiltSequence(deviceId, overrides)
    }
    case 'repeated_behavior': {
      const { command: _name, ...overrides } = command
      return { dispatch: service.handleRepeatedBehavior(deviceId, overrides) }
    }
    case 'interrupt':
      return service.handleInterrupt(deviceId)
    case 'speak': {
      const { command: _name, ...speak } = command
      await service.handleSpeak(deviceId, speak)
      return {}
    }
    case 'quick_action':
      return { behavior: await service.handleQuickAction(deviceId, command.action) }
    case 'behavior':
      await service.handleBehavior(deviceId, command.behavior)
      return { behavior: command.behavior }
    case 'sound_effect':
      await service.handleSoundEffect(deviceId, command.sound, command.volume)
      return { sound: command.sound }
    case 'preset':
      return { steps: await service.handlePreset(deviceId, command.preset) }
    case 'mix':
      await service.handleMix(deviceId, command.mix)
      return { mix: command.mix }
    case 'stop_mix':
      await service.handleStopMix(deviceId)
      return {}
    case 'play_macro':
      return { steps: await service.playMacro(deviceId, command.steps) }
  }
}

export const createBehaviorRouter = (
  service: BehaviorCommandService,
  catalog: BehaviorCatalog,
  options: BehaviorRouterOptions = {}
): Router => {
  const router = Router()
  const { apiKey } = options

  if (apiKey) {
    router.use((req, res, next) => {
      const providedKey = req.header('x-api-key')
      if (providedKey !== apiKey) {
        return res.status(401).json({ message: 'Invalid API key' })
      }
      return next()
    })
  }

  router.post(
    '/devices/:deviceId/commands',
    asyncRoute(async (req, res) => {
      const parsed = deviceCommandSchema.safeParse(req.body ?? {})
      if (!parsed.success) {
        return res.status(400).json({ message: 'Invalid request', issues: parsed.error.issues })
      }
      const { deviceId } = req.params
      const result = await execute(service, deviceId, parsed.data)
      return res.status(202).json({ accepted: true, command: parsed.data.command, deviceId, ...result })
    })
  )

  router.get('/dispatches/:handleId', (req, res) => {
    res.json(service.getDispatch(req.params.handleId))
  })

  router.delete(
    '/dispatches/:handleId',
    asyncRoute(async (req, res) => res.status(202).json(await service.cancelDispatch(req.params.handleId)))
  )

  router.get('/catalog', (_req, res) => {
    res.json({
      quickActions: catalog.listQuickActions(),
      behaviors: catalog.listBehaviors(),
      presets: catalog.listPresets(),
      mixCategories: catalog.listCategories(),
      mixes: catalog.listMixes(),
    })
  })

  return router
}
