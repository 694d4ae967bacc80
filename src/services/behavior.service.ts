import type { ResolvedConfig } from '../config/loader'
import type { PresetStep } from '../config/schema'
import type {
  MacroStep,
  PrebuiltSequenceResult,
  RepeatedBehaviorOverrides,
  SequenceOverrides,
  SpeakCommand,
} from '../types/commands'
import { logger } from '../utils/logger'
import type { BehaviorCatalog } from './behavior-catalog'
import type { DeviceTransport } from './device-transport'
import { InvalidMarkupError, InvalidParameterError, TransportFailureError } from './errors'
import { soundEffectMark, stopMixMarkup } from './markup/builder'
import { validateMarkup, type MarkupValidationOptions } from './markup/validator'
import type { DispatchSnapshot, RepeatedDispatcher } from './repeated-dispatcher'
import { planTimedSequence, renderSequence } from './sequence-builder'

export interface BehaviorCommandServiceOptions {
  config: Pick<ResolvedConfig, 'sequence' | 'repeated' | 'timing'>
  catalog: BehaviorCatalog
  transport: DeviceTransport
  dispatcher: RepeatedDispatcher
}

export interface InterruptResult {
  deviceId: string
  cancelledHandleId?: string
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

const requireDeviceId = (deviceId: string) => {
  if (!deviceId.trim()) {
    throw new InvalidParameterError('deviceId is required', 'deviceId')
  }
}

/**
 * 外部コマンドルーターから呼ばれる操作群
 * 事前生成シーケンス（1回送信）と繰り返し送信（バックグラウンド）の2方式を持つ
 */
export class BehaviorCommandService {
  private readonly config: BehaviorCommandServiceOptions['config']
  private readonly catalog: BehaviorCatalog
  private readonly transport: DeviceTransport
  private readonly dispatcher: RepeatedDispatcher

  constructor(options: BehaviorCommandServiceOptions) {
    this.config = options.config
    this.catalog = options.catalog
    this.transport = options.transport
    this.dispatcher = options.dispatcher
  }

  async handlePrebuiltSequence(deviceId: string, overrides: SequenceOverrides = {}): Promise<PrebuiltSequenceResult> {
    requireDeviceId(deviceId)
    const defaults = this.config.sequence
    const plan = planTimedSequence({
      totalSeconds: overrides.totalSeconds ?? defaults.totalSeconds,
      behavior: overrides.behavior ?? defaults.behavior,
      behaviorSeconds: overrides.behaviorSeconds ?? defaults.behaviorSeconds,
      gapSeconds: overrides.gapSeconds ?? defaults.gapSeconds,
    })
    const markup = renderSequence(plan)
    // 長さ制限は利用者が書いたマークアップ向け。生成物は構造だけ確認する
    this.ensureValidMarkup(markup, { maxLength: Number.POSITIVE_INFINITY })

    // リトライループが無いので送信失敗はそのまま呼び出し元へ返す
    await this.send(deviceId, markup)
    const behavior = overrides.behavior ?? defaults.behavior
    logger.info(
      { deviceId, behavior, repetitions: plan.repetitions, realizedSeconds: plan.realizedSeconds },
      'Sent prebuilt sequence'
    )
    return {
      deviceId,
      behavior,
      repetitions: plan.repetitions,
      pauses: plan.pauses,
      realizedSeconds: plan.realizedSeconds,
    }
  }

  handleRepeatedBehavior(deviceId: string, overrides: RepeatedBehaviorOverrides = {}): DispatchSnapshot {
    requireDeviceId(deviceId)
    const defaults = this.config.repeated
    const handle = this.dispatcher.start(deviceId, {
      behavior: overrides.behavior ?? defaults.behavior,
      behaviorSeconds: overrides.behaviorSeconds ?? defaults.behaviorSeconds,
      gapSeconds: overrides.gapSeconds ?? defaults.gapSeconds,
      totalSeconds: overrides.totalSeconds ?? defaults.totalSeconds,
    })
    return handle.snapshot()
  }

  /**
   * 実行中の繰り返し送信を止めてから端末へ割り込みを送る
   */
  async handleInterrupt(deviceId: string): Promise<InterruptResult> {
    requireDeviceId(deviceId)
    const cancelled = this.dispatcher.cancelDevice(deviceId)
    try {
      await this.transport.sendInterrupt(deviceId)
    } catch (error) {
      throw this.toTransportFailure(error, deviceId)
    }
    logger.info({ deviceId, cancelledHandleId: cancelled?.id }, 'Sent interrupt')
    return { deviceId, cancelledHandleId: cancelled?.id }
  }

  /**
   * 送信中の1回分が終わるのを待ってから最終状態を返す
   */
  async cancelDispatch(handleId: string): Promise<DispatchSnapshot> {
    const handle = this.dispatcher.get(handleId)
    this.dispatcher.cancel(handle)
    await handle.done
    return handle.snapshot()
  }

  getDispatch(handleId: string): DispatchSnapshot {
    return this.dispatcher.get(handleId).snapshot()
  }

  async handleQuickAction(deviceId: string, action: string): Promise<string> {
    const behavior = this.catalog.resolveQuickAction(action)
    await this.handleBehavior(deviceId, behavior)
    return behavior
  }

  async handleBehavior(deviceId: string, behavior: string): Promise<void> {
    requireDeviceId(deviceId)
    await this.send(deviceId, this.catalog.behaviorMarkup(behavior))
  }

  async handleSoundEffect(deviceId: string, sound: string, volume: number): Promise<void> {
    requireDeviceId(deviceId)
    await this.send(deviceId, soundEffectMark(sound, volume))
  }

  async handleSpeak(deviceId: string, command: SpeakCommand): Promise<void> {
    requireDeviceId(deviceId)
    if (command.markup) {
      this.ensureValidMarkup(command.markup)
      await this.send(deviceId, command.markup, command.text)
      return
    }
    if (!command.text.trim()) {
      throw new InvalidParameterError('text or markup is required', 'text')
    }
    try {
      await this.transport.sendSpeech(deviceId, {
        text: command.text,
        mood: command.mood,
        intensity: command.intensity,
      })
    } catch (error) {
      throw this.toTransportFailure(error, deviceId)
    }
  }

  async handlePreset(deviceId: string, name: string): Promise<number> {
    requireDeviceId(deviceId)
    const steps = this.catalog.presetSteps(name)
    for (const [index, step] of steps.entries()) {
      if (index > 0) await wait(this.config.timing.presetStepDelayMs)
      await this.runPresetStep(deviceId, step)
    }
    return steps.length
  }

  async handleMix(deviceId: string, key: string): Promise<void> {
    requireDeviceId(deviceId)
    await this.send(deviceId, this.catalog.mixMarkup(key))
  }

  async handleStopMix(deviceId: string): Promise<void> {
    requireDeviceId(deviceId)
    await this.send(deviceId, stopMixMarkup())
  }

  async playMacro(deviceId: string, steps: readonly MacroStep[]): Promise<number> {
    requireDeviceId(deviceId)
    for (const [index, step] of steps.entries()) {
      if (index > 0) await wait(this.config.timing.macroStepDelayMs)
      switch (step.command) {
        case 'speak':
          await this.handleSpeak(deviceId, step)
          break
        case 'quick_action':
          await this.handleQuickAction(deviceId, step.action)
          break
        case 'behavior':
          await this.handleBehavior(deviceId, step.behavior)
          break
        case 'sound_effect':
          await this.handleSoundEffect(deviceId, step.sound, step.volume)
          break
        case 'preset':
          await this.handlePreset(deviceId, step.preset)
          break
      }
    }
    return steps.length
  }

  private async runPresetStep(deviceId: string, step: PresetStep): Promise<void> {
    switch (step.type) {
      case 'speak':
        await this.handleSpeak(deviceId, { text: step.text, mood: step.mood, intensity: step.intensity })
        return
      case 'behavior':
        await this.handleBehavior(deviceId, step.behavior)
        return
      case 'sound_effect':
        await this.handleSoundEffect(deviceId, step.sound, step.volume)
        return
    }
  }

  private ensureValidMarkup(markup: string, options?: MarkupValidationOptions): void {
    const result = validateMarkup(markup, options)
    if (!result.valid) {
      throw new InvalidMarkupError(result.error)
    }
  }

  private async send(deviceId: string, markup: string, speech?: string): Promise<void> {
    try {
      await this.transport.sendMarkup(deviceId, markup, speech)
    } catch (error) {
      throw this.toTransportFailure(error, deviceId)
    }
  }

  private toTransportFailure(error: unknown, deviceId: string): TransportFailureError {
    if (error instanceof TransportFailureError) return error
    return new TransportFailureError(`Failed to reach device ${deviceId}`, deviceId, { cause: error })
  }
}
