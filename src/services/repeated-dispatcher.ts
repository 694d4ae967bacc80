import { randomUUID } from 'node:crypto'
import type { DeviceTransport } from './device-transport'
import { AlreadyRunningError, InvalidParameterError, TransportFailureError, UnknownHandleError } from './errors'
import { BEHAVIOR_TOKEN_PATTERN, behaviorMark } from './markup/builder'
import { logger as defaultLogger, type Logger } from '../utils/logger'

export type DispatchState = 'running' | 'completed' | 'cancelled'

export interface DispatchPlan {
  behavior: string
  behaviorSeconds: number
  /** 送信と送信の間隔（秒） */
  gapSeconds: number
  /** 0 または未指定ならキャンセルされるまで続ける */
  totalSeconds?: number
}

export interface DispatchSnapshot {
  id: string
  deviceId: string
  plan: DispatchPlan
  state: DispatchState
  startedAt: number
  finishedAt?: number
  ticks: number
  failures: number
}

export interface DispatchHandle {
  readonly id: string
  readonly deviceId: string
  readonly plan: DispatchPlan
  readonly startedAt: number
  readonly state: DispatchState
  /** ループ終了時の状態で resolve する（reject はしない） */
  readonly done: Promise<DispatchState>
  snapshot(): DispatchSnapshot
}

export interface DispatchReporter {
  tickFailed(snapshot: DispatchSnapshot, error: TransportFailureError): void
  finished?(snapshot: DispatchSnapshot): void
}

export interface RepeatedDispatcherOptions {
  transport: DeviceTransport
  reporter?: DispatchReporter
  logger?: Logger
  now?: () => number
  historyLimit?: number
}

const DEFAULT_HISTORY_LIMIT = 500

export const createLoggingReporter = (logger: Logger): DispatchReporter => ({
  tickFailed: (snapshot, error) => {
    logger.warn(
      { err: error, deviceId: snapshot.deviceId, handleId: snapshot.id, tick: snapshot.ticks },
      'Repeated behavior tick failed; continuing'
    )
  },
  finished: (snapshot) => {
    logger.info(
      { deviceId: snapshot.deviceId, handleId: snapshot.id, state: snapshot.state, ticks: snapshot.ticks },
      'Repeated behavior finished'
    )
  },
})

export const validateDispatchPlan = (plan: DispatchPlan): void => {
  if (!BEHAVIOR_TOKEN_PATTERN.test(plan.behavior)) {
    throw new InvalidParameterError(`Invalid behavior token: ${plan.behavior}`, 'behavior')
  }
  if (!Number.isFinite(plan.behaviorSeconds) || plan.behaviorSeconds <= 0) {
    throw new InvalidParameterError('behaviorSeconds must be greater than 0', 'behaviorSeconds')
  }
  // 間隔0だと待ちなしで送信し続けてしまう
  if (!Number.isFinite(plan.gapSeconds) || plan.gapSeconds <= 0) {
    throw new InvalidParameterError('gapSeconds must be greater than 0', 'gapSeconds')
  }
  const total = plan.totalSeconds ?? 0
  if (!Number.isFinite(total) || total < 0) {
    throw new InvalidParameterError('totalSeconds must not be negative', 'totalSeconds')
  }
  if (total > 0 && total < plan.behaviorSeconds) {
    throw new InvalidParameterError('totalSeconds must be at least behaviorSeconds', 'totalSeconds')
  }
}

// abort されたら即座に resolve する setTimeout
const sleep = (ms: number, signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal.addEventListener('abort', onAbort, { once: true })
  })

class DispatchTask implements DispatchHandle {
  state: DispatchState = 'running'
  ticks = 0
  failures = 0
  finishedAt?: number
  done: Promise<DispatchState> = Promise.resolve<DispatchState>('running')
  private readonly controller = new AbortController()

  constructor(
    readonly id: string,
    readonly deviceId: string,
    readonly plan: DispatchPlan,
    readonly startedAt: number
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal
  }

  requestCancel(): void {
    this.controller.abort()
  }

  snapshot(): DispatchSnapshot {
    return {
      id: this.id,
      deviceId: this.deviceId,
      plan: { ...this.plan },
      state: this.state,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      ticks: this.ticks,
      failures: this.failures,
    }
  }
}

/**
 * 1端末につき1本のバックグラウンドループでビヘイビアを一定間隔で送り続ける
 *
 * 実行中の端末に対する2本目の start は AlreadyRunningError で拒否する
 * （同じ端末へ2系統のコマンドが並行すると転送路で競合するため）
 */
export class RepeatedDispatcher {
  private readonly transport: DeviceTransport
  private readonly reporter: DispatchReporter
  private readonly logger: Logger
  private readonly now: () => number
  private readonly historyLimit: number
  private readonly tasks = new Map<string, DispatchTask>()
  private readonly runningByDevice = new Map<string, DispatchTask>()
  private readonly finishedOrder: string[] = []
  // 履歴から消えた後も発行済みかどうかは判定できるよう id だけ残す
  private readonly issued = new Set<string>()

  constructor(options: RepeatedDispatcherOptions) {
    this.transport = options.transport
    this.logger = options.logger ?? defaultLogger
    this.reporter = options.reporter ?? createLoggingReporter(this.logger)
    this.now = options.now ?? (() => Date.now())
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT
  }

  start(deviceId: string, plan: DispatchPlan): DispatchHandle {
    if (!deviceId.trim()) {
      throw new InvalidParameterError('deviceId is required', 'deviceId')
    }
    validateDispatchPlan(plan)
    const active = this.runningByDevice.get(deviceId)
    if (active) {
      throw new AlreadyRunningError(deviceId, active.id)
    }

    const task = new DispatchTask(randomUUID(), deviceId, { ...plan }, this.now())
    this.tasks.set(task.id, task)
    this.issued.add(task.id)
    this.runningByDevice.set(deviceId, task)
    this.logger.info({ deviceId, handleId: task.id, plan }, 'Starting repeated behavior')

    task.done = this.run(task)
      .catch((err) => {
        this.logger.error({ err, deviceId, handleId: task.id }, 'Repeated behavior loop aborted')
        return 'cancelled' as const
      })
      .then((state) => this.finish(task, state))
    return task
  }

  /**
   * フラグを立てるだけで終了は待たない。終了済みのハンドルは履歴から消えた後も含めて何もしない。
   * 発行していない id は UnknownHandleError
   */
  cancel(handle: string | DispatchHandle): void {
    const id = typeof handle === 'string' ? handle : handle.id
    const task = this.tasks.get(id)
    if (!task) {
      if (this.issued.has(id)) return
      throw new UnknownHandleError(id)
    }
    if (task.state !== 'running') return
    task.requestCancel()
  }

  cancelDevice(deviceId: string): DispatchHandle | undefined {
    const task = this.runningByDevice.get(deviceId)
    task?.requestCancel()
    return task
  }

  get(handleId: string): DispatchHandle {
    const task = this.tasks.get(handleId)
    if (!task) {
      throw new UnknownHandleError(handleId)
    }
    return task
  }

  activeFor(deviceId: string): DispatchHandle | undefined {
    return this.runningByDevice.get(deviceId)
  }

  async stopAll(): Promise<void> {
    const running = [...this.runningByDevice.values()]
    for (const task of running) {
      task.requestCancel()
    }
    await Promise.all(running.map((task) => task.done))
  }

  private async run(task: DispatchTask): Promise<DispatchState> {
    const { plan } = task
    const totalMs = (plan.totalSeconds ?? 0) * 1000
    const gapMs = plan.gapSeconds * 1000
    const markup = behaviorMark(plan.behavior, { duration: plan.behaviorSeconds })

    while (!task.signal.aborted) {
      await this.tick(task, markup)
      await sleep(gapMs, task.signal)
      if (task.signal.aborted) break
      if (totalMs > 0 && this.now() - task.startedAt >= totalMs) {
        return 'completed'
      }
    }
    return 'cancelled'
  }

  private async tick(task: DispatchTask, markup: string): Promise<void> {
    task.ticks += 1
    try {
      await this.transport.sendMarkup(task.deviceId, markup)
    } catch (error) {
      task.failures += 1
      const failure =
        error instanceof TransportFailureError
          ? error
          : new TransportFailureError(`Tick ${task.ticks} failed for ${task.deviceId}`, task.deviceId, {
              cause: error,
            })
      this.reporter.tickFailed(task.snapshot(), failure)
    }
  }

  private finish(task: DispatchTask, state: DispatchState): DispatchState {
    task.state = state
    task.finishedAt = this.now()
    if (this.runningByDevice.get(task.deviceId) === task) {
      this.runningByDevice.delete(task.deviceId)
    }
    this.finishedOrder.push(task.id)
    while (this.finishedOrder.length > this.historyLimit) {
      const expired = this.finishedOrder.shift()
      if (expired) this.tasks.delete(expired)
    }
    this.reporter.finished?.(task.snapshot())
    return state
  }
}
