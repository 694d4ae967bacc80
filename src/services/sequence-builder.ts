import { InvalidParameterError } from './errors'
import {
  BEHAVIOR_TOKEN_PATTERN,
  BEHAVIOR_TREE_COMMAND,
  behaviorMark,
  pauseBreak,
  type BehaviorMarkOptions,
} from './markup/builder'
import { parseCommandName, parseMarkup } from './markup/parser'

export interface TimedSequenceParams {
  totalSeconds: number
  behavior: string
  behaviorSeconds: number
  gapSeconds: number
}

export type SequenceElement =
  | { type: 'behavior'; behavior: string; seconds: number }
  | { type: 'pause'; seconds: number }

export interface TimedSequencePlan {
  repetitions: number
  pauses: number
  cycleSeconds: number
  realizedSeconds: number
  elements: readonly SequenceElement[]
}

export interface SequenceSummary {
  behaviors: number
  pauses: number
  seconds: number
}

// 連続再生用: 遷移・ブレンドを短くして次のビヘイビアへすぐ繋ぐ
const SEQUENCE_MARK_OPTIONS: BehaviorMarkOptions = {
  transition: 0.1,
  repeat: 1,
  layerBlendInTime: 0.1,
  layerBlendOutTime: 0.1,
  blocking: false,
}

// 60 / 2.0 のような割り切れる値が浮動小数誤差で1回分少なくならないための許容幅
const FLOOR_TOLERANCE = 1e-9

const requireFinite = (value: number, name: string) => {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${name} must be a finite number`, name)
  }
}

export const validateSequenceParams = (params: TimedSequenceParams): void => {
  const { totalSeconds, behavior, behaviorSeconds, gapSeconds } = params
  requireFinite(totalSeconds, 'totalSeconds')
  requireFinite(behaviorSeconds, 'behaviorSeconds')
  requireFinite(gapSeconds, 'gapSeconds')
  if (behaviorSeconds <= 0) {
    throw new InvalidParameterError('behaviorSeconds must be greater than 0', 'behaviorSeconds')
  }
  if (gapSeconds < 0) {
    throw new InvalidParameterError('gapSeconds must not be negative', 'gapSeconds')
  }
  if (totalSeconds <= 0) {
    throw new InvalidParameterError('totalSeconds must be greater than 0', 'totalSeconds')
  }
  if (!BEHAVIOR_TOKEN_PATTERN.test(behavior)) {
    throw new InvalidParameterError(`Invalid behavior token: ${behavior}`, 'behavior')
  }
}

/**
 * 目標時間に収まる最大の繰り返し回数を求め、ビヘイビアと休止を交互に並べる
 *
 * n = max(1, floor(total / (behavior + gap)))
 * 実時間は n * behavior + (n - 1) * gap で、total を超えない（n = 1 に切り上げた場合を除く）
 */
export const planTimedSequence = (params: TimedSequenceParams): TimedSequencePlan => {
  validateSequenceParams(params)
  const { totalSeconds, behavior, behaviorSeconds, gapSeconds } = params

  const cycleSeconds = behaviorSeconds + gapSeconds
  const repetitions = Math.max(1, Math.floor(totalSeconds / cycleSeconds + FLOOR_TOLERANCE))

  const elements: SequenceElement[] = []
  for (let i = 0; i < repetitions; i += 1) {
    if (i > 0) {
      elements.push({ type: 'pause', seconds: gapSeconds })
    }
    elements.push({ type: 'behavior', behavior, seconds: behaviorSeconds })
  }

  return Object.freeze({
    repetitions,
    pauses: repetitions - 1,
    cycleSeconds,
    realizedSeconds: repetitions * behaviorSeconds + (repetitions - 1) * gapSeconds,
    elements: Object.freeze(elements),
  })
}

export const renderSequence = (plan: TimedSequencePlan): string =>
  plan.elements
    .map((element) =>
      element.type === 'behavior'
        ? behaviorMark(element.behavior, { ...SEQUENCE_MARK_OPTIONS, duration: element.seconds })
        : pauseBreak(element.seconds)
    )
    .join(' ')

export const buildTimedSequence = (params: TimedSequenceParams): string => renderSequence(planTimedSequence(params))

/**
 * 生成済みマークアップからビヘイビア数・休止数・再生時間を読み戻す
 */
export const summarizeSequence = (markup: string): SequenceSummary => {
  const summary: SequenceSummary = { behaviors: 0, pauses: 0, seconds: 0 }
  for (const token of parseMarkup(markup)) {
    if (token.kind !== 'self') continue
    if (token.tag === 'mark') {
      const { command, data } = parseCommandName(token.attributes.name ?? '')
      if (command !== BEHAVIOR_TREE_COMMAND) continue
      summary.behaviors += 1
      summary.seconds += Number(data.duration ?? 0)
    } else if (token.tag === 'break') {
      const time = /^([\d.]+)s$/.exec(token.attributes.time ?? '')
      if (!time) continue
      summary.pauses += 1
      summary.seconds += Number(time[1])
    }
  }
  return summary
}
