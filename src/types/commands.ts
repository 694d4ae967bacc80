import type { Mood } from '../config/schema'

/**
 * 事前生成シーケンス（laugh 60秒など）のパラメータ
 * 未指定の項目は設定ファイルの sequence 既定値を使う
 */
export interface SequenceOverrides {
  totalSeconds?: number
  behavior?: string
  behaviorSeconds?: number
  gapSeconds?: number
}

/**
 * 繰り返し送信のパラメータ。totalSeconds = 0 はキャンセルされるまで継続
 */
export interface RepeatedBehaviorOverrides {
  behavior?: string
  behaviorSeconds?: number
  gapSeconds?: number
  totalSeconds?: number
}

export interface SpeakCommand {
  text: string
  /** 指定時はマークアップとして送信（text は字幕として添える） */
  markup?: string
  mood: Mood
  intensity: number
}

export type MacroStep =
  | ({ command: 'speak' } & SpeakCommand)
  | { command: 'quick_action'; action: string }
  | { command: 'behavior'; behavior: string }
  | { command: 'sound_effect'; sound: string; volume: number }
  | { command: 'preset'; preset: string }

export interface PrebuiltSequenceResult {
  deviceId: string
  behavior: string
  repetitions: number
  pauses: number
  realizedSeconds: number
}
