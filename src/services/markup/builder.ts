/**
 * ロボット向けマークアップ（mark / break 要素）の組み立て
 *
 * mark の data ペイロードはキー・文字列値を `+` で囲む独自形式:
 *   cmd:behaviour-tree,data:{+duration+:1.5,+behaviour+:+Bht_Spin_360+}
 */

export const BEHAVIOR_TREE_COMMAND = 'cmd:behaviour-tree'
export const PLAY_AUDIO_COMMAND = 'cmd:playaudio'
export const STOP_COMMAND = 'cmd:stop'
export const INTERRUPT_COMMAND = 'cmd:interrupt'

export const NO_GESTURE = 'Gesture_None'

export interface BehaviorMarkOptions {
  transition?: number
  duration?: number
  repeat?: number
  layerBlendInTime?: number
  layerBlendOutTime?: number
  blocking?: boolean
}

export interface PlayAudioOptions {
  volume?: number
  loop?: boolean
  replaceCurrent?: boolean
  fadeInTime?: number
  fadeOutTime?: number
  channel?: number
}

export const DEFAULT_BEHAVIOR_MARK: Required<BehaviorMarkOptions> = {
  transition: 0.3,
  duration: 2.0,
  repeat: 1,
  layerBlendInTime: 0.4,
  layerBlendOutTime: 0.4,
  blocking: false,
}

export const DEFAULT_SOUND_VOLUME = 0.75

export const BEHAVIOR_TOKEN_PATTERN = /^[A-Za-z0-9_-]{1,100}$/
export const SOUND_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,100}$/

/**
 * 小数を常に小数点以下1桁以上で表記する（2 → "2.0", 1.5 → "1.5"）
 * break の time 属性は文字列一致で照合されるため表記を固定する。指数表記は使わず小数点以下6桁で丸める
 */
export const formatDecimal = (value: number): string => {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite value: ${value}`)
  }
  // toFixed は 1e21 以上で指数表記になる
  if (Math.abs(value) >= 1e21) {
    throw new RangeError(`Cannot format value without an exponent: ${value}`)
  }
  if (Number.isInteger(value)) return value.toFixed(1)
  const fixed = value.toFixed(6).replace(/0+$/, '')
  return fixed.endsWith('.') ? `${fixed}0` : fixed
}

const quoted = (value: string) => `+${value}+`

const encodeData = (fields: Array<[string, string]>): string =>
  `{${fields.map(([key, value]) => `${quoted(key)}:${value}`).join(',')}}`

const mark = (command: string, fields?: Array<[string, string]>): string =>
  fields ? `<mark name="${command},data:${encodeData(fields)}"/>` : `<mark name="${command}"/>`

export const behaviorMark = (behavior: string, options: BehaviorMarkOptions = {}): string => {
  const resolved: Required<BehaviorMarkOptions> = {
    transition: options.transition ?? DEFAULT_BEHAVIOR_MARK.transition,
    duration: options.duration ?? DEFAULT_BEHAVIOR_MARK.duration,
    repeat: options.repeat ?? DEFAULT_BEHAVIOR_MARK.repeat,
    layerBlendInTime: options.layerBlendInTime ?? DEFAULT_BEHAVIOR_MARK.layerBlendInTime,
    layerBlendOutTime: options.layerBlendOutTime ?? DEFAULT_BEHAVIOR_MARK.layerBlendOutTime,
    blocking: options.blocking ?? DEFAULT_BEHAVIOR_MARK.blocking,
  }
  return mark(BEHAVIOR_TREE_COMMAND, [
    ['transition', formatDecimal(resolved.transition)],
    ['duration', formatDecimal(resolved.duration)],
    ['repeat', String(resolved.repeat)],
    ['layerBlendInTime', formatDecimal(resolved.layerBlendInTime)],
    ['layerBlendOutTime', formatDecimal(resolved.layerBlendOutTime)],
    ['blocking', String(resolved.blocking)],
    ['action', '0'],
    ['eventName', quoted(NO_GESTURE)],
    ['category', quoted('None')],
    ['behaviour', quoted(behavior)],
    ['Track', quoted('')],
  ])
}

export const playAudioMark = (sound: string, options: PlayAudioOptions = {}): string =>
  mark(PLAY_AUDIO_COMMAND, [
    ['SoundToPlay', quoted(sound)],
    ['LoopSound', String(options.loop ?? false)],
    ['playInBackground', 'false'],
    ['channel', String(options.channel ?? 1)],
    ['ReplaceCurrentSound', String(options.replaceCurrent ?? false)],
    ['PlayImmediate', 'true'],
    ['ForceQueue', 'false'],
    ['Volume', formatDecimal(options.volume ?? DEFAULT_SOUND_VOLUME)],
    ['FadeInTime', formatDecimal(options.fadeInTime ?? 0)],
    ['FadeOutTime', formatDecimal(options.fadeOutTime ?? 2)],
    ['AudioTimelineField', quoted('none')],
  ])

export const soundEffectMark = (sound: string, volume: number = DEFAULT_SOUND_VOLUME): string =>
  playAudioMark(sound, { volume })

export const pauseBreak = (seconds: number): string => `<break time="${formatDecimal(seconds)}s"/>`

// 音声停止 → 実行中のビヘイビアを中断
export const stopMixMarkup = (): string =>
  `${mark(STOP_COMMAND, [
    ['channel', '1'],
    ['fadeOutTime', formatDecimal(0.5)],
  ])}${mark(INTERRUPT_COMMAND)}`

