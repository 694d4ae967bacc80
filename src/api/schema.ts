import { z } from 'zod'
import { moodSchema } from '../config/schema'
import { BEHAVIOR_TOKEN_PATTERN, SOUND_NAME_PATTERN } from '../services/markup/builder'

const behaviorSchema = z.string().regex(BEHAVIOR_TOKEN_PATTERN, 'behavior must be alphanumeric')
const soundSchema = z.string().regex(SOUND_NAME_PATTERN, 'sound must be alphanumeric')
const seconds = z.number().finite()

/**
 * speak コマンド
 * markup 指定時はマークアップをそのまま送り、未指定なら mood / intensity 付きの発話
 */
export const speakCommandSchema = z.object({
  text: z.string().max(1000).default(''),
  markup: z.string().min(1).optional(),
  mood: moodSchema.default('neutral'),
  intensity: z.number().min(0).max(1).default(0.5),
})

const speakStepSchema = speakCommandSchema.extend({ command: z.literal('speak') })
const quickActionStepSchema = z.object({ command: z.literal('quick_action'), action: z.string().min(1) })
const behaviorStepSchema = z.object({ command: z.literal('behavior'), behavior: behaviorSchema })
const soundEffectStepSchema = z.object({
  command: z.literal('sound_effect'),
  sound: soundSchema,
  volume: z.number().min(0).max(1).default(0.75),
})
const presetStepSchema = z.object({ command: z.literal('preset'), preset: z.string().min(1) })

export const macroStepSchema = z.discriminatedUnion('command', [
  speakStepSchema,
  quickActionStepSchema,
  behaviorStepSchema,
  soundEffectStepSchema,
  presetStepSchema,
])

// 範囲チェックは Sequence Builder / Dispatcher 側で InvalidParameterError として返す
export const deviceCommandSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('laugh_sequence'),
    totalSeconds: seconds.optional(),
    behavior: behaviorSchema.optional(),
    behaviorSeconds: seconds.optional(),
    gapSeconds: seconds.optional(),
  }),
  z.object({
    command: z.literal('repeated_behavior'),
    behavior: behaviorSchema.optional(),
    behaviorSeconds: seconds.optional(),
    gapSeconds: seconds.optional(),
    totalSeconds: seconds.optional(),
  }),
  z.object({ command: z.literal('interrupt') }),
  speakStepSchema,
  quickActionStepSchema,
  behaviorStepSchema,
  soundEffectStepSchema,
  presetStepSchema,
  z.object({ command: z.literal('mix'), mix: z.string().min(1) }),
  z.object({ command: z.literal('stop_mix') }),
  z.object({ command: z.literal('play_macro'), steps: z.array(macroStepSchema).min(1).max(100) }),
])

export type DeviceCommand = z.infer<typeof deviceCommandSchema>
