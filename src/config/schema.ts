import { z } from 'zod'
import { BEHAVIOR_TOKEN_PATTERN, SOUND_NAME_PATTERN } from '../services/markup/builder'

const behaviorTokenSchema = z.string().regex(BEHAVIOR_TOKEN_PATTERN, 'behavior token must be alphanumeric')
const soundNameSchema = z.string().regex(SOUND_NAME_PATTERN, 'sound name must be alphanumeric')

export const moodSchema = z.enum([
  'neutral',
  'happy',
  'positive',
  'excited',
  'curious',
  'silly',
  'shy',
  'concerned',
  'confused',
  'angry',
  'sad',
  'negative',
  'afraid',
  'embarrassed',
])

// behaviour-tree mark のパラメータ上書き。未指定は既定値（transition 0.3 / duration 2.0 など）
const behaviorOverrideSchema = z.object({
  behavior: behaviorTokenSchema.optional(),
  transition: z.number().nonnegative().optional(),
  duration: z.number().positive().optional(),
  repeat: z.number().int().positive().optional(),
  layerBlendInTime: z.number().nonnegative().optional(),
  layerBlendOutTime: z.number().nonnegative().optional(),
  blocking: z.boolean().optional(),
  // ビヘイビアと同時に鳴らす音声（笑い声ループなど）
  sound: z
    .object({
      name: soundNameSchema,
      loop: z.boolean().default(false),
      replaceCurrent: z.boolean().default(false),
      volume: z.number().min(0).max(1).default(0.75),
      fadeInTime: z.number().nonnegative().default(0),
      fadeOutTime: z.number().nonnegative().default(2),
    })
    .optional(),
})

export const presetStepSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('speak'),
    text: z.string().min(1),
    mood: moodSchema.default('neutral'),
    intensity: z.number().min(0).max(1).default(0.5),
  }),
  z.object({
    type: z.literal('behavior'),
    behavior: behaviorTokenSchema,
  }),
  z.object({
    type: z.literal('sound_effect'),
    sound: soundNameSchema,
    volume: z.number().min(0).max(1).default(0.75),
  }),
])

const mixSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.string().min(1),
  bpm: z.number().int().positive(),
  durationSeconds: z.number().positive(),
  sound: soundNameSchema,
  loopSound: z.boolean().default(false),
  behavior: behaviorTokenSchema,
})

const mixCategorySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  color: z.string().optional(),
})

export const catalogSchema = z
  .object({
    quickActions: z.record(z.string().min(1), behaviorTokenSchema).default({}),
    behaviors: z.record(behaviorTokenSchema, behaviorOverrideSchema).default({}),
    presets: z.record(z.string().min(1), z.array(presetStepSchema).min(1)).default({}),
    mixCategories: z.record(z.string().min(1), mixCategorySchema).default({}),
    mixes: z.record(z.string().min(1), mixSchema).default({}),
  })
  .refine((data) => Object.values(data.mixes).every((mix) => mix.category in data.mixCategories), {
    message: 'mix category must be declared in mixCategories',
    path: ['mixes'],
  })

const timedBehaviorSchema = z.object({
  behavior: behaviorTokenSchema,
  totalSeconds: z.number().nonnegative(),
  behaviorSeconds: z.number().positive(),
  gapSeconds: z.number().nonnegative(),
})

export const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(4000),
      host: z.string().min(1).default('localhost'),
      apiKey: z.string().min(1).optional(),
    })
    .default({ port: 4000, host: 'localhost' }),
  transport: z.object({
    endpoint: z.string().url(),
    token: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().default(5000),
  }),
  catalogPath: z.string().min(1).default('behavior-catalog.json'),
  sequence: timedBehaviorSchema.default({
    behavior: 'Bht_Vg_Laugh_Big_Fourcount',
    totalSeconds: 60,
    behaviorSeconds: 1.5,
    gapSeconds: 0.5,
  }),
  repeated: timedBehaviorSchema.default({
    behavior: 'Bht_Vg_Laugh_Big_Fourcount',
    totalSeconds: 60,
    behaviorSeconds: 1.5,
    gapSeconds: 2.0,
  }),
  timing: z
    .object({
      presetStepDelayMs: z.number().int().nonnegative().default(500),
      macroStepDelayMs: z.number().int().nonnegative().default(300),
    })
    .default({ presetStepDelayMs: 500, macroStepDelayMs: 300 }),
})

export type DispatchServiceConfig = z.infer<typeof configSchema>
export type BehaviorCatalogData = z.infer<typeof catalogSchema>
export type BehaviorOverride = z.infer<typeof behaviorOverrideSchema>
export type PresetStep = z.infer<typeof presetStepSchema>
export type MixDefinition = z.infer<typeof mixSchema>
export type MixCategory = z.infer<typeof mixCategorySchema>
export type Mood = z.infer<typeof moodSchema>
export type TimedBehaviorDefaults = z.infer<typeof timedBehaviorSchema>
