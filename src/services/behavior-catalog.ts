import type { BehaviorCatalogData, MixCategory, MixDefinition, PresetStep } from '../config/schema'
import { UnknownMixError, UnknownPresetError } from './errors'
import { NO_GESTURE, behaviorMark, playAudioMark } from './markup/builder'

export interface MixSummary extends MixDefinition {
  key: string
  categoryName: string
}

// ミックス用の behaviour-tree / playaudio パラメータ
const MIX_BLEND_SECONDS = 0.5
const MIX_AUDIO_FADE_OUT_SECONDS = 1.0

// "constructor" などプロトタイプ上のキーを拾わない
const lookup = <T>(record: Record<string, T>, key: string): T | undefined =>
  Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined

export class BehaviorCatalog {
  constructor(private readonly data: BehaviorCatalogData) {}

  /**
   * クイックアクション名をビヘイビアに変換する。未登録なら Gesture_None
   */
  resolveQuickAction(action: string): string {
    return lookup(this.data.quickActions, action) ?? NO_GESTURE
  }

  behaviorMarkup(behavior: string): string {
    const override = lookup(this.data.behaviors, behavior)
    if (!override) {
      return behaviorMark(behavior)
    }
    const { sound, behavior: target, ...markOptions } = override
    const behaviorPart = behaviorMark(target ?? behavior, markOptions)
    if (!sound) {
      return behaviorPart
    }
    const audioPart = playAudioMark(sound.name, {
      loop: sound.loop,
      replaceCurrent: sound.replaceCurrent,
      volume: sound.volume,
      fadeInTime: sound.fadeInTime,
      fadeOutTime: sound.fadeOutTime,
    })
    return `${audioPart}${behaviorPart}`
  }

  presetSteps(name: string): readonly PresetStep[] {
    const steps = lookup(this.data.presets, name)
    if (!steps) {
      throw new UnknownPresetError(name)
    }
    return steps
  }

  mix(key: string): MixDefinition {
    const mix = lookup(this.data.mixes, key)
    if (!mix) {
      throw new UnknownMixError(key)
    }
    return mix
  }

  /**
   * 音声再生 + ダンスビヘイビアを1つのマークアップにまとめる
   */
  mixMarkup(key: string): string {
    const mix = this.mix(key)
    const audio = playAudioMark(mix.sound, {
      loop: mix.loopSound,
      replaceCurrent: true,
      volume: 1,
      fadeOutTime: MIX_AUDIO_FADE_OUT_SECONDS,
    })
    const dance = behaviorMark(mix.behavior, {
      transition: MIX_BLEND_SECONDS,
      duration: mix.durationSeconds,
      layerBlendInTime: MIX_BLEND_SECONDS,
      layerBlendOutTime: MIX_BLEND_SECONDS,
    })
    return `${audio}${dance}`
  }

  mixesByCategory(category: string): MixSummary[] {
    return this.listMixes().filter((mix) => mix.category === category)
  }

  listMixes(): MixSummary[] {
    return Object.entries(this.data.mixes).map(([key, mix]) => ({
      ...mix,
      key,
      categoryName: lookup(this.data.mixCategories, mix.category)?.name ?? 'Unknown',
    }))
  }

  listCategories(): Record<string, MixCategory> {
    return { ...this.data.mixCategories }
  }

  listQuickActions(): Record<string, string> {
    return { ...this.data.quickActions }
  }

  listBehaviors(): string[] {
    return Object.keys(this.data.behaviors)
  }

  listPresets(): string[] {
    return Object.keys(this.data.presets)
  }
}
