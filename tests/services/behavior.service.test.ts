import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { BehaviorCatalog } from '../../src/services/behavior-catalog'
import { BehaviorCommandService } from '../../src/services/behavior.service'
import {
  InvalidParameterError,
  TransportFailureError,
  UnknownHandleError,
  UnknownMixError,
  UnknownPresetError,
} from '../../src/services/errors'
import { behaviorMark, soundEffectMark, stopMixMarkup } from '../../src/services/markup/builder'
import { RepeatedDispatcher } from '../../src/services/repeated-dispatcher'
import { buildTimedSequence, summarizeSequence } from '../../src/services/sequence-builder'
import {
  createCatalogData,
  createFakeTransport,
  createServiceConfig,
  type FakeTransport,
} from '../factories/config'

describe('BehaviorCommandService', () => {
  let transport: FakeTransport
  let catalog: BehaviorCatalog
  let dispatcher: RepeatedDispatcher
  let service: BehaviorCommandService

  beforeEach(() => {
    transport = createFakeTransport()
    catalog = new BehaviorCatalog(createCatalogData())
    dispatcher = new RepeatedDispatcher({ transport })
    service = new BehaviorCommandService({ config: createServiceConfig(), catalog, transport, dispatcher })
  })

  afterEach(async () => {
    await dispatcher.stopAll()
  })

  describe('handlePrebuiltSequence', () => {
    it('sends the sequence built from configured defaults', async () => {
      const result = await service.handlePrebuiltSequence('moxie-1')

      expect(result).toEqual({
        deviceId: 'moxie-1',
        behavior: 'Bht_Spin_360',
        repetitions: 2,
        pauses: 1,
        realizedSeconds: 3.5,
      })
      expect(transport.sendMarkup).toHaveBeenCalledTimes(1)
      expect(transport.sendMarkup).toHaveBeenCalledWith(
        'moxie-1',
        buildTimedSequence({ totalSeconds: 4, behavior: 'Bht_Spin_360', behaviorSeconds: 1.5, gapSeconds: 0.5 }),
        undefined
      )
    })

    it('applies request overrides', async () => {
      const result = await service.handlePrebuiltSequence('moxie-1', {
        totalSeconds: 60,
        behavior: 'Bht_Vg_Laugh_Big_Fourcount',
        behaviorSeconds: 2,
        gapSeconds: 0.3,
      })

      expect(result.behavior).toBe('Bht_Vg_Laugh_Big_Fourcount')
      expect(result.repetitions).toBe(26)
      expect(result.realizedSeconds).toBeCloseTo(59.5)
    })

    it('rejects invalid durations before sending', async () => {
      await expect(service.handlePrebuiltSequence('moxie-1', { behaviorSeconds: 0 })).rejects.toBeInstanceOf(
        InvalidParameterError
      )
      expect(transport.sendMarkup).not.toHaveBeenCalled()
    })

    it('sends long sequences beyond the hand-written markup limit', async () => {
      const result = await service.handlePrebuiltSequence('moxie-1', { totalSeconds: 120 })

      const markup = transport.sendMarkup.mock.calls[0]?.[1] ?? ''
      expect(markup.length).toBeGreaterThan(10_000)
      expect(summarizeSequence(markup)).toEqual({ behaviors: 60, pauses: 59, seconds: 119.5 })
      expect(result.repetitions).toBe(60)
    })

    it('surfaces transport failures', async () => {
      transport.sendMarkup.mockRejectedValueOnce(new Error('socket closed'))

      const result = service.handlePrebuiltSequence('moxie-1')

      await expect(result).rejects.toBeInstanceOf(TransportFailureError)
      await expect(result).rejects.toThrow('Failed to reach device moxie-1')
    })

    it('keeps transport errors raised by the transport itself', async () => {
      const failure = new TransportFailureError('Device relay markup failed (503): busy', 'moxie-1')
      transport.sendMarkup.mockRejectedValueOnce(failure)

      await expect(service.handlePrebuiltSequence('moxie-1')).rejects.toBe(failure)
    })

    it('requires a device id', async () => {
      await expect(service.handlePrebuiltSequence(' ')).rejects.toThrow('deviceId is required')
    })
  })

  describe('repeated behavior', () => {
    it('starts a dispatch with configured defaults', () => {
      const snapshot = service.handleRepeatedBehavior('moxie-1')

      expect(snapshot).toMatchObject({
        deviceId: 'moxie-1',
        state: 'running',
        ticks: 1,
        plan: { behavior: 'Bht_Spin_360', behaviorSeconds: 1.5, gapSeconds: 2, totalSeconds: 6 },
      })
      expect(service.getDispatch(snapshot.id).state).toBe('running')
    })

    it('cancels a dispatch and returns its final state', async () => {
      const { id } = service.handleRepeatedBehavior('moxie-1', { totalSeconds: 0 })

      const snapshot = await service.cancelDispatch(id)

      expect(snapshot.state).toBe('cancelled')
      expect(snapshot.ticks).toBe(1)
    })

    it('raises UnknownHandleError for unknown handles', async () => {
      expect(() => service.getDispatch('missing')).toThrow(UnknownHandleError)
      await expect(service.cancelDispatch('missing')).rejects.toBeInstanceOf(UnknownHandleError)
    })

    it('interrupt cancels the running dispatch before notifying the device', async () => {
      const { id } = service.handleRepeatedBehavior('moxie-1')

      const result = await service.handleInterrupt('moxie-1')

      expect(result).toEqual({ deviceId: 'moxie-1', cancelledHandleId: id })
      expect(transport.sendInterrupt).toHaveBeenCalledWith('moxie-1')
      await expect(dispatcher.get(id).done).resolves.toBe('cancelled')
    })

    it('interrupt still reaches an idle device', async () => {
      await expect(service.handleInterrupt('moxie-1')).resolves.toEqual({ deviceId: 'moxie-1' })
      expect(transport.sendInterrupt).toHaveBeenCalledTimes(1)
    })
  })

  describe('single commands', () => {
    it('sends the behavior mapped from a quick action', async () => {
      await expect(service.handleQuickAction('moxie-1', 'celebrate')).resolves.toBe('Bht_Spin_360')
      expect(transport.sendMarkup).toHaveBeenCalledWith('moxie-1', behaviorMark('Bht_Spin_360'), undefined)
    })

    it('sends sound effects at the requested volume', async () => {
      await service.handleSoundEffect('moxie-1', 'sfx_chime', 0.5)

      expect(transport.sendMarkup).toHaveBeenCalledWith('moxie-1', soundEffectMark('sfx_chime', 0.5), undefined)
    })

    it('sends mix and stop markup', async () => {
      await service.handleMix('moxie-1', 'freeze')
      await service.handleStopMix('moxie-1')

      expect(transport.sendMarkup).toHaveBeenNthCalledWith(1, 'moxie-1', catalog.mixMarkup('freeze'), undefined)
      expect(transport.sendMarkup).toHaveBeenNthCalledWith(2, 'moxie-1', stopMixMarkup(), undefined)
      await expect(service.handleMix('moxie-1', 'missing')).rejects.toBeInstanceOf(UnknownMixError)
    })
  })

  describe('handleSpeak', () => {
    it('sends plain text as speech with mood', async () => {
      await service.handleSpeak('moxie-1', { text: 'Hi', mood: 'happy', intensity: 0.5 })

      expect(transport.sendSpeech).toHaveBeenCalledWith('moxie-1', { text: 'Hi', mood: 'happy', intensity: 0.5 })
      expect(transport.sendMarkup).not.toHaveBeenCalled()
    })

    it('sends validated markup with the text attached', async () => {
      const markup = '<speak>Hi <break time="0.5s"/></speak>'

      await service.handleSpeak('moxie-1', { text: 'Hi', markup, mood: 'neutral', intensity: 0.5 })

      expect(transport.sendMarkup).toHaveBeenCalledWith('moxie-1', markup, 'Hi')
    })

    it('rejects disallowed markup', async () => {
      await expect(
        service.handleSpeak('moxie-1', { text: '', markup: '<script>x</script>', mood: 'neutral', intensity: 0.5 })
      ).rejects.toThrow('Invalid markup: Disallowed element: script')
      expect(transport.sendMarkup).not.toHaveBeenCalled()
    })

    it('requires text or markup', async () => {
      await expect(service.handleSpeak('moxie-1', { text: '  ', mood: 'neutral', intensity: 0.5 })).rejects.toThrow(
        'text or markup is required'
      )
    })
  })

  describe('presets and macros', () => {
    it('runs preset steps in order', async () => {
      await expect(service.handlePreset('moxie-1', 'greeting')).resolves.toBe(3)

      expect(transport.sendSpeech).toHaveBeenCalledWith('moxie-1', {
        text: 'Hello there',
        mood: 'happy',
        intensity: 0.7,
      })
      expect(transport.sendMarkup.mock.calls.map(([, markup]) => markup)).toEqual([
        behaviorMark('Bht_Spin_360'),
        soundEffectMark('sfx_chime', 0.75),
      ])
    })

    it('raises UnknownPresetError for missing presets', async () => {
      await expect(service.handlePreset('moxie-1', 'missing')).rejects.toBeInstanceOf(UnknownPresetError)
    })

    it('plays macro steps in sequence', async () => {
      const count = await service.playMacro('moxie-1', [
        { command: 'quick_action', action: 'laugh' },
        { command: 'sound_effect', sound: 'sfx_chime', volume: 0.5 },
        { command: 'preset', preset: 'greeting' },
      ])

      expect(count).toBe(3)
      expect(transport.sendMarkup.mock.calls.map(([, markup]) => markup)).toEqual([
        catalog.behaviorMarkup('Bht_Vg_Laugh_Big_Fourcount'),
        soundEffectMark('sfx_chime', 0.5),
        behaviorMark('Bht_Spin_360'),
        soundEffectMark('sfx_chime', 0.75),
      ])
      expect(transport.sendSpeech).toHaveBeenCalledTimes(1)
    })

    it('stops the macro at the first failing step', async () => {
      transport.sendMarkup.mockRejectedValueOnce(new Error('offline'))

      await expect(
        service.playMacro('moxie-1', [
          { command: 'behavior', behavior: 'Bht_Spin_360' },
          { command: 'speak', text: 'Hi', mood: 'neutral', intensity: 0.5 },
        ])
      ).rejects.toBeInstanceOf(TransportFailureError)
      expect(transport.sendSpeech).not.toHaveBeenCalled()
    })
  })
})
