import { describe, it, expect, vi, beforeEach } from 'vitest'
import { fetch as undiciFetch } from 'undici'
import { HttpDeviceTransport } from '../../src/services/device-transport'
import { TransportFailureError } from '../../src/services/errors'

vi.mock('undici', () => ({
  fetch: vi.fn(),
}))

const fetchMock = vi.mocked(undiciFetch)

const createResponse = (options: { ok?: boolean; status?: number; text?: string } = {}) =>
  ({
    ok: options.ok ?? true,
    status: options.status ?? 200,
    text: async () => options.text ?? '',
  }) as unknown as Awaited<ReturnType<typeof undiciFetch>>

const lastRequest = () => {
  const [url, init] = fetchMock.mock.calls[fetchMock.mock.calls.length - 1]
  return { url, init, body: JSON.parse(String(init?.body)) }
}

describe('HttpDeviceTransport', () => {
  beforeEach(() => {
    fetchMock.mockReset()
    fetchMock.mockResolvedValue(createResponse())
  })

  it('posts markup to the device endpoint with a bearer token', async () => {
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local/', token: 'test-token' })

    await transport.sendMarkup('moxie-1', '<mark name="cmd:interrupt"/>')

    const { url, init, body } = lastRequest()
    expect(url).toBe('http://relay.local/devices/moxie-1/markup')
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
    })
    expect(body).toEqual({ markup: '<mark name="cmd:interrupt"/>' })
  })

  it('attaches speech text to markup when given', async () => {
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local' })

    await transport.sendMarkup('moxie-1', '<break time="1.0s"/>', 'Hello')

    const { init, body } = lastRequest()
    expect(body).toEqual({ markup: '<break time="1.0s"/>', speech: 'Hello' })
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' })
  })

  it('posts speech and interrupt requests', async () => {
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local' })

    await transport.sendSpeech('moxie-1', { text: 'Hi', mood: 'happy', intensity: 0.7 })
    expect(lastRequest().url).toBe('http://relay.local/devices/moxie-1/speech')
    expect(lastRequest().body).toEqual({ text: 'Hi', mood: 'happy', intensity: 0.7 })

    await transport.sendInterrupt('moxie-1')
    expect(lastRequest().url).toBe('http://relay.local/devices/moxie-1/interrupt')
    expect(lastRequest().body).toEqual({})
  })

  it('encodes device ids in the path', async () => {
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local' })

    await transport.sendInterrupt('lab robot')

    expect(lastRequest().url).toBe('http://relay.local/devices/lab%20robot/interrupt')
  })

  it('rejects empty device ids without calling the relay', async () => {
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local' })

    await expect(transport.sendMarkup('  ', '<mark name="cmd:interrupt"/>')).rejects.toThrow('Device id is empty')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('wraps network errors', async () => {
    fetchMock.mockRejectedValueOnce(new Error('ECONNREFUSED'))
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local' })

    const result = transport.sendMarkup('moxie-1', '<mark name="cmd:interrupt"/>')

    await expect(result).rejects.toBeInstanceOf(TransportFailureError)
    await expect(result).rejects.toThrow('Device relay markup request failed for moxie-1')
  })

  it('raises descriptive error when the relay answers with a failure status', async () => {
    fetchMock.mockResolvedValueOnce(createResponse({ ok: false, status: 503, text: 'busy' }))
    const transport = new HttpDeviceTransport({ endpoint: 'http://relay.local' })

    await expect(transport.sendInterrupt('moxie-1')).rejects.toThrow('Device relay interrupt failed (503): busy')
  })
})
