import { fetch, type Response } from 'undici'
import { TransportFailureError } from './errors'
import { logger } from '../utils/logger'

export interface SpeechRequest {
  text: string
  mood: string
  intensity: number
}

/**
 * 端末へのコマンド送信口
 * 失敗は TransportFailureError で reject する
 */
export interface DeviceTransport {
  sendMarkup(deviceId: string, markup: string, speech?: string): Promise<void>
  sendSpeech(deviceId: string, speech: SpeechRequest): Promise<void>
  sendInterrupt(deviceId: string): Promise<void>
}

export interface HttpDeviceTransportConfig {
  endpoint: string
  token?: string
  timeoutMs?: number
}

const DEFAULT_TIMEOUT_MS = 5000

/**
 * デバイスリレー（MQTTブローカー側のHTTPブリッジ）へJSONでコマンドを転送する
 *
 * POST {endpoint}/devices/{deviceId}/markup    { markup, speech? }
 * POST {endpoint}/devices/{deviceId}/speech    { text, mood, intensity }
 * POST {endpoint}/devices/{deviceId}/interrupt {}
 */
export class HttpDeviceTransport implements DeviceTransport {
  private readonly endpoint: string
  private readonly token?: string
  private readonly timeoutMs: number

  constructor(config: HttpDeviceTransportConfig) {
    this.endpoint = config.endpoint.replace(/\/+$/, '')
    this.token = config.token
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  async sendMarkup(deviceId: string, markup: string, speech?: string): Promise<void> {
    await this.post(deviceId, 'markup', speech === undefined ? { markup } : { markup, speech })
  }

  async sendSpeech(deviceId: string, speech: SpeechRequest): Promise<void> {
    await this.post(deviceId, 'speech', speech)
  }

  async sendInterrupt(deviceId: string): Promise<void> {
    await this.post(deviceId, 'interrupt', {})
  }

  private async post(deviceId: string, action: string, body: object): Promise<void> {
    if (!deviceId.trim()) {
      throw new TransportFailureError('Device id is empty', deviceId)
    }
    const url = `${this.endpoint}/devices/${encodeURIComponent(deviceId)}/${action}`
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    logger.debug({ deviceId, action }, 'Device relay request')
    let response: Response
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw new TransportFailureError(`Device relay ${action} request failed for ${deviceId}`, deviceId, {
        cause: error,
      })
    }

    if (!response.ok) {
      const message = await response.text().catch(() => '')
      throw new TransportFailureError(
        `Device relay ${action} failed (${response.status}): ${message}`,
        deviceId
      )
    }
  }
}
