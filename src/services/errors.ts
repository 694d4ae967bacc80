/**
 * HTTPレイヤーへそのままステータスを渡せるよう、全てのドメインエラーは statusCode を持つ
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 400
  ) {
    super(message)
    this.name = 'DispatchError'
  }
}

export class InvalidParameterError extends DispatchError {
  constructor(
    message: string,
    public readonly parameter?: string
  ) {
    super(message, 400)
    this.name = 'InvalidParameterError'
  }
}

export class AlreadyRunningError extends DispatchError {
  constructor(
    public readonly deviceId: string,
    public readonly activeHandleId: string
  ) {
    super(`Repeated behavior already running for device ${deviceId}`, 409)
    this.name = 'AlreadyRunningError'
  }
}

export class UnknownHandleError extends DispatchError {
  constructor(public readonly handleId: string) {
    super(`Unknown dispatch handle: ${handleId}`, 404)
    this.name = 'UnknownHandleError'
  }
}

export class TransportFailureError extends DispatchError {
  constructor(
    message: string,
    public readonly deviceId: string,
    options?: { cause?: unknown }
  ) {
    super(message, 502)
    this.name = 'TransportFailureError'
    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }
}

export class InvalidMarkupError extends DispatchError {
  constructor(reason: string) {
    super(`Invalid markup: ${reason}`, 400)
    this.name = 'InvalidMarkupError'
  }
}

export class UnknownPresetError extends DispatchError {
  constructor(public readonly presetName: string) {
    super(`Preset not found: ${presetName}`, 404)
    this.name = 'UnknownPresetError'
  }
}

export class UnknownMixError extends DispatchError {
  constructor(public readonly mixKey: string) {
    super(`Mix not found: ${mixKey}`, 404)
    this.name = 'UnknownMixError'
  }
}
