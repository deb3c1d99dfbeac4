export class ConfigError extends Error {
  readonly name = 'ConfigError'
  
  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class MessagesError extends Error {
  readonly name = 'MessagesError'
  
  constructor(message: string, public readonly key?: string) {
    super(message)
  }
}

export class WhatsAppApiError extends Error {
  readonly name = 'WhatsAppApiError'
  
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export class WebhookError extends Error {
  readonly name = 'WebhookError'
  
  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export type StoreOperation = 'get' | 'set'

export class StoreUnavailableError extends Error {
  readonly name = 'StoreUnavailableError'

  constructor(
    message: string,
    public readonly operation: StoreOperation,
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}
