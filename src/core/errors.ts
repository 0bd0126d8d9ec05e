/** Indicates a configuration problem detected at construction time. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Indicates a failure to obtain or present credentials. */
export class AuthError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AuthError'
  }
}

export type TAPIErrorFields = {
  statusCode: number
  message: string
  code?: string
  details?: string
}

/** Indicates a non-successful HTTP response from the API service. */
export class APIError extends Error {
  readonly statusCode: number
  readonly code?: string
  readonly details?: string
  /** Message as sent by the server, without the status prefix. */
  readonly apiMessage: string

  constructor(fields: TAPIErrorFields) {
    const suffix = fields.details ? ` (${fields.details})` : ''
    super(`API error ${fields.statusCode}: ${fields.message}${suffix}`)
    this.name = 'APIError'
    this.statusCode = fields.statusCode
    this.code = fields.code
    this.details = fields.details
    this.apiMessage = fields.message
  }
}

/** Indicates the request never produced a response (DNS, refused connection, reset). */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/** Indicates an operation exceeded its time budget. */
export class TimeoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TimeoutError'
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}

/** The server answered with success but the body could not be decoded. */
export class DecodeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DecodeError'
  }
}

/** Every attempt allowed by the retry policy failed; `cause` holds the last failure. */
export class RetryExhaustedError extends Error {
  readonly attempts: number

  constructor(attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError)
    super(`request failed after ${attempts} attempts: ${detail}`, { cause: lastError })
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
  }
}

/** Walks `error` and its `cause` chain, returning the first link that is an instance of `type`. */
export function findInCauseChain<T extends Error>(
  error: unknown,
  type: new (...args: never[]) => T,
): T | undefined {
  const seen = new Set<unknown>()
  let current: unknown = error
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof type) return current
    seen.add(current)
    current = current.cause
  }
  return undefined
}

/** Concatenated messages of `error` and every error in its `cause` chain. */
export function describeCauseChain(error: unknown): string {
  const messages: string[] = []
  const seen = new Set<unknown>()
  let current: unknown = error
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current)
    if (current instanceof Error) {
      messages.push(current.message)
      current = current.cause
    } else {
      messages.push(String(current))
      current = undefined
    }
  }
  return messages.join(': ')
}

type TErrorEnvelope = {
  status_code?: unknown
  code?: unknown
  message?: unknown
  details?: unknown
}

function isEnvelope(value: unknown): value is TErrorEnvelope & { message: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  )
}

/**
 * Builds the APIError for a non-2xx response. The JSON envelope wins when the
 * body parses as one; otherwise the raw text becomes the message. The HTTP status
 * always overrides `status_code`.
 */
export function parseErrorEnvelope(statusCode: number, bodyText: string): APIError {
  let parsed: unknown
  try {
    parsed = JSON.parse(bodyText)
  } catch {
    return new APIError({ statusCode, message: bodyText })
  }
  if (!isEnvelope(parsed)) {
    return new APIError({ statusCode, message: bodyText })
  }
  return new APIError({
    statusCode,
    message: parsed.message,
    code: typeof parsed.code === 'string' ? parsed.code : undefined,
    details: typeof parsed.details === 'string' ? parsed.details : undefined,
  })
}
