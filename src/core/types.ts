import type { TLogger } from './logger.ts'

export type THttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type TQueryParams = Record<string, string | number | boolean | undefined>

export type TRequestOptions = {
  body?: unknown
  query?: TQueryParams
  headers?: Record<string, string>
  signal?: AbortSignal
}

/** A negotiated OAuth2 credential. `expiresAt` is epoch milliseconds. */
export type TCredential = {
  accessToken: string
  refreshToken: string
  tokenType: string
  expiresIn: number
  scope: string
  expiresAt: number
}

export type TCredentialProvider = {
  /** Returns `Bearer <token>`, acquiring or refreshing the credential first when needed. */
  getBearerHeader(signal?: AbortSignal): Promise<string>
}

/** What interceptors may read from the client that owns the request. */
export type TClientHandle = {
  readonly credentials: TCredentialProvider
  readonly logger: TLogger
  readonly userAgent: string
}

/**
 * Mutable view of an outbound call. Interceptors edit `headers`; the terminal step
 * copies them onto the real request before every attempt.
 */
export type TRequestContext = {
  method: THttpMethod
  path: string
  headers: Headers
  query: URLSearchParams
  body: unknown
  signal?: AbortSignal
  client: TClientHandle
}

export type TResponseContext = {
  request: TRequestContext
  status: number
  headers: Headers
  body: Uint8Array
  error: Error | null
}

export type TRequestHandler = (ctx: TRequestContext) => Promise<void>
export type TResponseHandler = (ctx: TResponseContext) => Promise<void>

/** Wraps the next step of the request chain and returns the new step. */
export type TRequestInterceptor = (next: TRequestHandler) => TRequestHandler
/** Wraps the next step of the response chain and returns the new step. */
export type TResponseInterceptor = (next: TResponseHandler) => TResponseHandler

export type TRetryOptions = {
  /** Additional attempts after the first one. */
  maxRetries: number
  /** Delay before the first retry; doubles on each further retry. */
  initialDelayMs: number
}

export type TRawResponse = {
  status: number
  headers: Headers
  body: Uint8Array
}

export type TApiResponse<T> = {
  data: T | undefined
  response: TRawResponse
}
