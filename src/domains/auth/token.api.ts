import {
  AbortOperationError,
  APIError,
  AuthError,
  DecodeError,
  parseErrorEnvelope,
  TimeoutError,
  TransportError,
} from '../../core/errors.ts'
import { noopLogger, type TLogger } from '../../core/logger.ts'
import { USER_AGENT } from '../../core/sdk-info.ts'
import { createTimeoutSignal, isAbortError, normalizeBaseUrl, resolveFetch } from '../../core/utils.ts'

const TOKEN_PATH = '/oauth2/token'
const DEFAULT_TIMEOUT_MS = 30_000

export type TTokenApiOptions = {
  /** Base API URL (e.g., https://api.example.com/v1) */
  baseUrl: string
  clientId: string
  clientSecret: string
  /** Extra static bearer token for gateways that wrap the token endpoint in their own auth. */
  authBearerToken?: string
  /** Per-request timeout in ms. @default 30000 */
  timeoutMs?: number
  fetchImplementation?: typeof fetch
  logger?: TLogger
}

export type TTokenGrant =
  | { grantType: 'client_credentials' }
  | { grantType: 'refresh_token'; refreshToken: string }

/** Token endpoint response, camel-cased. */
export type TTokenResponse = {
  accessToken: string
  refreshToken: string
  tokenType: string
  expiresIn: number
  scope: string
}

type TBodyEncoding = 'json' | 'form'

type TWireTokenResponse = {
  access_token?: unknown
  refresh_token?: unknown
  token_type?: unknown
  expires_in?: unknown
  scope?: unknown
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function optionalString(value: unknown): string {
  return typeof value === 'string' ? value : ''
}

/**
 * True when the token endpoint refused the JSON body itself rather than the
 * credentials in it. Such servers only accept form-encoded grants.
 */
export function isJsonBodyRejection(error: unknown): boolean {
  if (!(error instanceof APIError) || error.statusCode !== 400) return false
  const message = error.apiMessage.toLowerCase()
  return (
    (message.includes('grant_type') && message.includes('not specified')) ||
    message.includes('unsupported grant type') ||
    message.includes('not valid json')
  )
}

/**
 * Low-level client for POST /oauth2/token.
 * Sends the grant as JSON first and falls back to form encoding once when the
 * server rejects the JSON shape. Never retries otherwise.
 */
export class TokenApi {
  private readonly tokenEndpoint: string
  private readonly clientId: string
  private readonly clientSecret: string
  private readonly authBearerToken?: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch
  private readonly logger: TLogger

  constructor(options: TTokenApiOptions) {
    this.tokenEndpoint = `${normalizeBaseUrl(options.baseUrl)}${TOKEN_PATH}`
    this.clientId = options.clientId
    this.clientSecret = options.clientSecret
    this.authBearerToken = options.authBearerToken || undefined
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.fetchImpl = resolveFetch(options.fetchImplementation)
    this.logger = options.logger ?? noopLogger
  }

  async requestToken(grant: TTokenGrant, signal?: AbortSignal): Promise<TTokenResponse> {
    const fields = this.buildFields(grant)

    try {
      return await this.post(fields, 'json', signal)
    } catch (jsonError) {
      if (jsonError instanceof AbortOperationError) throw jsonError
      if (!isJsonBodyRejection(jsonError)) {
        throw new AuthError(`authentication failed: ${errorMessage(jsonError)}`, {
          cause: jsonError,
        })
      }

      this.logger.debug(
        `Token endpoint rejected JSON ${grant.grantType} grant, retrying form-encoded`,
      )
      try {
        return await this.post(fields, 'form', signal)
      } catch (formError) {
        if (formError instanceof AbortOperationError) throw formError
        this.logger.debug('Form-encoded token request failed:', formError)
        throw new AuthError(`authentication failed: ${errorMessage(jsonError)}`, {
          cause: jsonError,
        })
      }
    }
  }

  private buildFields(grant: TTokenGrant): Record<string, string> {
    const fields: Record<string, string> = {
      grant_type: grant.grantType,
      client_id: this.clientId,
      client_secret: this.clientSecret,
    }
    if (grant.grantType === 'refresh_token') {
      fields.refresh_token = grant.refreshToken
    }
    return fields
  }

  private async post(
    fields: Record<string, string>,
    encoding: TBodyEncoding,
    signal?: AbortSignal,
  ): Promise<TTokenResponse> {
    const headers: Record<string, string> = {
      'Content-Type': encoding === 'json' ? 'application/json' : 'application/x-www-form-urlencoded',
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    }
    if (this.authBearerToken) {
      headers.Authorization = `Bearer ${this.authBearerToken}`
    }
    const body = encoding === 'json' ? JSON.stringify(fields) : new URLSearchParams(fields).toString()

    const timeout = createTimeoutSignal(this.timeoutMs, signal)
    let status: number
    let text: string
    try {
      const response = await this.fetchImpl(this.tokenEndpoint, {
        method: 'POST',
        headers,
        body,
        signal: timeout.signal,
      })
      status = response.status
      text = await response.text()
    } catch (error) {
      if (isAbortError(error)) {
        if (timeout.timedOut()) {
          throw new TimeoutError(`token request timeout after ${this.timeoutMs}ms`, {
            cause: error,
          })
        }
        throw new AbortOperationError('Token request aborted')
      }
      throw new TransportError(`token request connection failed: ${errorMessage(error)}`, {
        cause: error,
      })
    } finally {
      timeout.cleanup()
    }

    if (status < 200 || status >= 300) {
      throw parseErrorEnvelope(status, text)
    }
    return this.decode(text)
  }

  private decode(text: string): TTokenResponse {
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new DecodeError('failed to decode token response', { cause: error })
    }
    if (typeof parsed !== 'object' || parsed === null) {
      throw new DecodeError('failed to decode token response: not a JSON object')
    }

    const data: TWireTokenResponse = parsed
    if (typeof data.access_token !== 'string' || data.access_token === '') {
      throw new AuthError('Token response missing access_token')
    }
    // expires_in is optional; without it the token counts as already expired.
    const expiresIn = data.expires_in ?? 0
    if (typeof expiresIn !== 'number' || !Number.isFinite(expiresIn) || expiresIn < 0) {
      throw new AuthError('Token response has invalid expires_in')
    }

    return {
      accessToken: data.access_token,
      refreshToken: optionalString(data.refresh_token),
      tokenType: optionalString(data.token_type),
      expiresIn,
      scope: optionalString(data.scope),
    }
  }
}
