import { ConfigurationError } from './errors.ts'
import { createConsoleLogger, noopLogger, type TLogger } from './logger.ts'
import { buildUserAgent } from './sdk-info.ts'
import type { TRequestInterceptor, TResponseInterceptor, TRetryOptions } from './types.ts'
import { normalizeBaseUrl, validateRequiredStrings } from './utils.ts'

const DEFAULT_TIMEOUT_MS = 30_000

export const ENV_BASE_URL = 'GPUCLOUD_BASE_URL'
export const ENV_CLIENT_ID = 'GPUCLOUD_CLIENT_ID'
export const ENV_CLIENT_SECRET = 'GPUCLOUD_CLIENT_SECRET'
export const ENV_DEBUG = 'GPUCLOUD_DEBUG'

export type TGpuCloudOptions = {
  /** API base URL including the version prefix. Falls back to GPUCLOUD_BASE_URL. */
  baseUrl?: string
  /** OAuth2 client ID. Falls back to GPUCLOUD_CLIENT_ID. */
  clientId?: string
  /** OAuth2 client secret. Falls back to GPUCLOUD_CLIENT_SECRET. */
  clientSecret?: string
  /** Static bearer token sent to the token endpoint, for gateways that add their own auth. */
  authBearerToken?: string
  /** Product token prepended to the SDK's User-Agent. */
  userAgent?: string
  logger?: TLogger
  /** Debug logging plus logging interceptors. Falls back to GPUCLOUD_DEBUG=true. */
  debug?: boolean
  /** Enables retries around the whole request chain. */
  retry?: TRetryOptions
  /** Per-request timeout in ms. @default 30000 */
  timeoutMs?: number
  fetchImplementation?: typeof fetch
  /** Replaces the default request chain. */
  requestInterceptors?: TRequestInterceptor[]
  /** Replaces the default response chain. */
  responseInterceptors?: TResponseInterceptor[]
}

export type TResolvedConfig = {
  baseUrl: string
  clientId: string
  clientSecret: string
  authBearerToken?: string
  userAgent: string
  logger: TLogger
  debug: boolean
  retry?: TRetryOptions
  timeoutMs: number
  fetchImplementation?: typeof fetch
  requestInterceptors?: TRequestInterceptor[]
  responseInterceptors?: TResponseInterceptor[]
}

function envFlag(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === 'true'
}

function validateRetry(retry: TRetryOptions): void {
  if (!Number.isInteger(retry.maxRetries) || retry.maxRetries < 0) {
    throw new ConfigurationError('retry.maxRetries must be a non-negative integer')
  }
  if (!Number.isFinite(retry.initialDelayMs) || retry.initialDelayMs < 0) {
    throw new ConfigurationError('retry.initialDelayMs must be a non-negative number')
  }
}

/** Merges explicit options with environment fallbacks and validates the result. */
export function resolveConfig(
  options: TGpuCloudOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): TResolvedConfig {
  const required = {
    baseUrl: options.baseUrl ?? env[ENV_BASE_URL] ?? '',
    clientId: options.clientId ?? env[ENV_CLIENT_ID] ?? '',
    clientSecret: options.clientSecret ?? env[ENV_CLIENT_SECRET] ?? '',
  }
  validateRequiredStrings(required, ['baseUrl', 'clientId', 'clientSecret'])

  try {
    new URL(required.baseUrl)
  } catch {
    throw new ConfigurationError(`Invalid baseUrl: "${required.baseUrl}"`)
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError('timeoutMs must be a positive number')
  }
  if (options.retry) validateRetry(options.retry)

  const debug = options.debug ?? envFlag(env[ENV_DEBUG])
  const logger = options.logger ?? (debug ? createConsoleLogger({ debug: true }) : noopLogger)

  return {
    baseUrl: normalizeBaseUrl(required.baseUrl),
    clientId: required.clientId,
    clientSecret: required.clientSecret,
    authBearerToken: options.authBearerToken,
    userAgent: buildUserAgent(options.userAgent),
    logger,
    debug,
    retry: options.retry,
    timeoutMs,
    fetchImplementation: options.fetchImplementation,
    requestInterceptors: options.requestInterceptors,
    responseInterceptors: options.responseInterceptors,
  }
}
