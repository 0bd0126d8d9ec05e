import { STATUS_CODES } from 'http'
import {
  AbortOperationError,
  APIError,
  AuthError,
  findInCauseChain,
  parseErrorEnvelope,
} from '../errors.ts'
import type { TLogger } from '../logger.ts'
import { runWithRetry } from '../retry.ts'
import type { TRequestInterceptor, TResponseInterceptor, TRetryOptions } from '../types.ts'

const textDecoder = new TextDecoder()

/** Sets `Authorization` from the owning client's credential store. */
export function authentication(): TRequestInterceptor {
  return (next) => async (ctx) => {
    let bearer: string
    try {
      bearer = await ctx.client.credentials.getBearerHeader(ctx.signal)
    } catch (error) {
      if (error instanceof AbortOperationError) throw error
      const detail = error instanceof Error ? error.message : String(error)
      throw new AuthError(`failed to get authentication token: ${detail}`, { cause: error })
    }
    if (!bearer) throw new AuthError('empty authentication token')

    ctx.headers.set('Authorization', bearer)
    await next(ctx)
  }
}

/** Sets `Content-Type` on requests that carry a body. */
export function contentType(value: string): TRequestInterceptor {
  return (next) => async (ctx) => {
    if (ctx.body !== undefined) ctx.headers.set('Content-Type', value)
    await next(ctx)
  }
}

export function jsonContentType(): TRequestInterceptor {
  return contentType('application/json')
}

export function userAgent(value: string): TRequestInterceptor {
  return (next) => async (ctx) => {
    ctx.headers.set('User-Agent', value)
    await next(ctx)
  }
}

/**
 * Re-runs everything it wraps on transient failures. Register it before
 * `authentication()` so each attempt resolves the token again.
 */
export function retry(options: TRetryOptions & { logger?: TLogger }): TRequestInterceptor {
  return (next) => (ctx) =>
    runWithRetry(() => next(ctx), {
      maxRetries: options.maxRetries,
      initialDelayMs: options.initialDelayMs,
      logger: options.logger ?? ctx.client.logger,
      signal: ctx.signal,
      label: `${ctx.method} ${ctx.path}`,
    })
}

export function requestLogging(logger?: TLogger): TRequestInterceptor {
  return (next) => async (ctx) => {
    const log = logger ?? ctx.client.logger
    const startedAt = Date.now()
    log.debug(`Starting ${ctx.method} request to ${ctx.path}`)
    try {
      await next(ctx)
    } catch (error) {
      log.debug(`Request ${ctx.method} ${ctx.path} failed after ${Date.now() - startedAt}ms:`, error)
      throw error
    }
    log.debug(`Request ${ctx.method} ${ctx.path} completed in ${Date.now() - startedAt}ms`)
  }
}

/**
 * Guarantees that a non-2xx response carries an APIError. One decoded by an
 * earlier step, possibly wrapped, is left alone.
 */
export function errorClassification(): TResponseInterceptor {
  return (next) => async (ctx) => {
    const failed = ctx.status < 200 || ctx.status >= 300
    if (failed && !findInCauseChain(ctx.error, APIError)) {
      const text = textDecoder.decode(ctx.body)
      ctx.error = text.trim()
        ? parseErrorEnvelope(ctx.status, text)
        : new APIError({
            statusCode: ctx.status,
            message: STATUS_CODES[ctx.status] ?? `HTTP ${ctx.status}`,
          })
    }
    await next(ctx)
  }
}

export function responseLogging(logger?: TLogger): TResponseInterceptor {
  return (next) => async (ctx) => {
    const log = logger ?? ctx.request.client.logger
    log.debug(
      `Response for ${ctx.request.method} ${ctx.request.path}: status ${ctx.status}, body length ${ctx.body.byteLength} bytes`,
    )
    if (ctx.error) log.debug('Response error:', ctx.error)
    await next(ctx)
  }
}

export type TDefaultInterceptorOptions = {
  userAgent: string
  /** Appends the logging interceptors to both chains. */
  verbose?: boolean
  /** Registers the retry interceptor first, outside authentication. */
  retry?: TRetryOptions
  logger?: TLogger
}

/**
 * Request: [retry?, authentication, JSON content-type, user-agent, logging?].
 * Response: [error classification, logging?].
 */
export function createDefaultInterceptors(options: TDefaultInterceptorOptions): {
  request: TRequestInterceptor[]
  response: TResponseInterceptor[]
} {
  const request: TRequestInterceptor[] = [
    authentication(),
    jsonContentType(),
    userAgent(options.userAgent),
  ]
  const response: TResponseInterceptor[] = [errorClassification()]

  if (options.retry) {
    request.unshift(retry({ ...options.retry, logger: options.logger }))
  }
  if (options.verbose) {
    request.push(requestLogging(options.logger))
    response.push(responseLogging(options.logger))
  }

  return { request, response }
}
