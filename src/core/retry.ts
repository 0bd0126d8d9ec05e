import { randomInt } from 'crypto'
import {
  AbortOperationError,
  APIError,
  DecodeError,
  describeCauseChain,
  findInCauseChain,
  RetryExhaustedError,
} from './errors.ts'
import { noopLogger, type TLogger } from './logger.ts'
import type { TRetryOptions } from './types.ts'

export const MAX_RETRY_DELAY_MS = 30_000
export const JITTER_PERCENT = 0.5

const RANDOM_RESOLUTION = 2 ** 47

const RETRYABLE_STATUS_CODES = new Set([500, 502, 503, 504, 429, 408])
const NON_RETRYABLE_STATUS_CODES = new Set([400, 401, 403, 404])

// Message patterns are a fallback for errors without a status code. The
// non-retryable list is checked first.
const NON_RETRYABLE_PATTERNS = [
  'authentication',
  'unauthorized',
  'forbidden',
  'not found',
  'invalid',
  'bad request',
]
const RETRYABLE_PATTERNS = ['timeout', 'connection', 'temporary', 'rate limit', 'too many requests']

/** Uniform in [0, 1), drawn from the crypto RNG rather than Math.random. */
export function cryptoRandom(): number {
  return randomInt(RANDOM_RESOLUTION) / RANDOM_RESOLUTION
}

/**
 * Delay before retry number `attemptIndex` (1 for the first retry):
 * initialDelayMs * 2^(attemptIndex-1), capped at MAX_RETRY_DELAY_MS, then scaled by
 * a factor drawn from [1 - JITTER_PERCENT, 1 + JITTER_PERCENT).
 */
export function computeBackoffDelay(
  attemptIndex: number,
  initialDelayMs: number,
  random: () => number = cryptoRandom,
): number {
  const exponential = initialDelayMs * Math.pow(2, Math.max(0, attemptIndex - 1))
  const capped = Math.min(exponential, MAX_RETRY_DELAY_MS)
  const jitter = (random() * 2 - 1) * JITTER_PERCENT
  return capped * (1 + jitter)
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortOperationError())
      return
    }

    let onAbort: (() => void) | undefined

    const timeoutId = setTimeout(() => {
      if (onAbort) signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    timeoutId.unref()

    if (signal) {
      onAbort = () => {
        clearTimeout(timeoutId)
        reject(new AbortOperationError())
      }
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })
}

/** Decides whether a failed attempt is worth repeating. */
export function shouldRetry(error: unknown): boolean {
  if (error === undefined || error === null) return false
  if (
    error instanceof AbortOperationError ||
    error instanceof DecodeError ||
    error instanceof RetryExhaustedError
  ) {
    return false
  }

  const apiError = findInCauseChain(error, APIError)
  if (apiError) {
    const { statusCode } = apiError
    if (RETRYABLE_STATUS_CODES.has(statusCode)) return true
    if (NON_RETRYABLE_STATUS_CODES.has(statusCode)) return false
    if (statusCode >= 500 && statusCode < 600) return true
    if (statusCode >= 400 && statusCode < 500) return false
  }

  const message = describeCauseChain(error).toLowerCase()
  if (NON_RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) return false
  if (RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern))) return true

  return false
}

export type TRetryRunOptions = TRetryOptions & {
  logger?: TLogger
  signal?: AbortSignal
  /** Names the operation in debug lines, e.g. `GET /balance`. */
  label?: string
  random?: () => number
}

/**
 * Runs `step` until it succeeds, fails with a non-retryable error, or the retries
 * run out. Non-retryable errors are rethrown as they are; exhaustion throws a
 * RetryExhaustedError carrying the last failure as `cause`.
 */
export async function runWithRetry<T>(
  step: (attemptIndex: number) => Promise<T>,
  options: TRetryRunOptions,
): Promise<T> {
  const logger = options.logger ?? noopLogger
  const label = options.label ?? 'operation'
  const totalAttempts = options.maxRetries + 1
  let lastError: unknown

  for (let attemptIndex = 0; attemptIndex < totalAttempts; attemptIndex++) {
    if (attemptIndex > 0) {
      const delay = computeBackoffDelay(attemptIndex, options.initialDelayMs, options.random)
      logger.debug(
        `Retrying ${label} (attempt ${attemptIndex + 1}/${totalAttempts}) after ${Math.round(delay)}ms`,
      )
      await sleep(delay, options.signal)
    }

    if (options.signal?.aborted) throw new AbortOperationError()

    try {
      return await step(attemptIndex)
    } catch (error) {
      lastError = error
      if (!shouldRetry(error)) {
        logger.debug(`${label} failed with non-retryable error:`, error)
        throw error
      }
    }
  }

  throw new RetryExhaustedError(totalAttempts, lastError)
}
