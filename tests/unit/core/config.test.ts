import { describe, expect, it } from 'vitest'
import { resolveConfig } from '../../../src/core/config.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { createMockLogger, TEST_CONFIG } from '../../helpers/index.ts'
import { noopLogger } from '../../../src/core/logger.ts'
import { USER_AGENT } from '../../../src/core/sdk-info.ts'

const emptyEnv: NodeJS.ProcessEnv = {}

describe('resolveConfig', () => {
  it('accepts explicit options and normalizes the base URL', () => {
    const config = resolveConfig({ ...TEST_CONFIG, baseUrl: `${TEST_CONFIG.baseUrl}/` }, emptyEnv)
    expect(config.baseUrl).toBe(TEST_CONFIG.baseUrl)
    expect(config.clientId).toBe(TEST_CONFIG.clientId)
    expect(config.timeoutMs).toBe(30_000)
    expect(config.debug).toBe(false)
    expect(config.logger).toBe(noopLogger)
    expect(config.userAgent).toBe(USER_AGENT)
  })

  it('falls back to environment variables', () => {
    const config = resolveConfig(
      {},
      {
        GPUCLOUD_BASE_URL: 'https://env.test.com/v1',
        GPUCLOUD_CLIENT_ID: 'env-id',
        GPUCLOUD_CLIENT_SECRET: 'env-secret',
        GPUCLOUD_DEBUG: ' TRUE ',
      },
    )
    expect(config.baseUrl).toBe('https://env.test.com/v1')
    expect(config.clientId).toBe('env-id')
    expect(config.clientSecret).toBe('env-secret')
    expect(config.debug).toBe(true)
    expect(config.logger).not.toBe(noopLogger)
  })

  it('lets explicit options win over the environment', () => {
    const config = resolveConfig(
      { ...TEST_CONFIG, debug: false },
      { GPUCLOUD_CLIENT_ID: 'env-id', GPUCLOUD_DEBUG: 'true' },
    )
    expect(config.clientId).toBe(TEST_CONFIG.clientId)
    expect(config.debug).toBe(false)
  })

  it('keeps a caller logger', () => {
    const logger = createMockLogger()
    expect(resolveConfig({ ...TEST_CONFIG, logger, debug: true }, emptyEnv).logger).toBe(logger)
  })

  it('prepends the caller user agent', () => {
    expect(resolveConfig({ ...TEST_CONFIG, userAgent: 'fleet/3' }, emptyEnv).userAgent).toBe(
      `fleet/3 ${USER_AGENT}`,
    )
  })

  it('rejects missing credentials', () => {
    expect(() => resolveConfig({ baseUrl: TEST_CONFIG.baseUrl }, emptyEnv)).toThrow(
      new ConfigurationError('clientId must be a non-empty string'),
    )
    expect(() =>
      resolveConfig({ baseUrl: TEST_CONFIG.baseUrl, clientId: 'id' }, emptyEnv),
    ).toThrow(new ConfigurationError('clientSecret must be a non-empty string'))
  })

  it('rejects a missing or unparseable base URL', () => {
    expect(() => resolveConfig({ clientId: 'id', clientSecret: 's' }, emptyEnv)).toThrow(
      'baseUrl must be a non-empty string',
    )
    expect(() => resolveConfig({ ...TEST_CONFIG, baseUrl: 'not a url' }, emptyEnv)).toThrow(
      'Invalid baseUrl: "not a url"',
    )
  })

  it('rejects a non-positive timeout', () => {
    expect(() => resolveConfig({ ...TEST_CONFIG, timeoutMs: 0 }, emptyEnv)).toThrow(
      'timeoutMs must be a positive number',
    )
  })

  it('validates retry options', () => {
    expect(() =>
      resolveConfig({ ...TEST_CONFIG, retry: { maxRetries: -1, initialDelayMs: 10 } }, emptyEnv),
    ).toThrow('retry.maxRetries must be a non-negative integer')
    expect(() =>
      resolveConfig({ ...TEST_CONFIG, retry: { maxRetries: 1.5, initialDelayMs: 10 } }, emptyEnv),
    ).toThrow('retry.maxRetries must be a non-negative integer')
    expect(() =>
      resolveConfig({ ...TEST_CONFIG, retry: { maxRetries: 2, initialDelayMs: -5 } }, emptyEnv),
    ).toThrow('retry.initialDelayMs must be a non-negative number')
    expect(
      resolveConfig({ ...TEST_CONFIG, retry: { maxRetries: 0, initialDelayMs: 0 } }, emptyEnv).retry,
    ).toEqual({ maxRetries: 0, initialDelayMs: 0 })
  })
})
