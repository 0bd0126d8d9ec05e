import { describe, expect, it } from 'vitest'
import { GpuCloud } from '../../../src/client/gpu-cloud.ts'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { noopLogger } from '../../../src/core/logger.ts'
import { createFetchMock, createTestClient, queueToken, TEST_CONFIG } from '../../helpers/index.ts'

describe('new GpuCloud', () => {
  it('reads missing settings from the environment', () => {
    const client = new GpuCloud(
      { fetchImplementation: createFetchMock().fetch },
      {
        GPUCLOUD_BASE_URL: TEST_CONFIG.baseUrl,
        GPUCLOUD_CLIENT_ID: TEST_CONFIG.clientId,
        GPUCLOUD_CLIENT_SECRET: TEST_CONFIG.clientSecret,
      },
    )
    expect(client.logger).toBe(noopLogger)
    expect(client.credentials.isExpired()).toBe(true)
  })

  it('fails fast on missing credentials', () => {
    expect(() => new GpuCloud({ baseUrl: TEST_CONFIG.baseUrl }, {})).toThrow(ConfigurationError)
  })

  it('keeps clients independent', async () => {
    const a = createTestClient()
    const b = createTestClient()
    queueToken(a.fetchMock, 'token-a')
    queueToken(b.fetchMock, 'token-b')

    const [credA, credB] = await Promise.all([
      a.client.credentials.getValidToken(),
      b.client.credentials.getValidToken(),
    ])

    expect(credA.accessToken).toBe('token-a')
    expect(credB.accessToken).toBe('token-b')
    a.client.addRequestInterceptor((next) => next)
    expect(b.client.middleware.count().request).toBe(3)
  })

  it('exposes the generic request helpers', async () => {
    const { client, fetchMock } = createTestClient()
    queueToken(fetchMock)
    fetchMock.pushJson({ id: 'i-1', status: 'running' })
    fetchMock.push({ status: 204 })

    await expect(client.get('/instances/i-1')).resolves.toEqual({ id: 'i-1', status: 'running' })
    await expect(client.deleteNoResult('/instances/i-1')).resolves.toBeUndefined()
    expect(fetchMock.calls[2].method).toBe('DELETE')
  })
})
