import { describe, expect, it } from 'vitest'
import type { TRequestInterceptor, TResponseInterceptor } from '../../../src/core/types.ts'
import {
  createMockLogger,
  createTestClient,
  makeBalance,
  queueToken,
  TEST_CONFIG,
} from '../../helpers/index.ts'

const traceHeader: TRequestInterceptor = (next) => async (ctx) => {
  ctx.headers.set('X-Trace-Id', 'trace-1')
  await next(ctx)
}

describe('GpuCloud interceptors', () => {
  it('runs an added request interceptor after the defaults', async () => {
    const { client, fetchMock } = createTestClient()
    client.addRequestInterceptor(traceHeader)
    queueToken(fetchMock, 't1')
    fetchMock.pushJson(makeBalance())

    await client.balance.getBalance()

    const apiCall = fetchMock.calls[1]
    expect(apiCall.headers.get('X-Trace-Id')).toBe('trace-1')
    expect(apiCall.headers.get('Authorization')).toBe('Bearer t1')
    expect(client.middleware.count()).toEqual({ request: 4, response: 1 })
  })

  it('sends no credentials once the request chain is replaced', async () => {
    const { client, fetchMock } = createTestClient()
    client.setRequestInterceptors([traceHeader])
    fetchMock.pushJson(makeBalance())

    await client.balance.getBalance()

    expect(fetchMock.calls).toHaveLength(1)
    expect(fetchMock.calls[0].headers.has('Authorization')).toBe(false)
    expect(fetchMock.calls[0].headers.get('X-Trace-Id')).toBe('trace-1')
  })

  it('takes replacement chains from the options', async () => {
    const { client, fetchMock } = createTestClient({ requestInterceptors: [], responseInterceptors: [] })
    fetchMock.pushJson(makeBalance())

    await client.balance.getBalance()

    expect(client.middleware.count()).toEqual({ request: 0, response: 0 })
    expect(fetchMock.calls[0].url).toBe(`${TEST_CONFIG.baseUrl}/balance`)
  })

  it('lets a response interceptor observe the status', async () => {
    const { client, fetchMock } = createTestClient()
    const seen: number[] = []
    const recordStatus: TResponseInterceptor = (next) => async (ctx) => {
      seen.push(ctx.status)
      await next(ctx)
    }
    client.addResponseInterceptor(recordStatus)
    queueToken(fetchMock)
    fetchMock.pushJson(makeBalance())

    await client.balance.getBalance()

    expect(seen).toEqual([200])
  })

  it('clears both chains', () => {
    const { client } = createTestClient()
    client.clearRequestInterceptors()
    client.clearResponseInterceptors()
    expect(client.middleware.count()).toEqual({ request: 0, response: 0 })
  })

  it('adds logging interceptors in debug mode', async () => {
    const logger = createMockLogger()
    const { client, fetchMock } = createTestClient({ debug: true, logger })
    queueToken(fetchMock)
    fetchMock.pushJson({ amount: 1, currency: 'usd' })

    await client.balance.getBalance()

    expect(client.middleware.count()).toEqual({ request: 4, response: 2 })
    expect(logger.debug).toHaveBeenCalledWith('Acquiring access token (client_credentials)')
    expect(logger.debug).toHaveBeenCalledWith('Starting GET request to /balance')
    expect(logger.debug).toHaveBeenCalledWith(
      'Response for GET /balance: status 200, body length 29 bytes',
    )
  })
})
