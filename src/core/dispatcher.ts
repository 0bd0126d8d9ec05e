import {
  AbortOperationError,
  type APIError,
  DecodeError,
  parseErrorEnvelope,
  TimeoutError,
  TransportError,
} from './errors.ts'
import { buildChain, passThrough } from './middleware/chain.ts'
import type { MiddlewareRegistry } from './middleware/registry.ts'
import type {
  TApiResponse,
  TClientHandle,
  THttpMethod,
  TRawResponse,
  TRequestContext,
  TRequestOptions,
  TResponseContext,
} from './types.ts'
import { createTimeoutSignal, isAbortError, normalizeBaseUrl, resolveFetch } from './utils.ts'

const DEFAULT_TIMEOUT_IN_MILLISECONDS = 30_000

const textDecoder = new TextDecoder()

function causeChainIncludes(error: unknown, target: Error): boolean {
  const seen = new Set<unknown>()
  let current: unknown = error
  while (current instanceof Error && !seen.has(current)) {
    if (current === target) return true
    seen.add(current)
    current = current.cause
  }
  return false
}

export type TDispatcherOptions = {
  baseUrl: string
  client: TClientHandle
  middleware: MiddlewareRegistry
  timeoutInMilliseconds?: number
  fetchImplementation?: typeof fetch
}

/**
 * The one generic HTTP primitive behind every resource method.
 *
 * Each call snapshots the middleware registry, runs the request chain around the
 * network call, decodes the body, then runs the response chain. The network call is
 * the terminal step of the request chain, so a retry interceptor repeats it.
 */
export class Dispatcher {
  private readonly baseUrl: string
  private readonly client: TClientHandle
  private readonly middleware: MiddlewareRegistry
  private readonly timeoutInMilliseconds: number
  private readonly fetchImplementation: typeof fetch

  constructor(options: TDispatcherOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl)
    this.client = options.client
    this.middleware = options.middleware
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  async request<TResponse>(
    httpMethod: THttpMethod,
    path: string,
    requestOptions: TRequestOptions = {},
  ): Promise<TApiResponse<TResponse>> {
    const { request: requestInterceptors, response: responseInterceptors } =
      this.middleware.snapshot()

    const requestContext: TRequestContext = {
      method: httpMethod,
      path,
      headers: new Headers(requestOptions.headers),
      query: new URLSearchParams(),
      body: requestOptions.body,
      signal: requestOptions.signal,
      client: this.client,
    }
    for (const [queryKey, queryValue] of Object.entries(requestOptions.query ?? {})) {
      if (queryValue !== undefined) requestContext.query.set(queryKey, String(queryValue))
    }

    // Outcome of the latest attempt only.
    const exchange: { response?: TRawResponse; error?: APIError } = {}
    const send = async (ctx: TRequestContext): Promise<void> => {
      exchange.response = undefined
      exchange.error = undefined
      const rawResponse = await this.send(ctx)
      exchange.response = rawResponse
      if (rawResponse.status < 200 || rawResponse.status >= 300) {
        exchange.error = parseErrorEnvelope(rawResponse.status, textDecoder.decode(rawResponse.body))
        throw exchange.error
      }
    }

    let requestError: Error | null = null
    try {
      await buildChain(requestInterceptors, send)(requestContext)
    } catch (error) {
      // Only the status error of the latest response, possibly wrapped by retry, reaches the
      // response chain. Anything else (auth, transport, abort) failed without a response of its own.
      if (!exchange.response || !exchange.error || !causeChainIncludes(error, exchange.error)) {
        throw error
      }
      requestError = error instanceof Error ? error : new Error(String(error))
    }
    const rawResponse = exchange.response
    if (!rawResponse) {
      throw new TransportError(`request chain for ${httpMethod} ${path} completed without sending`)
    }

    let data: TResponse | undefined
    if (!requestError) {
      try {
        data = this.decodeBody<TResponse>(rawResponse.body)
      } catch (error) {
        requestError = new DecodeError(`failed to decode response for ${httpMethod} ${path}`, {
          cause: error,
        })
      }
    }

    const responseContext: TResponseContext = {
      request: requestContext,
      status: rawResponse.status,
      headers: rawResponse.headers,
      body: rawResponse.body,
      error: requestError,
    }
    await buildChain(responseInterceptors, passThrough)(responseContext)

    if (responseContext.error) throw responseContext.error
    return { data, response: rawResponse }
  }

  async get<TResponse>(path: string, options?: Omit<TRequestOptions, 'body'>): Promise<TResponse> {
    const response = await this.request<TResponse>('GET', path, options)
    return this.requireData(response, 'GET', path)
  }

  async post<TResponse>(path: string, body?: unknown, options?: TRequestOptions): Promise<TResponse> {
    const response = await this.request<TResponse>('POST', path, { ...options, body })
    return this.requireData(response, 'POST', path)
  }

  async put<TResponse>(path: string, body?: unknown, options?: TRequestOptions): Promise<TResponse> {
    const response = await this.request<TResponse>('PUT', path, { ...options, body })
    return this.requireData(response, 'PUT', path)
  }

  async delete<TResponse>(path: string, options?: TRequestOptions): Promise<TResponse> {
    const response = await this.request<TResponse>('DELETE', path, options)
    return this.requireData(response, 'DELETE', path)
  }

  /** DELETE whose response body, if any, is not needed. */
  async deleteNoResult(path: string, options?: TRequestOptions): Promise<void> {
    await this.request<unknown>('DELETE', path, options)
  }

  /** Terminal step: one network round trip with the headers the chain produced. */
  private async send(ctx: TRequestContext): Promise<TRawResponse> {
    const urlObject = new URL(this.baseUrl + ctx.path)
    for (const [queryKey, queryValue] of ctx.query) {
      urlObject.searchParams.append(queryKey, queryValue)
    }

    if (ctx.signal?.aborted) throw new AbortOperationError()

    const timeout = createTimeoutSignal(this.timeoutInMilliseconds, ctx.signal)
    try {
      const httpResponse = await this.fetchImplementation(urlObject, {
        method: ctx.method,
        headers: new Headers(ctx.headers),
        body: ctx.body === undefined ? undefined : JSON.stringify(ctx.body),
        signal: timeout.signal,
      })
      const body = new Uint8Array(await httpResponse.arrayBuffer())
      return { status: httpResponse.status, headers: httpResponse.headers, body }
    } catch (error) {
      if (isAbortError(error)) {
        if (timeout.timedOut()) {
          throw new TimeoutError(
            `request timeout after ${this.timeoutInMilliseconds}ms for ${ctx.method} ${ctx.path}`,
            { cause: error },
          )
        }
        throw new AbortOperationError()
      }
      const detail = error instanceof Error ? error.message : String(error)
      throw new TransportError(`connection failed for ${ctx.method} ${ctx.path}: ${detail}`, {
        cause: error,
      })
    } finally {
      timeout.cleanup()
    }
  }

  /** Blank bodies decode to undefined. The caller's type parameter describes the JSON. */
  private decodeBody<TResponse>(body: Uint8Array): TResponse | undefined {
    const text = textDecoder.decode(body).trim()
    if (!text) return undefined
    const decoded: TResponse = JSON.parse(text)
    return decoded
  }

  private requireData<TResponse>(
    response: TApiResponse<TResponse>,
    httpMethod: THttpMethod,
    path: string,
  ): TResponse {
    if (response.data === undefined) {
      throw new DecodeError(`empty response body for ${httpMethod} ${path}`)
    }
    return response.data
  }
}
