import { resolveConfig, type TGpuCloudOptions } from '../core/config.ts'
import { Dispatcher } from '../core/dispatcher.ts'
import type { TLogger } from '../core/logger.ts'
import { createDefaultInterceptors } from '../core/middleware/interceptors.ts'
import { MiddlewareRegistry } from '../core/middleware/registry.ts'
import type {
  TApiResponse,
  TClientHandle,
  THttpMethod,
  TRequestInterceptor,
  TRequestOptions,
  TResponseInterceptor,
} from '../core/types.ts'
import { CredentialStore } from '../domains/auth/credential-store.ts'
import { TokenApi } from '../domains/auth/token.api.ts'
import { BalanceApi } from '../domains/balance/balance.api.ts'

/**
 * Public SDK surface for the GPU cloud API.
 *
 * Each instance owns its credential store and middleware registry; nothing is
 * shared between clients.
 *
 * @example
 * ```typescript
 * const client = new GpuCloud({
 *   baseUrl: 'https://api.example.com/v1',
 *   clientId: 'my-client-id',
 *   clientSecret: 'my-client-secret',
 *   retry: { maxRetries: 3, initialDelayMs: 200 },
 * })
 *
 * const balance = await client.balance.getBalance()
 * ```
 */
export class GpuCloud implements TClientHandle {
  public readonly credentials: CredentialStore
  public readonly middleware: MiddlewareRegistry
  public readonly logger: TLogger
  public readonly userAgent: string
  public readonly balance: BalanceApi

  private readonly dispatcher: Dispatcher

  constructor(options?: TGpuCloudOptions, env: NodeJS.ProcessEnv = process.env) {
    const config = resolveConfig(options, env)
    this.logger = config.logger
    this.userAgent = config.userAgent

    const tokenApi = new TokenApi({
      baseUrl: config.baseUrl,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      authBearerToken: config.authBearerToken,
      timeoutMs: config.timeoutMs,
      fetchImplementation: config.fetchImplementation,
      logger: config.logger,
    })
    this.credentials = new CredentialStore({ tokenApi, logger: config.logger })

    const defaults = createDefaultInterceptors({
      userAgent: config.userAgent,
      verbose: config.debug,
      retry: config.retry,
      logger: config.logger,
    })
    this.middleware = new MiddlewareRegistry(
      config.requestInterceptors ?? defaults.request,
      config.responseInterceptors ?? defaults.response,
    )

    this.dispatcher = new Dispatcher({
      baseUrl: config.baseUrl,
      client: this,
      middleware: this.middleware,
      timeoutInMilliseconds: config.timeoutMs,
      fetchImplementation: config.fetchImplementation,
    })

    this.balance = new BalanceApi({ dispatcher: this.dispatcher })
  }

  /** Full request: decoded data (undefined for blank bodies) plus the raw response. */
  public request<T>(
    method: THttpMethod,
    path: string,
    options?: TRequestOptions,
  ): Promise<TApiResponse<T>> {
    return this.dispatcher.request<T>(method, path, options)
  }

  public get<T>(path: string, options?: Omit<TRequestOptions, 'body'>): Promise<T> {
    return this.dispatcher.get<T>(path, options)
  }

  public post<T>(path: string, body?: unknown, options?: TRequestOptions): Promise<T> {
    return this.dispatcher.post<T>(path, body, options)
  }

  public put<T>(path: string, body?: unknown, options?: TRequestOptions): Promise<T> {
    return this.dispatcher.put<T>(path, body, options)
  }

  public delete<T>(path: string, options?: TRequestOptions): Promise<T> {
    return this.dispatcher.delete<T>(path, options)
  }

  public deleteNoResult(path: string, options?: TRequestOptions): Promise<void> {
    return this.dispatcher.deleteNoResult(path, options)
  }

  public addRequestInterceptor(interceptor: TRequestInterceptor): void {
    this.middleware.addRequestInterceptor(interceptor)
  }

  public addResponseInterceptor(interceptor: TResponseInterceptor): void {
    this.middleware.addResponseInterceptor(interceptor)
  }

  public setRequestInterceptors(interceptors: TRequestInterceptor[]): void {
    this.middleware.setRequestInterceptors(interceptors)
  }

  public setResponseInterceptors(interceptors: TResponseInterceptor[]): void {
    this.middleware.setResponseInterceptors(interceptors)
  }

  public clearRequestInterceptors(): void {
    this.middleware.clearRequestInterceptors()
  }

  public clearResponseInterceptors(): void {
    this.middleware.clearResponseInterceptors()
  }
}
