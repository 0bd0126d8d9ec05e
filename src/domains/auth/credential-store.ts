import { AbortOperationError } from '../../core/errors.ts'
import { noopLogger, type TLogger } from '../../core/logger.ts'
import type { TCredential, TCredentialProvider } from '../../core/types.ts'
import type { TTokenApi } from './types.ts'
import type { TTokenGrant } from './token.api.ts'

/** A credential this close to expiry is already treated as expired. */
export const EXPIRY_SKEW_MS = 30_000

export type TCredentialStoreOptions = {
  tokenApi: TTokenApi
  logger?: TLogger
}

/**
 * Owns the bearer credential of one client.
 *
 * - Acquire and refresh run one at a time: each waits for the previous
 *   negotiation, network call included, before starting.
 * - `getValidToken` reads the cache without waiting; on a miss it queues
 *   behind any in-flight negotiation and re-checks the cache first, so
 *   concurrent callers share one grant.
 * - A failed refresh leaves the previous credential in place.
 * - Nothing is retried here. Retries belong to the request pipeline.
 */
export class CredentialStore implements TCredentialProvider {
  private readonly tokenApi: TTokenApi
  private readonly logger: TLogger

  private credential: TCredential | null = null
  private negotiationTail: Promise<void> = Promise.resolve()

  constructor(options: TCredentialStoreOptions) {
    this.tokenApi = options.tokenApi
    this.logger = options.logger ?? noopLogger
  }

  /** Performs a client_credentials grant and stores the result. */
  acquire(signal?: AbortSignal): Promise<TCredential> {
    return this.exclusive(() => this.acquireUnlocked(signal))
  }

  /** Performs a refresh_token grant, or a client_credentials grant when there is nothing to refresh. */
  refresh(signal?: AbortSignal): Promise<TCredential> {
    return this.exclusive(() => this.refreshUnlocked(signal))
  }

  /** Returns the cached credential, refreshing it first when missing or inside the skew window. */
  async getValidToken(signal?: AbortSignal): Promise<TCredential> {
    if (signal?.aborted) throw new AbortOperationError('Token negotiation aborted')

    const cached = this.validCredential()
    if (cached) return cached

    return this.exclusive(async () => {
      const negotiatedMeanwhile = this.validCredential()
      if (negotiatedMeanwhile) return negotiatedMeanwhile
      return this.refreshUnlocked(signal)
    })
  }

  async getBearerHeader(signal?: AbortSignal): Promise<string> {
    const credential = await this.getValidToken(signal)
    return `Bearer ${credential.accessToken}`
  }

  /** True when there is no credential or it expires within EXPIRY_SKEW_MS. No network calls. */
  isExpired(): boolean {
    return this.isExpiredAt(Date.now())
  }

  /** Copy of the stored credential, or null. */
  getCredential(): TCredential | null {
    return this.credential ? { ...this.credential } : null
  }

  /** Replaces the stored credential. Intended for tests and diagnostics. */
  setCredential(credential: TCredential | null): void {
    this.credential = credential ? { ...credential } : null
  }

  private validCredential(): TCredential | null {
    if (this.isExpiredAt(Date.now())) return null
    return this.getCredential()
  }

  private isExpiredAt(nowMs: number): boolean {
    if (!this.credential || !this.credential.expiresAt) return true
    return nowMs + EXPIRY_SKEW_MS >= this.credential.expiresAt
  }

  private acquireUnlocked(signal?: AbortSignal): Promise<TCredential> {
    this.logger.debug('Acquiring access token (client_credentials)')
    return this.negotiate({ grantType: 'client_credentials' }, signal)
  }

  private refreshUnlocked(signal?: AbortSignal): Promise<TCredential> {
    const refreshToken = this.credential?.refreshToken
    if (!refreshToken) return this.acquireUnlocked(signal)

    this.logger.debug('Refreshing access token (refresh_token)')
    return this.negotiate({ grantType: 'refresh_token', refreshToken }, signal)
  }

  private async negotiate(grant: TTokenGrant, signal?: AbortSignal): Promise<TCredential> {
    if (signal?.aborted) throw new AbortOperationError('Token negotiation aborted')

    const response = await this.tokenApi.requestToken(grant, signal)
    this.credential = {
      accessToken: response.accessToken,
      refreshToken: response.refreshToken,
      tokenType: response.tokenType,
      expiresIn: response.expiresIn,
      scope: response.scope,
      expiresAt: Date.now() + response.expiresIn * 1000,
    }
    return { ...this.credential }
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.negotiationTail.then(work)
    this.negotiationTail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }
}
