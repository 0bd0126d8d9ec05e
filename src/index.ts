// Main client
export { GpuCloud } from './client/gpu-cloud.ts'
export type { TGpuCloudOptions } from './core/config.ts'
export { resolveConfig } from './core/config.ts'

// Transport core (for custom pipelines / advanced usage)
export { Dispatcher } from './core/dispatcher.ts'
export type { TDispatcherOptions } from './core/dispatcher.ts'
export { MiddlewareRegistry } from './core/middleware/registry.ts'
export type { TMiddlewareSnapshot } from './core/middleware/registry.ts'
export { buildChain } from './core/middleware/chain.ts'
export {
  authentication,
  contentType,
  createDefaultInterceptors,
  errorClassification,
  jsonContentType,
  requestLogging,
  responseLogging,
  retry,
  userAgent,
} from './core/middleware/interceptors.ts'
export {
  computeBackoffDelay,
  JITTER_PERCENT,
  MAX_RETRY_DELAY_MS,
  runWithRetry,
  shouldRetry,
} from './core/retry.ts'
export { CredentialStore, EXPIRY_SKEW_MS } from './domains/auth/credential-store.ts'
export { TokenApi } from './domains/auth/token.api.ts'
export type { TTokenApiOptions, TTokenGrant, TTokenResponse } from './domains/auth/token.api.ts'

// Resources
export { BalanceApi } from './domains/balance/balance.api.ts'
export type { TBalance } from './domains/balance/balance.api.ts'

// Logging
export { createConsoleLogger, noopLogger } from './core/logger.ts'
export type { TLogger } from './core/logger.ts'
export { SDK_NAME, SDK_VERSION, USER_AGENT, buildUserAgent } from './core/sdk-info.ts'

// Errors
export {
  ConfigurationError,
  AuthError,
  APIError,
  TransportError,
  TimeoutError,
  AbortOperationError,
  DecodeError,
  RetryExhaustedError,
} from './core/errors.ts'

// Types
export type {
  THttpMethod,
  TQueryParams,
  TRequestOptions,
  TCredential,
  TCredentialProvider,
  TClientHandle,
  TRequestContext,
  TResponseContext,
  TRequestHandler,
  TResponseHandler,
  TRequestInterceptor,
  TResponseInterceptor,
  TRetryOptions,
  TRawResponse,
  TApiResponse,
} from './core/types.ts'
