export * from './constants.ts'
export * from './client.ts'
export * from './context.ts'
export * from './factories.ts'
export * from './mocks/fetch.mock.ts'
export * from './mocks/token-api.mock.ts'
export * from './mocks/logger.mock.ts'
