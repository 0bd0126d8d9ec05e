import { vi } from 'vitest'
import type { TLogger } from '../../../src/core/logger.ts'

export function createMockLogger() {
  const logger = {
    debug: vi.fn<TLogger['debug']>(),
    info: vi.fn<TLogger['info']>(),
    warn: vi.fn<TLogger['warn']>(),
    error: vi.fn<TLogger['error']>(),
  }
  return logger satisfies TLogger
}
