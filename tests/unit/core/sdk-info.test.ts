import { describe, expect, it } from 'vitest'
import pkg from '../../../package.json' with { type: 'json' }
import { buildUserAgent, SDK_NAME, SDK_VERSION, USER_AGENT } from '../../../src/core/sdk-info.ts'

describe('sdk-info', () => {
  it('derives the user agent from the package version', () => {
    expect(SDK_VERSION).toBe(pkg.version)
    expect(USER_AGENT).toBe(`${SDK_NAME}/${pkg.version}`)
  })

  it('prepends a trimmed caller prefix', () => {
    expect(buildUserAgent('  my-app/2.1 ')).toBe(`my-app/2.1 gpucloud-sdk-node/${pkg.version}`)
  })

  it('ignores a blank prefix', () => {
    expect(buildUserAgent('   ')).toBe(USER_AGENT)
    expect(buildUserAgent()).toBe(USER_AGENT)
  })
})
