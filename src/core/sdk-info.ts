import pkg from '../../package.json' with { type: 'json' }

export const SDK_NAME = 'gpucloud-sdk-node'
export const SDK_VERSION: string = pkg.version
export const USER_AGENT = `${SDK_NAME}/${SDK_VERSION}`

/** Prepends an optional caller-supplied product token to the SDK's own User-Agent. */
export function buildUserAgent(prefix?: string): string {
  const trimmed = prefix?.trim()
  return trimmed ? `${trimmed} ${USER_AGENT}` : USER_AGENT
}
