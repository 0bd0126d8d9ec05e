import type { TTokenGrant, TTokenResponse } from './token.api.ts'

/** What the credential store needs from the token endpoint client. */
export type TTokenApi = {
  requestToken(grant: TTokenGrant, signal?: AbortSignal): Promise<TTokenResponse>
}
