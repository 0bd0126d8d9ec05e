import type { Dispatcher } from '../../core/dispatcher.ts'

export type TBalance = {
  amount: number
  currency: string
}

export type TBalanceApiOptions = {
  dispatcher: Dispatcher
}

/**
 * Account balance endpoint. Mirrors the API exactly; auth, retries and error
 * classification come from the dispatcher's middleware.
 */
export class BalanceApi {
  private dispatcher: Dispatcher

  constructor(options: TBalanceApiOptions) {
    this.dispatcher = options.dispatcher
  }

  public async getBalance(signal?: AbortSignal): Promise<TBalance> {
    return await this.dispatcher.get<TBalance>('/balance', { signal })
  }
}
