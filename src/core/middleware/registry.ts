import type { TRequestInterceptor, TResponseInterceptor } from '../types.ts'

export type TMiddlewareSnapshot = {
  request: TRequestInterceptor[]
  response: TResponseInterceptor[]
}

/**
 * Ordered request and response interceptors shared by every call of one client.
 * Writers replace the arrays instead of mutating them, and readers only ever see
 * copies, so a call that already took its snapshot is unaffected by later changes.
 */
export class MiddlewareRegistry {
  private requestInterceptors: TRequestInterceptor[]
  private responseInterceptors: TResponseInterceptor[]

  constructor(
    requestInterceptors: TRequestInterceptor[] = [],
    responseInterceptors: TResponseInterceptor[] = [],
  ) {
    this.requestInterceptors = [...requestInterceptors]
    this.responseInterceptors = [...responseInterceptors]
  }

  /** Independent copies of both chains, in registration order. */
  snapshot(): TMiddlewareSnapshot {
    return {
      request: [...this.requestInterceptors],
      response: [...this.responseInterceptors],
    }
  }

  addRequestInterceptor(interceptor: TRequestInterceptor): void {
    this.requestInterceptors = [...this.requestInterceptors, interceptor]
  }

  setRequestInterceptors(interceptors: TRequestInterceptor[]): void {
    this.requestInterceptors = [...interceptors]
  }

  clearRequestInterceptors(): void {
    this.requestInterceptors = []
  }

  requestInterceptorCount(): number {
    return this.requestInterceptors.length
  }

  addResponseInterceptor(interceptor: TResponseInterceptor): void {
    this.responseInterceptors = [...this.responseInterceptors, interceptor]
  }

  setResponseInterceptors(interceptors: TResponseInterceptor[]): void {
    this.responseInterceptors = [...interceptors]
  }

  clearResponseInterceptors(): void {
    this.responseInterceptors = []
  }

  responseInterceptorCount(): number {
    return this.responseInterceptors.length
  }

  clear(): void {
    this.requestInterceptors = []
    this.responseInterceptors = []
  }

  count(): { request: number; response: number } {
    return {
      request: this.requestInterceptors.length,
      response: this.responseInterceptors.length,
    }
  }
}
