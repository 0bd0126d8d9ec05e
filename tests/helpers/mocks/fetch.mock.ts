type FetchArgs = Parameters<typeof fetch>
type FetchInput = FetchArgs[0]

export type FetchMockItem =
  | Response
  | Error
  | { body?: unknown; rawBody?: string; status?: number; headers?: Record<string, string> }
  | ((input: FetchInput, init?: RequestInit) => Response | Promise<Response>)

export type TRecordedCall = {
  url: string
  method: string
  headers: Headers
  body: string | undefined
}

/**
 * Queue-based fetch stand-in. Each call consumes the next queued item: a Response,
 * a JSON body description, an Error to reject with, or a function.
 */
export function createFetchMock() {
  const calls: TRecordedCall[] = []
  const queue: FetchMockItem[] = []

  const toUrlString = (input: FetchInput): string => {
    if (typeof input === 'string') return input
    if (input instanceof URL) return input.toString()
    return input.url
  }

  const toResponse = (item: { body?: unknown; rawBody?: string; status?: number; headers?: Record<string, string> }) => {
    const status = item.status ?? 200
    const text = item.rawBody ?? (item.body === undefined ? null : JSON.stringify(item.body))
    return new Response(status === 204 ? null : text, {
      status,
      headers: { 'content-type': 'application/json', ...(item.headers ?? {}) },
    })
  }

  const fetchMock: typeof fetch = async (input, init) => {
    const url = toUrlString(input)
    calls.push({
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    })
    const next = queue.shift()
    if (!next) throw new Error(`No mock queued for fetch: ${url}`)
    if (next instanceof Error) throw next
    if (typeof next === 'function') return await Promise.resolve(next(input, init))
    if (next instanceof Response) return next
    return toResponse(next)
  }

  return {
    fetch: fetchMock,
    push: (item: FetchMockItem) => queue.push(item),
    pushJson: (body: unknown, init?: { status?: number; headers?: Record<string, string> }) =>
      queue.push({ body, ...init }),
    pushText: (rawBody: string, init?: { status?: number }) => queue.push({ rawBody, ...init }),
    calls,
    queue,
  }
}

export type TFetchMock = ReturnType<typeof createFetchMock>
