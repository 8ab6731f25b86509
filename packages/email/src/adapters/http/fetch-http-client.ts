import type { HttpClient, HttpRequest, HttpResponse } from "../../ports/http-client"

export type FetchHttpClientOptions = {
  /** Applied when a request carries no `timeoutMs` of its own. */
  timeoutMs?: number
  /** @default globalThis.fetch */
  fetch?: typeof fetch
}

/**
 * {@link HttpClient} over the runtime's `fetch`. Timeouts abort the request
 * and reject like any other network failure.
 */
export class FetchHttpClient implements HttpClient {
  private readonly fetch: typeof fetch

  constructor(private readonly options: FetchHttpClientOptions = {}) {
    this.fetch = options.fetch ?? ((input, init) => globalThis.fetch(input, init))
  }

  async post(url: string, request: HttpRequest): Promise<HttpResponse> {
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs

    const response = await this.fetch(url, {
      method: "POST",
      headers: request.headers,
      body: request.body,
      ...(timeoutMs !== undefined && { signal: AbortSignal.timeout(timeoutMs) }),
    })

    return {
      status: response.status,
      text: () => response.text(),
    }
  }
}
