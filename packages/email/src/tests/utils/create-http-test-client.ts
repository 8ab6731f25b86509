import type { HttpClient, HttpRequest, HttpResponse } from "../../ports/http-client"

export type RecordedRequest = HttpRequest & { url: string }

export type StubResponse = {
  status: number
  body?: string
}

/**
 * In-process {@link HttpClient} that records every request and answers with
 * queued responses, then with `fallback`.
 */
export function createHttpTestClient(fallback: StubResponse = { status: 200, body: "{}" }) {
  const requests: RecordedRequest[] = []
  const queue: StubResponse[] = []

  const client: HttpClient = {
    async post(url: string, request: HttpRequest): Promise<HttpResponse> {
      requests.push({ url, ...request })

      const { status, body = "" } = queue.shift() ?? fallback
      return { status, text: async () => body }
    },
  }

  return {
    client,
    requests,
    respondWith(response: StubResponse) {
      queue.push(response)
    },
    lastPayload(): unknown {
      const last = requests.at(-1)
      if (!last) throw new Error("No request was made")

      return JSON.parse(last.body)
    },
  }
}
