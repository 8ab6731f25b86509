export type HttpRequest = {
  headers: Record<string, string>
  body: string
  /** Total time allowed for the request, including reading the response. */
  timeoutMs?: number
}

export type HttpResponse = {
  status: number
  text(): Promise<string>
}

/**
 * The single HTTP capability transports need. Implementations throw for
 * connection, DNS, TLS and timeout failures, and resolve for every status code.
 */
export interface HttpClient {
  post(url: string, request: HttpRequest): Promise<HttpResponse>
}
