/**
 * HTTP client shared by the source loader, the pricing fetcher and the page
 * command. Holds the default request headers; no other state.
 *
 * Uses the native fetch API. No timeout is applied: a hung request blocks
 * the run.
 */

import { DEFAULT_USER_AGENT } from '../../config/settings.js'

export const DEFAULT_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': DEFAULT_USER_AGENT,
  Accept: 'application/json, text/html;q=0.9, */*;q=0.8',
  'Accept-Language': 'en-CA,en;q=0.9',
}

export interface HttpClientOptions {
  /** Replaces the default User-Agent */
  userAgent?: string

  /** Extra headers merged over the defaults */
  headers?: Record<string, string>
}

export class HttpClient {
  private readonly headers: Record<string, string>

  constructor(options: HttpClientOptions = {}) {
    this.headers = {
      ...DEFAULT_REQUEST_HEADERS,
      ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
      ...(options.headers ?? {}),
    }
  }

  /**
   * Issue a GET. Rejects only on transport failures; any HTTP status
   * resolves.
   */
  async get(url: string, headers?: Record<string, string>): Promise<Response> {
    return fetch(url, {
      method: 'GET',
      headers: { ...this.headers, ...(headers ?? {}) },
      redirect: 'follow',
    })
  }

  /** GET and read the body as text. Body read failures reject like transport failures. */
  async getText(url: string, headers?: Record<string, string>): Promise<TextResponse> {
    const response = await this.get(url, headers)
    const body = response.ok ? await response.text() : ''
    return {
      ok: response.ok,
      statusCode: response.status,
      statusText: response.statusText,
      body,
    }
  }
}

export interface TextResponse {
  ok: boolean
  statusCode: number
  statusText: string
  body: string
}
