/**
 * JSON-over-HTTP plumbing shared by the Mastodon and Bluesky clients
 * Maps failures onto the transport / protocol / decode error kinds
 */

import { z } from 'zod'
import { DecodeError, ProtocolError, TransportError } from './errors'

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000
const MAX_ERROR_BODY_LENGTH = 240

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpClientOptions {
  token?: string
  timeoutMs?: number
  fetch?: FetchLike
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export function normalizeBaseUrl(raw: string): string {
  return raw.trim().replace(/\/+$/, '')
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text()
  } catch {
    return ''
  }
}

function describeBody(text: string): string {
  const trimmed = text.trim()
  if (!trimmed) return '(empty response)'
  return trimmed.length > MAX_ERROR_BODY_LENGTH ? `${trimmed.slice(0, MAX_ERROR_BODY_LENGTH)}…` : trimmed
}

export class HttpClient {
  private readonly baseUrl: string
  private readonly token?: string
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike

  constructor(baseUrl: string, options: HttpClientOptions = {}) {
    this.baseUrl = normalizeBaseUrl(baseUrl)
    this.token = options.token
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async get<T>(path: string, schema: Schema<T>, context: string): Promise<T> {
    const response = await this.send('GET', path, undefined, context)
    return this.decode(response, schema, context)
  }

  async post<T>(path: string, body: unknown, schema: Schema<T>, context: string): Promise<T> {
    const response = await this.send('POST', path, body, context)
    return this.decode(response, schema, context)
  }

  /**
   * POST where only the status matters; the body is still consumed so the connection is released
   */
  async postIgnoringBody(path: string, body: unknown, context: string): Promise<void> {
    const response = await this.send('POST', path, body, context)
    await readResponseText(response)
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    context: string
  ): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)

    let response: Response
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      })
    } catch (error) {
      const err = error instanceof Error ? error : undefined
      if (err?.name === 'AbortError') {
        throw new TransportError(`${context}: request timed out after ${this.timeoutMs}ms`, {
          cause: error,
          timedOut: true,
        })
      }
      throw new TransportError(`${context}: ${err?.message ?? 'network error'}`, { cause: error })
    } finally {
      clearTimeout(timeout)
    }

    if (!response.ok) {
      const text = await readResponseText(response)
      throw new ProtocolError(`${context}: ${response.status} ${describeBody(text)}`, response.status, text)
    }

    return response
  }

  private async decode<T>(response: Response, schema: Schema<T>, context: string): Promise<T> {
    let json: unknown
    try {
      json = await response.json()
    } catch (error) {
      throw new DecodeError(`${context}: response was not valid JSON`, { cause: error })
    }

    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
      throw new DecodeError(`${context}: unexpected response${where}: ${issue?.message ?? 'invalid'}`, {
        cause: parsed.error,
      })
    }
    return parsed.data
  }
}
