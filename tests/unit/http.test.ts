import { describe, it, expect, vi } from 'vitest'
import { z } from 'zod'
import { HttpClient, normalizeBaseUrl } from '../../src/platforms/http'
import { DecodeError, ProtocolError, TransportError } from '../../src/platforms/errors'
import { jsonResponse, queuedFetch } from './setup/factories'

const itemSchema = z.object({ id: z.string() })

describe('normalizeBaseUrl', () => {
  it('should trim whitespace and trailing slashes', () => {
    expect(normalizeBaseUrl('  https://social.example//  ')).toBe('https://social.example')
  })
})

describe('HttpClient', () => {
  it('should send the bearer token and decode the response', async () => {
    const { fetch, requests } = queuedFetch(jsonResponse({ id: 'abc' }))
    const http = new HttpClient('https://api.example/', { token: 'test-secret', fetch })

    const item = await http.get('/items/1', itemSchema, 'Failed to load item')

    expect(item).toEqual({ id: 'abc' })
    expect(requests).toEqual([
      {
        url: 'https://api.example/items/1',
        method: 'GET',
        headers: { Accept: 'application/json', Authorization: 'Bearer test-secret' },
        body: undefined,
      },
    ])
  })

  it('should send a JSON body with its content type', async () => {
    const { fetch, requests } = queuedFetch(jsonResponse({ id: 'new' }))
    const http = new HttpClient('https://api.example', { fetch })

    await http.post('/items', { name: 'first' }, itemSchema, 'Failed to create item')

    expect(requests[0]?.method).toBe('POST')
    expect(requests[0]?.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' })
    expect(requests[0]?.body).toEqual({ name: 'first' })
  })

  it('should raise a protocol error carrying status and body', async () => {
    const { fetch } = queuedFetch(new Response('{"error":"Record not found"}', { status: 404 }))
    const http = new HttpClient('https://api.example', { fetch })

    const failure = http.get('/items/2', itemSchema, 'Failed to load item')

    await expect(failure).rejects.toBeInstanceOf(ProtocolError)
    await expect(failure).rejects.toMatchObject({
      message: 'Failed to load item: 404 {"error":"Record not found"}',
      status: 404,
      body: '{"error":"Record not found"}',
      kind: 'protocol',
    })
  })

  it('should consume the body of a response it ignores', async () => {
    const response = new Response('{"uri":"at://ignored"}', { status: 200 })
    const { fetch, requests } = queuedFetch(response)
    const http = new HttpClient('https://api.example', { fetch })

    await http.postIgnoringBody('/records/delete', { rkey: 'abc' }, 'Failed to delete record')

    expect(response.bodyUsed).toBe(true)
    expect(requests[0]?.body).toEqual({ rkey: 'abc' })
  })

  it('should describe an empty error body', async () => {
    const { fetch } = queuedFetch(new Response('', { status: 503 }))
    const http = new HttpClient('https://api.example', { fetch })

    await expect(http.postIgnoringBody('/ping', undefined, 'Ping failed')).rejects.toThrow(
      'Ping failed: 503 (empty response)'
    )
  })

  it('should shorten a long error body in the message but keep it whole on the error', async () => {
    const body = 'x'.repeat(300)
    const { fetch } = queuedFetch(new Response(body, { status: 500 }))
    const http = new HttpClient('https://api.example', { fetch })

    const error = await http.get('/big', itemSchema, 'Oops').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ProtocolError)
    if (error instanceof ProtocolError) {
      expect(error.message).toBe(`Oops: 500 ${'x'.repeat(240)}…`)
      expect(error.body).toBe(body)
    }
  })

  it('should raise a decode error for a body that is not JSON', async () => {
    const { fetch } = queuedFetch(new Response('<html>', { status: 200 }))
    const http = new HttpClient('https://api.example', { fetch })

    const failure = http.get('/items/3', itemSchema, 'Failed to load item')
    await expect(failure).rejects.toBeInstanceOf(DecodeError)
    await expect(failure).rejects.toThrow('Failed to load item: response was not valid JSON')
  })

  it('should point at the first field that does not match', async () => {
    const { fetch } = queuedFetch(jsonResponse({ id: 5 }))
    const http = new HttpClient('https://api.example', { fetch })

    await expect(http.get('/items/4', itemSchema, 'Failed to load item')).rejects.toThrow(
      'Failed to load item: unexpected response at id: Expected string, received number'
    )
  })

  it('should raise a transport error when the request fails to send', async () => {
    const { fetch } = queuedFetch(new Error('connect ECONNREFUSED'))
    const http = new HttpClient('https://api.example', { fetch })

    const error = await http.get('/items', itemSchema, 'Failed to load items').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TransportError)
    if (error instanceof TransportError) {
      expect(error.message).toBe('Failed to load items: connect ECONNREFUSED')
      expect(error.timedOut).toBe(false)
    }
  })

  it('should abort a request that outlives the timeout', async () => {
    const fetch = vi.fn(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('This operation was aborted')
            error.name = 'AbortError'
            reject(error)
          })
        })
    )
    const http = new HttpClient('https://api.example', { fetch, timeoutMs: 10 })

    const error = await http.get('/slow', itemSchema, 'Failed to load items').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TransportError)
    if (error instanceof TransportError) {
      expect(error.message).toBe('Failed to load items: request timed out after 10ms')
      expect(error.timedOut).toBe(true)
    }
  })
})
