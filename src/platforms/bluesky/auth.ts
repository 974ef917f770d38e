/**
 * Bluesky session management
 */

import { HttpClient, normalizeBaseUrl, type HttpClientOptions } from '../http'
import { ProtocolError } from '../errors'
import { createSessionResponseSchema, DEFAULT_PDS_URL } from './types'

export interface BlueskySession {
  accessJwt: string
  did: string
  handle?: string
}

/**
 * Exchange a handle and app password for a session token and the account DID
 */
export async function createSession(
  identifier: string,
  appPassword: string,
  pdsUrl: string = DEFAULT_PDS_URL,
  options: Omit<HttpClientOptions, 'token'> = {}
): Promise<BlueskySession> {
  const http = new HttpClient(`${normalizeBaseUrl(pdsUrl)}/xrpc`, options)
  try {
    const session = await http.post(
      '/com.atproto.server.createSession',
      { identifier, password: appPassword },
      createSessionResponseSchema,
      'Bluesky login failed'
    )
    return { accessJwt: session.accessJwt, did: session.did, handle: session.handle }
  } catch (error) {
    if (error instanceof ProtocolError) {
      throw new ProtocolError(`Bluesky login failed: ${error.body.trim() || error.status}`, error.status, error.body)
    }
    throw error
  }
}
