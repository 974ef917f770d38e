/**
 * Error taxonomy shared by the platform clients and the sync worker
 */

export type ErrorKind = 'credential' | 'transport' | 'protocol' | 'decode' | 'precondition'

export abstract class TwinfeedError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Secret missing or unreadable
 */
export class CredentialError extends TwinfeedError {
  readonly kind = 'credential' as const
}

/**
 * The request never got a response: DNS, refused connection, TLS, timeout
 */
export class TransportError extends TwinfeedError {
  readonly kind = 'transport' as const
  readonly timedOut: boolean

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options)
    this.timedOut = options?.timedOut ?? false
  }
}

/**
 * Non-success response; body carries the backend's error text
 */
export class ProtocolError extends TwinfeedError {
  readonly kind = 'protocol' as const

  constructor(
    message: string,
    readonly status: number,
    readonly body: string
  ) {
    super(message)
  }
}

/**
 * Response body did not match the expected shape
 */
export class DecodeError extends TwinfeedError {
  readonly kind = 'decode' as const
}

/**
 * Raised before any request when the input lacks required data
 */
export class PreconditionError extends TwinfeedError {
  readonly kind = 'precondition' as const
}

/**
 * Render any thrown value as a display string
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Unknown error'
}
