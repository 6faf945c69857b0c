import type { StatusCode } from './status'

export type GeminiErrorCode =
  | 'CONNECTION_FAILED'
  | 'MALFORMED_REQUEST'
  | 'TRUNCATED_HEADER'
  | 'MALFORMED_STATUS'
  | 'UNKNOWN_STATUS'
  | 'MALFORMED_HEADER'
  | 'HEADER_TOO_LONG'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'BODY_READ_ERROR'
  | 'INVALID_ENCODING'
  | 'TIMEOUT'

export interface GeminiErrorOptions {
  status?: StatusCode
  cause?: unknown
}

/**
 * Any failure of a single exchange. The exchange is over once one of these
 * is thrown; nothing is retried.
 */
export class GeminiError extends Error {
  readonly code: GeminiErrorCode
  readonly status?: StatusCode

  constructor(code: GeminiErrorCode, message: string, options: GeminiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'GeminiError'
    this.code = code
    this.status = options.status
  }

  /** Passes GeminiErrors through untouched and wraps anything else under `code`. */
  static wrap(code: GeminiErrorCode, message: string, error: unknown): GeminiError {
    if (error instanceof GeminiError) return error
    const reason = error instanceof Error ? error.message : String(error)
    return new GeminiError(code, `${message}: ${reason}`, { cause: error })
  }
}

export const isGeminiError = (error: unknown, code?: GeminiErrorCode): error is GeminiError =>
  error instanceof GeminiError && (code === undefined || error.code === code)
