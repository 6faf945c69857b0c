import { GeminiError } from './errors'
import {
  CODES,
  isCertificateError,
  isInputRequired,
  isPermanentFailure,
  isRedirect,
  isSuccess,
  isTemporaryFailure
} from './status'
import type { DispatchOutcome, GeminiStream, ResponseHeader } from './types'

const DEFAULT_CHARSET = 'utf-8'

export const isTextMimeType = (meta: string) => meta.startsWith('text/')

/** The `charset` parameter of a media type, lower-cased, or utf-8 when absent. */
export const charsetOf = (mimeType: string): string => {
  for (const param of mimeType.split(';').slice(1)) {
    const [key, ...value] = param.split('=')
    if (key.trim().toLowerCase() === 'charset') {
      const charset = value.join('=').trim().replace(/^"(.*)"$/, '$1').toLowerCase()
      if (charset) return charset
    }
  }
  return DEFAULT_CHARSET
}

const decodeBody = (bytes: Buffer, mimeType: string): string => {
  const charset = charsetOf(mimeType)

  let decoder: TextDecoder
  try {
    decoder = new TextDecoder(charset, { fatal: true, ignoreBOM: true })
  } catch (error) {
    throw new GeminiError('INVALID_ENCODING', `Unsupported charset: ${charset}`, { status: CODES.SUCCESS, cause: error })
  }

  try {
    return decoder.decode(bytes)
  } catch (error) {
    throw new GeminiError('INVALID_ENCODING', `Body is not valid ${charset}`, { status: CODES.SUCCESS, cause: error })
  }
}

/**
 * Turns a decoded header into an outcome. Only a text success reads from the
 * stream; every other branch leaves the body unread for the caller to discard
 * when it closes the stream.
 */
export const dispatchResponse = async (header: ResponseHeader, stream: GeminiStream): Promise<DispatchOutcome> => {
  const { status, meta } = header

  if (isSuccess(status)) {
    if (!isTextMimeType(meta)) return { kind: 'unsupported-media-type', status, mimeType: meta }

    let bytes: Buffer
    try {
      bytes = await stream.readToEnd()
    } catch (error) {
      throw GeminiError.wrap('BODY_READ_ERROR', 'Failed to read the response body', error)
    }

    return { kind: 'body', status, mimeType: meta, body: decodeBody(bytes, meta) }
  }

  if (isRedirect(status)) {
    return { kind: 'redirect', status, target: meta, permanent: status === CODES.REDIRECT_PERMANENT }
  }

  if (isInputRequired(status)) {
    return { kind: 'input-requested', status, prompt: meta, sensitive: status === CODES.REQUEST_PASSWORD }
  }

  if (isTemporaryFailure(status) || isPermanentFailure(status) || isCertificateError(status)) {
    return { kind: 'failure', status, detail: meta }
  }

  return { kind: 'unhandled-status', status }
}

/**
 * The text of a body outcome, null for outcomes that never carry one. A
 * success whose media type is not text is an error here.
 */
export const bodyText = (outcome: DispatchOutcome): string | null => {
  if (outcome.kind === 'body') return outcome.body
  if (outcome.kind === 'unsupported-media-type') {
    throw new GeminiError('UNSUPPORTED_MEDIA_TYPE', `Unsupported media type: ${outcome.mimeType}`, { status: outcome.status })
  }
  return null
}
