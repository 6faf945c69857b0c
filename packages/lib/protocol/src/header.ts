import type { Logger } from 'pino'

import { GeminiError } from './errors'
import { decodeStatus } from './status'
import type { GeminiStream, ResponseHeader } from './types'

/** Upper bound on the meta field, in bytes, excluding the line terminator. */
export const MAX_META_LENGTH = 1024

const DIGITS = /^[0-9]{2}$/
const SPACE = 0x20
const CR = 0x0d

const utf8 = new TextDecoder('utf-8', { fatal: true })

const truncated = (what: string) => new GeminiError('TRUNCATED_HEADER', `Stream closed while reading ${what}`)

/**
 * Reads `<status> <meta>\r\n` off the stream and leaves it at the first body
 * byte. Never returns a partially decoded header.
 */
export const readResponseHeader = async (stream: GeminiStream, logger?: Logger): Promise<ResponseHeader> => {
  try {
    const digits = await stream.read(2)
    if (!digits || digits.length < 2) throw truncated('the status code')

    const text = digits.toString('latin1')
    if (!DIGITS.test(text)) throw new GeminiError('MALFORMED_STATUS', `Status is not two digits: ${JSON.stringify(text)}`)
    const status = decodeStatus(parseInt(text, 10))

    const separator = await stream.read(1)
    if (!separator) throw truncated('the header separator')
    if (separator[0] !== SPACE) throw new GeminiError('MALFORMED_HEADER', 'Expected a space after the status code', { status })

    // One extra byte leaves room for the optional CR
    const line = await stream.readLine(MAX_META_LENGTH + 1)
    if (!line) throw truncated('the meta field')

    const raw = line.length && line[line.length - 1] === CR ? line.subarray(0, -1) : line
    if (raw.length > MAX_META_LENGTH) throw new GeminiError('HEADER_TOO_LONG', `Meta exceeds ${MAX_META_LENGTH} bytes`, { status })

    let meta: string
    try {
      meta = utf8.decode(raw)
    } catch (error) {
      throw new GeminiError('MALFORMED_HEADER', 'Meta is not valid UTF-8', { status, cause: error })
    }

    logger?.debug({ status, meta }, 'response header')
    return { status, meta }
  } catch (error) {
    throw GeminiError.wrap('CONNECTION_FAILED', 'Connection failed while reading the response header', error)
  }
}
