import { GeminiError } from './errors'

export const SCHEME = 'gemini://'
export const MAX_REQUEST_LENGTH = 1024

const LINE_BREAK = /[\r\n]/

export const hostnameOf = (host: string) => host.startsWith(SCHEME) ? host.slice(SCHEME.length) : host

/**
 * Formats the request line for `resource` on `host`. The scheme is added
 * unless `host` already carries it.
 */
export const buildRequest = (host: string, resource: string): string => {
  if (!hostnameOf(host)) throw new GeminiError('MALFORMED_REQUEST', 'Host must not be empty')
  if (LINE_BREAK.test(host)) throw new GeminiError('MALFORMED_REQUEST', 'Host must not contain CR or LF')
  if (LINE_BREAK.test(resource)) throw new GeminiError('MALFORMED_REQUEST', 'Resource must not contain CR or LF')

  const uri = host.startsWith(SCHEME) ? host + resource : SCHEME + host + resource
  if (Buffer.byteLength(uri, 'utf8') > MAX_REQUEST_LENGTH) {
    throw new GeminiError('MALFORMED_REQUEST', `Request URI is longer than ${MAX_REQUEST_LENGTH} bytes`)
  }

  return `${uri}\r\n`
}
