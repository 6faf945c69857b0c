import { dispatchResponse } from './dispatch'
import { GeminiError } from './errors'
import { readResponseHeader } from './header'
import { buildRequest, hostnameOf } from './request'
import { statusName } from './status'
import { createTlsTransport } from './transport'
import type { DispatchOutcome, ExchangeOptions, GeminiStream } from './types'

export const DEFAULT_PORT = 1965

/**
 * One complete exchange: connect, send the request line, read the header,
 * dispatch on its status and close. The stream never outlives the call.
 */
export const performRequest = async (
  host: string,
  port: number,
  resource: string,
  options: ExchangeOptions = {}
): Promise<DispatchOutcome> => {
  const { logger, timeout } = options
  const request = buildRequest(host, resource)
  const transport = options.transport ?? createTlsTransport({ ...options.tls, timeout })
  const hostname = hostnameOf(host)

  logger?.info(`Requesting ${request.trimEnd()}`)

  let stream: GeminiStream
  try {
    stream = await transport.connect(hostname, port)
  } catch (error) {
    throw GeminiError.wrap('CONNECTION_FAILED', `Could not connect to ${hostname}:${port}`, error)
  }

  try {
    try {
      await stream.write(request)
    } catch (error) {
      throw GeminiError.wrap('CONNECTION_FAILED', 'Failed to send the request', error)
    }

    const header = await readResponseHeader(stream, logger)
    logger?.info(`${header.status} ${statusName(header.status)} ${header.meta}`)

    return await dispatchResponse(header, stream)
  } finally {
    stream.close()
  }
}
