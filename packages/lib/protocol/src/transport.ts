import net from 'net'
import tls from 'tls'

import { GeminiError } from './errors'
import { SocketStream } from './stream'
import type { GeminiStream, TlsOptions, Transport } from './types'

export interface TlsTransportOptions extends TlsOptions {
  /** Milliseconds allowed for the TCP and TLS handshake, and for each read afterwards. */
  timeout?: number
}

/**
 * Opens a TLS connection per exchange. Whether the server certificate is
 * trusted is decided here by `rejectUnauthorized` and `ca`; the protocol
 * layer performs no hostname or certificate checks of its own.
 */
export const createTlsTransport = (options: TlsTransportOptions = {}): Transport => ({
  connect: (host: string, port: number) => new Promise<GeminiStream>((resolve, reject) => {
    const { timeout, rejectUnauthorized = false, ca, cert, key } = options
    let timer: NodeJS.Timeout | undefined

    const socket = tls.connect({
      host,
      port,
      servername: net.isIP(host) ? undefined : host,
      rejectUnauthorized,
      ca,
      cert,
      key
    })

    const onError = (error: Error) => {
      if (timer) clearTimeout(timer)
      socket.destroy()
      reject(error)
    }

    socket.once('error', onError)
    socket.once('secureConnect', () => {
      if (timer) clearTimeout(timer)
      socket.off('error', onError)
      resolve(new SocketStream(socket, { timeout }))
    })

    if (timeout !== undefined && timeout > 0) {
      timer = setTimeout(() => {
        socket.off('error', onError)
        socket.destroy()
        reject(new GeminiError('TIMEOUT', `Could not connect to ${host}:${port} within ${timeout}ms`))
      }, timeout)
    }
  })
})
