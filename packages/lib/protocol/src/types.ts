import type { Logger } from 'pino'

import type { StatusCode } from './status'

export interface ResponseHeader {
  readonly status: StatusCode
  readonly meta: string
}

/**
 * A connected, encrypted byte stream serving exactly one exchange.
 */
export interface GeminiStream {
  write(data: string | Uint8Array): Promise<void>
  /** Up to `length` bytes; fewer only at end of stream, null once nothing is left. */
  read(length: number): Promise<Buffer | null>
  /** Bytes before the next `\n` (which is consumed), or null if the stream ends first. */
  readLine(maxLength: number): Promise<Buffer | null>
  readToEnd(): Promise<Buffer>
  close(): void
}

export interface Transport {
  connect(host: string, port: number): Promise<GeminiStream>
}

export interface TlsOptions {
  /** Defaults to false: Gemini servers are usually self-signed. */
  rejectUnauthorized?: boolean
  ca?: string | Buffer
  cert?: string | Buffer
  key?: string | Buffer
}

export interface ExchangeOptions {
  transport?: Transport
  /** Idle timeout in milliseconds for connecting and for each read. */
  timeout?: number
  tls?: TlsOptions
  logger?: Logger
}

export type DispatchOutcome =
  | { kind: 'body', status: StatusCode, mimeType: string, body: string }
  | { kind: 'unsupported-media-type', status: StatusCode, mimeType: string }
  | { kind: 'redirect', status: StatusCode, target: string, permanent: boolean }
  | { kind: 'input-requested', status: StatusCode, prompt: string, sensitive: boolean }
  | { kind: 'failure', status: StatusCode, detail: string }
  | { kind: 'unhandled-status', status: StatusCode }
