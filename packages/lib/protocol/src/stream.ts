import type { Duplex } from 'stream'

import { GeminiError } from './errors'
import type { GeminiStream } from './types'

const LF = 0x0a

export interface SocketStreamOptions {
  /** Milliseconds a read may wait for the peer before failing with TIMEOUT. */
  timeout?: number
}

/**
 * GeminiStream over a Node duplex (a TLS socket in practice). The socket is
 * read in paused mode, so bytes nobody asks for are left with the socket.
 */
export class SocketStream implements GeminiStream {
  private buffered: Buffer = Buffer.alloc(0)
  private ended = false
  private failure: Error | null = null

  constructor(private readonly socket: Duplex, private readonly options: SocketStreamOptions = {}) {
    socket.on('end', () => { this.ended = true })
    socket.on('close', () => { this.ended = true })
    socket.on('error', (error: Error) => { this.failure = error })
  }

  write(data: string | Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(data, (error?: Error | null) => {
        if (error) reject(error)
        else resolve()
      })
    })
  }

  async read(length: number): Promise<Buffer | null> {
    while (this.buffered.length < length) {
      if (!(await this.more())) break
    }

    if (this.buffered.length === 0) return null
    return this.take(Math.min(length, this.buffered.length), 0)
  }

  async readLine(maxLength: number): Promise<Buffer | null> {
    let searchFrom = 0

    for (;;) {
      const index = this.buffered.indexOf(LF, searchFrom)
      if (index !== -1) {
        if (index > maxLength) throw this.tooLong(maxLength)
        return this.take(index, 1)
      }

      if (this.buffered.length > maxLength) throw this.tooLong(maxLength)
      searchFrom = this.buffered.length
      if (!(await this.more())) return null
    }
  }

  async readToEnd(): Promise<Buffer> {
    const chunks = [this.buffered]
    this.buffered = Buffer.alloc(0)

    for (;;) {
      const chunk = await this.next()
      if (!chunk) return Buffer.concat(chunks)
      chunks.push(chunk)
    }
  }

  close() {
    this.socket.destroy()
  }

  private take(length: number, skip: number): Buffer {
    const out = this.buffered.subarray(0, length)
    this.buffered = this.buffered.subarray(length + skip)
    return out
  }

  private tooLong(maxLength: number) {
    return new GeminiError('HEADER_TOO_LONG', `Header line exceeds ${maxLength} bytes`)
  }

  private async more(): Promise<boolean> {
    const chunk = await this.next()
    if (!chunk) return false
    this.buffered = this.buffered.length ? Buffer.concat([this.buffered, chunk]) : chunk
    return true
  }

  private async next(): Promise<Buffer | null> {
    for (;;) {
      const chunk: unknown = this.socket.read()
      if (Buffer.isBuffer(chunk)) return chunk
      if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8')
      if (this.failure) throw this.failure
      if (this.ended || this.socket.destroyed) return null
      await this.settle()
    }
  }

  // Resolves on the next readable, end, close or error event, or fails the read after the idle timeout
  private settle(): Promise<void> {
    const { socket } = this
    const { timeout } = this.options

    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined

      const done = () => {
        if (timer) clearTimeout(timer)
        socket.off('readable', done)
        socket.off('end', done)
        socket.off('close', done)
        socket.off('error', done)
        resolve()
      }

      socket.on('readable', done)
      socket.on('end', done)
      socket.on('close', done)
      socket.on('error', done)

      if (timeout !== undefined && timeout > 0) {
        timer = setTimeout(() => {
          this.failure = new GeminiError('TIMEOUT', `No data received for ${timeout}ms`)
          done()
          socket.destroy()
        }, timeout)
      }
    })
  }
}
