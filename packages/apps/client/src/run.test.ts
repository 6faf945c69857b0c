import pino from 'pino'
import { describe, expect, it } from 'vitest'

import { createMemoryTransport } from '@gemwire/protocol/testing'

import type { Rendered } from './render'
import { run, tlsOptionsFrom } from './run'
import type { RunOptions } from './run'

const defaults: RunOptions = {
  host: 'example.org',
  port: 1965,
  resource: '/',
  timeout: 1000,
  maxRedirects: 5,
  verify: false
}

const capture = () => {
  const written: Rendered[] = []
  return { written, write: (rendered: Rendered) => { written.push(rendered) } }
}

describe('run', () => {
  it('writes the body and exits with 0', async () => {
    const transport = createMemoryTransport({ 'example.org:1965': '20 text/gemini\r\nWelcome\n' })
    const { written, write } = capture()

    const exitCode = await run(defaults, { logger: pino({ level: 'silent' }), transport, write })

    expect(exitCode).toBe(0)
    expect(written).toEqual([{ stream: 'stdout', text: 'Welcome\n', exitCode: 0 }])
  })

  it('requests a resource given without its leading slash from the root', async () => {
    const transport = createMemoryTransport({ 'example.org:1965': '20 text/gemini\r\nDocs\n' })
    const { write } = capture()

    const exitCode = await run({ ...defaults, resource: 'docs' }, { logger: pino({ level: 'silent' }), transport, write })

    expect(exitCode).toBe(0)
    expect(transport.connections[0].request()).toBe('gemini://example.org/docs\r\n')
  })

  it('renders protocol outcomes on stderr with exit code 1', async () => {
    const transport = createMemoryTransport({ 'example.org:1965': '51 nothing here\r\n' })
    const { written, write } = capture()

    const exitCode = await run({ ...defaults, resource: '/missing' }, { logger: pino({ level: 'silent' }), transport, write })

    expect(exitCode).toBe(1)
    expect(written).toEqual([{ stream: 'stderr', text: 'Not found: gemini://example.org/missing (nothing here)', exitCode: 1 }])
  })

  it('renders exchange errors', async () => {
    const transport = createMemoryTransport({ 'example.org:1965': '2' })
    const { written, write } = capture()

    const exitCode = await run(defaults, { logger: pino({ level: 'silent' }), transport, write })

    expect(exitCode).toBe(1)
    expect(written).toEqual([{ stream: 'stderr', text: 'TRUNCATED_HEADER: Stream closed while reading the status code', exitCode: 1 }])
  })

  it('refuses a certificate without its key', async () => {
    const { written, write } = capture()

    const exitCode = await run({ ...defaults, cert: 'client.pem' }, { logger: pino({ level: 'silent' }), write })

    expect(exitCode).toBe(1)
    expect(written[0].text).toBe('Error: --cert and --key must be given together')
  })
})

describe('tlsOptionsFrom', () => {
  it('passes the trust setting through and reads no files by default', () => {
    expect(tlsOptionsFrom({ ...defaults, verify: true }))
      .toEqual({ rejectUnauthorized: true, ca: undefined, cert: undefined, key: undefined })
  })
})
