import fs from 'fs'
import type { Logger } from 'pino'

import type { TlsOptions, Transport } from '@gemwire/protocol'

import { fetchResource } from './client'
import type { InputProvider } from './client'
import { normalizeResource } from './prompt'
import { renderError, renderOutcome } from './render'
import type { Rendered } from './render'

export interface RunOptions {
  host: string
  port: number
  resource: string
  timeout: number
  maxRedirects: number
  cert?: string
  key?: string
  ca?: string
  verify: boolean
}

export interface RunContext {
  logger: Logger
  askInput?: InputProvider
  transport?: Transport
  write: (rendered: Rendered) => void
}

const readPem = (file: string | undefined) => file ? fs.readFileSync(file) : undefined

export const tlsOptionsFrom = (options: RunOptions): TlsOptions => {
  if (Boolean(options.cert) !== Boolean(options.key)) {
    throw new Error('--cert and --key must be given together')
  }

  return {
    rejectUnauthorized: options.verify,
    ca: readPem(options.ca),
    cert: readPem(options.cert),
    key: readPem(options.key)
  }
}

/** Runs one fetch and prints its result. Resolves to the process exit code. */
export const run = async (options: RunOptions, context: RunContext): Promise<number> => {
  const { logger, askInput, transport, write } = context

  let rendered: Rendered
  try {
    const { url, outcome, hops } = await fetchResource({
      host: options.host,
      port: options.port,
      resource: normalizeResource(options.resource),
      maxRedirects: options.maxRedirects,
      timeout: options.timeout,
      tls: tlsOptionsFrom(options),
      askInput,
      transport,
      logger: logger.child({ module: 'protocol' })
    })
    if (hops) logger.debug(`Settled on ${url} after ${hops} follow-up requests`)
    rendered = renderOutcome(outcome, url)
  } catch (error) {
    logger.debug({ err: error }, 'exchange failed')
    rendered = renderError(error)
  }

  write(rendered)
  return rendered.exitCode
}
