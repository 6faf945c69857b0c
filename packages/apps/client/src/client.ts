import { DEFAULT_PORT, hostnameOf, performRequest } from '@gemwire/protocol'
import type { DispatchOutcome, ExchangeOptions } from '@gemwire/protocol'

export interface Target {
  host: string
  port: number
  resource: string
}

export interface InputProvider {
  (prompt: string, sensitive: boolean): Promise<string | null>
}

export interface FetchOptions extends ExchangeOptions, Target {
  /** Follow-up requests allowed for redirects and input, 0 to never follow. */
  maxRedirects?: number
  /** Asked on 1x responses; null or no provider reports the input request instead. */
  askInput?: InputProvider
}

export interface FetchResult {
  url: string
  outcome: DispatchOutcome
  hops: number
}

export const DEFAULT_MAX_REDIRECTS = 5

export const urlOf = ({ host, port, resource }: Target) =>
  `gemini://${host}${port === DEFAULT_PORT ? '' : `:${port}`}${resource}`

/** Resolves a redirect target against the current URL; null for anything that is not gemini. */
export const resolveTarget = (base: string, location: string): Target | null => {
  let url: URL
  try {
    url = new URL(location, base)
  } catch {
    return null
  }

  if (url.protocol !== 'gemini:' || !url.hostname) return null
  return {
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : DEFAULT_PORT,
    resource: (url.pathname || '/') + url.search
  }
}

export const withQuery = (resource: string, input: string) =>
  `${resource.split('?')[0]}?${encodeURIComponent(input)}`

/**
 * Requests a resource and applies the follow-up policy the protocol core
 * leaves to callers: redirects are followed and input is collected, each
 * counting against `maxRedirects`.
 */
export const fetchResource = async (options: FetchOptions): Promise<FetchResult> => {
  const { host, port, resource, maxRedirects = DEFAULT_MAX_REDIRECTS, askInput, ...exchange } = options
  const { logger } = exchange
  let target: Target = { host: hostnameOf(host), port, resource }

  for (let hops = 0; ; hops++) {
    const url = urlOf(target)
    const outcome = await performRequest(target.host, target.port, target.resource, exchange)
    const done = { url, outcome, hops }
    const followUp = outcome.kind === 'redirect' || (outcome.kind === 'input-requested' && askInput !== undefined)

    if (!followUp) return done
    if (hops >= maxRedirects) {
      logger?.warn(`Giving up after ${hops} follow-up requests`)
      return done
    }

    if (outcome.kind === 'redirect') {
      const next = resolveTarget(url, outcome.target)
      if (!next) {
        logger?.warn(`Not following redirect to ${outcome.target}`)
        return done
      }
      logger?.info(`Following ${outcome.permanent ? 'permanent' : 'temporary'} redirect to ${urlOf(next)}`)
      target = next
    } else if (outcome.kind === 'input-requested' && askInput) {
      const answer = await askInput(outcome.prompt, outcome.sensitive)
      if (answer === null) return done
      target = { ...target, resource: withQuery(target.resource, answer) }
    }
  }
}
