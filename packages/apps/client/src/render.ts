import { CODES, isCertificateError, isGeminiError, isTemporaryFailure, statusName } from '@gemwire/protocol'
import type { DispatchOutcome, StatusCode } from '@gemwire/protocol'

export interface Rendered {
  stream: 'stdout' | 'stderr'
  text: string
  exitCode: number
}

const explain = (status: StatusCode, detail: string) =>
  `${status} ${statusName(status)}${detail ? `: ${detail}` : ''}`

const failure = (text: string): Rendered => ({ stream: 'stderr', text, exitCode: 1 })

export const renderOutcome = (outcome: DispatchOutcome, url: string): Rendered => {
  switch (outcome.kind) {
    case 'body':
      return { stream: 'stdout', text: outcome.body, exitCode: 0 }
    case 'unsupported-media-type':
      return failure(`Cannot display ${outcome.mimeType || 'an untyped body'}: only text responses are supported`)
    case 'redirect':
      return failure(`${url} has moved ${outcome.permanent ? 'permanently' : 'temporarily'} to ${outcome.target}`)
    case 'input-requested':
      return failure(`${url} asks for ${outcome.sensitive ? 'sensitive ' : ''}input: ${outcome.prompt}`)
    case 'failure': {
      const { status, detail } = outcome
      if (status === CODES.FAIL_NOT_FOUND) return failure(`Not found: ${url}${detail ? ` (${detail})` : ''}`)
      if (status === CODES.FAIL_BAD_REQUEST) return failure(`The server rejected the request for ${url}: ${explain(status, detail)}`)
      if (isTemporaryFailure(status)) return failure(`Temporary failure, try again later: ${explain(status, detail)}`)
      if (isCertificateError(status)) return failure(`Client certificate problem, see --cert and --key: ${explain(status, detail)}`)
      return failure(`Permanent failure: ${explain(status, detail)}`)
    }
    case 'unhandled-status':
      return failure(`Unhandled status ${explain(outcome.status, '')}`)
  }
}

export const renderError = (error: unknown): Rendered => {
  if (isGeminiError(error)) return failure(`${error.code}: ${error.message}`)
  return failure(`Error: ${error instanceof Error ? error.message : String(error)}`)
}
