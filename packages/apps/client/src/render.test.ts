import { describe, expect, it } from 'vitest'

import { CODES, GeminiError } from '@gemwire/protocol'

import { renderError, renderOutcome } from './render'

const PAGE = 'gemini://example.org/page'

describe('renderOutcome', () => {
  it('prints a body on stdout', () => {
    expect(renderOutcome({ kind: 'body', status: 20, mimeType: 'text/gemini', body: '# Hi\n' }, PAGE))
      .toEqual({ stream: 'stdout', text: '# Hi\n', exitCode: 0 })
  })

  it('explains unsupported media types', () => {
    expect(renderOutcome({ kind: 'unsupported-media-type', status: 20, mimeType: 'image/png' }, PAGE))
      .toEqual({ stream: 'stderr', text: 'Cannot display image/png: only text responses are supported', exitCode: 1 })
  })

  it('reports redirects and input requests that were not followed', () => {
    expect(renderOutcome({ kind: 'redirect', status: 31, target: '/b', permanent: true }, PAGE).text)
      .toBe('gemini://example.org/page has moved permanently to /b')
    expect(renderOutcome({ kind: 'input-requested', status: 11, prompt: 'Password', sensitive: true }, PAGE).text)
      .toBe('gemini://example.org/page asks for sensitive input: Password')
  })

  it('has its own message for not found', () => {
    expect(renderOutcome({ kind: 'failure', status: CODES.FAIL_NOT_FOUND, detail: 'gone fishing' }, PAGE).text)
      .toBe('Not found: gemini://example.org/page (gone fishing)')
    expect(renderOutcome({ kind: 'failure', status: CODES.FAIL_NOT_FOUND, detail: '' }, PAGE).text)
      .toBe('Not found: gemini://example.org/page')
  })

  it('has its own message for bad requests', () => {
    expect(renderOutcome({ kind: 'failure', status: CODES.FAIL_BAD_REQUEST, detail: 'bad uri' }, PAGE).text)
      .toBe('The server rejected the request for gemini://example.org/page: 59 FAIL_BAD_REQUEST: bad uri')
  })

  it('tells temporary, permanent and certificate failures apart', () => {
    expect(renderOutcome({ kind: 'failure', status: CODES.FAIL_SLOW_DOWN, detail: 'slow down' }, PAGE))
      .toEqual({ stream: 'stderr', text: 'Temporary failure, try again later: 44 FAIL_SLOW_DOWN: slow down', exitCode: 1 })
    expect(renderOutcome({ kind: 'failure', status: CODES.FAIL_GONE, detail: 'bye' }, PAGE).text)
      .toBe('Permanent failure: 52 FAIL_GONE: bye')
    expect(renderOutcome({ kind: 'failure', status: CODES.CERTIFICATE_REQUIRED, detail: '' }, PAGE).text)
      .toBe('Client certificate problem, see --cert and --key: 60 CERTIFICATE_REQUIRED')
  })

  it('reports statuses it has no handling for', () => {
    expect(renderOutcome({ kind: 'unhandled-status', status: 20 }, PAGE).text).toBe('Unhandled status 20 SUCCESS')
  })
})

describe('renderError', () => {
  it('prefixes protocol errors with their code', () => {
    expect(renderError(new GeminiError('TIMEOUT', 'No data received for 10ms')))
      .toEqual({ stream: 'stderr', text: 'TIMEOUT: No data received for 10ms', exitCode: 1 })
  })

  it('prints other errors by message', () => {
    expect(renderError(new Error('boom')).text).toBe('Error: boom')
    expect(renderError('boom').text).toBe('Error: boom')
  })
})
