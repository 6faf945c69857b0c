import { GeminiError } from './errors'

export const CODES = {
  REQUEST_INPUT: 10,
  REQUEST_PASSWORD: 11,
  SUCCESS: 20,
  REDIRECT_TEMPORARY: 30,
  REDIRECT_PERMANENT: 31,
  FAIL_TEMPORARY: 40,
  FAIL_SERVER_UNAVAILABLE: 41,
  FAIL_CGI_ERROR: 42,
  FAIL_PROXY_ERROR: 43,
  FAIL_SLOW_DOWN: 44,
  FAIL_PERMANENT: 50,
  FAIL_NOT_FOUND: 51,
  FAIL_GONE: 52,
  FAIL_PROXY_REQUEST_REFUSED: 53,
  FAIL_BAD_REQUEST: 59,
  CERTIFICATE_REQUIRED: 60,
  CERTIFICATE_NOT_AUTHORIZED: 61,
  CERTIFICATE_INVALID: 62
} as const

export type StatusName = keyof typeof CODES
export type StatusCode = typeof CODES[StatusName]

export type StatusBand =
  | 'input'
  | 'success'
  | 'redirect'
  | 'temporary-failure'
  | 'permanent-failure'
  | 'certificate-error'

const isStatusName = (key: string): key is StatusName => key in CODES

const NAMES = new Map<number, StatusName>()
for (const [key, code] of Object.entries(CODES)) {
  if (isStatusName(key)) NAMES.set(code, key)
}

export const isStatusCode = (raw: number): raw is StatusCode => NAMES.has(raw)

/** The only way from a wire integer to a StatusCode. */
export const decodeStatus = (raw: number): StatusCode => {
  if (!isStatusCode(raw)) throw new GeminiError('UNKNOWN_STATUS', `Unknown status code: ${raw}`)
  return raw
}

export const statusName = (code: StatusCode): StatusName => {
  const name = NAMES.get(code)
  if (!name) throw new GeminiError('UNKNOWN_STATUS', `Unknown status code: ${code}`)
  return name
}

const inBand = (code: StatusCode, tens: number) => code >= tens && code <= tens + 9

export const isInputRequired = (code: StatusCode) => inBand(code, 10)
export const isSuccess = (code: StatusCode) => inBand(code, 20)
export const isRedirect = (code: StatusCode) => inBand(code, 30)
export const isTemporaryFailure = (code: StatusCode) => inBand(code, 40)
export const isPermanentFailure = (code: StatusCode) => inBand(code, 50)
export const isCertificateError = (code: StatusCode) => inBand(code, 60)

export const statusBand = (code: StatusCode): StatusBand => {
  if (isInputRequired(code)) return 'input'
  if (isSuccess(code)) return 'success'
  if (isRedirect(code)) return 'redirect'
  if (isTemporaryFailure(code)) return 'temporary-failure'
  if (isPermanentFailure(code)) return 'permanent-failure'
  return 'certificate-error'
}
