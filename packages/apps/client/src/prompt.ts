import { once } from 'events'
import { createInterface } from 'readline/promises'

export interface PromptStreams {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/**
 * Asks one question on the terminal; the answer goes to the caller, the
 * question to stderr. Input that ends before a line arrives answers ''.
 */
export const ask = async (question: string, streams: PromptStreams = {}): Promise<string> => {
  const { input = process.stdin, output = process.stderr } = streams
  const rl = createInterface({ input, output })
  let ended = false
  rl.once('close', () => { ended = true })
  const closed = once(rl, 'close').then(() => '')
  const answered = rl.question(question).catch((error: unknown) => {
    if (ended) return ''
    throw error
  })
  try {
    return await Promise.race([answered, closed])
  } finally {
    rl.close()
  }
}

/** An empty answer means the root; a missing leading slash is added. */
export const normalizeResource = (answer: string) => {
  const resource = answer.trim()
  if (!resource) return '/'
  return resource.startsWith('/') ? resource : `/${resource}`
}

export const askResource = async (host: string, streams?: PromptStreams) =>
  normalizeResource(await ask(`What resource do you want to access on ${host}? `, streams))

/** Input provider for 1x responses; an empty answer stops instead of re-requesting. */
export const askInput = async (prompt: string, sensitive: boolean, streams?: PromptStreams): Promise<string | null> => {
  const answer = await ask(`${prompt}${sensitive ? ' (sensitive, will be echoed)' : ''}: `, streams)
  return answer ? answer : null
}
