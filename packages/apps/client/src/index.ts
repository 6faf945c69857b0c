import 'dotenv/config'

import { createProgram } from './cli'
import logger from './logger'
import { askInput, askResource } from './prompt'
import { run } from './run'
import type { Rendered } from './render'

const write = ({ stream, text }: Rendered) => {
  if (stream === 'stdout') process.stdout.write(text.endsWith('\n') ? text : `${text}\n`)
  else process.stderr.write(`${text}\n`)
}

const program = createProgram(async ({ host, resource, input, ...options }) => {
  process.exitCode = await run(
    { ...options, host, resource: resource ?? await askResource(host) },
    { logger, askInput: input ? askInput : undefined, write }
  )
})

program.parseAsync().catch(error => {
  logger.error(error)
  process.exitCode = 1
})
