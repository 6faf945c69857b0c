import { Command, InvalidArgumentError, Option } from 'commander'

import { DEFAULT_PORT } from '@gemwire/protocol'

import { DEFAULT_MAX_REDIRECTS } from './client'

export const DEFAULT_TIMEOUT = 30000

export interface CliArguments {
  host: string
  resource?: string
  port: number
  timeout: number
  maxRedirects: number
  cert?: string
  key?: string
  ca?: string
  verify: boolean
  input: boolean
}

export const integer = (name: string) => (value: string) => {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`)
  return parseInt(value, 10)
}

const integerOption = (flags: string, description: string, env: string, name: string, fallback: number) =>
  new Option(flags, description).env(env).argParser(integer(name)).default(fallback)

/**
 * Builds the command line. Environment defaults are parsed by commander with
 * the flags, so a bad value is reported like a bad argument.
 */
export const createProgram = (handler: (args: CliArguments) => Promise<void>) => new Command()
  .name('gemwire')
  .description('Fetch a resource over the Gemini protocol and print it')
  .version(process.env.VERSION || '?.?.?')
  .argument('[host]', 'host to connect to, with or without the gemini:// scheme', process.env.GEMINI_HOST || 'geminiprotocol.net')
  .argument('[resource]', 'path and query to request, asked for on stdin when omitted')
  .addOption(integerOption('-p, --port <number>', 'port the server listens on', 'GEMINI_PORT', 'port', DEFAULT_PORT))
  .addOption(integerOption('-t, --timeout <ms>', 'connect and read timeout', 'GEMINI_TIMEOUT', 'timeout', DEFAULT_TIMEOUT))
  .addOption(integerOption('-r, --max-redirects <number>', 'redirects and input prompts to follow', 'GEMINI_MAX_REDIRECTS', 'max-redirects', DEFAULT_MAX_REDIRECTS))
  .addOption(new Option('--cert <path>', 'client certificate (PEM)').env('GEMINI_CERT'))
  .addOption(new Option('--key <path>', 'client certificate key (PEM)').env('GEMINI_KEY'))
  .addOption(new Option('--ca <path>', 'extra trusted CA certificate (PEM)').env('GEMINI_CA'))
  .option('--verify', 'reject servers whose certificate is not trusted', process.env.GEMINI_VERIFY === 'true')
  .option('--no-input', 'report input requests instead of prompting')
  .action(async (host: string, resource: string | undefined, options: Omit<CliArguments, 'host' | 'resource'>) => {
    await handler({ ...options, host, resource })
  })
