import { createReadStream, existsSync } from 'node:fs'
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import { loadConfig, resolveConfigPath } from './config/config'
import { loadSchemaSources } from './config/sources'
import { DictionaryStore } from './lib/decoder/store'
import { decodeLine, resolveLine } from './lib/decoder/pipeline'
import { FixLogError } from './lib/decoder/errors'
import { logger } from './utils/logger'

export const USAGE = [
  'Usage:',
  '  fixlog decode [file] [--config <path>] [--json] [--separator <text>] [--strip-prefix]',
  '  fixlog versions [--config <path>]',
].join('\n')

export interface CliIO {
  stdin: Readable
  write(text: string): void
  writeError(text: string): void
}

interface CliOptions {
  command?: string
  file?: string
  config?: string
  json: boolean
  separator?: string
  stripPrefix: boolean
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { json: false, stripPrefix: false }
  const positional: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    switch (arg) {
      case '--config': options.config = requireValue(argv, ++i, arg); break
      case '--separator': options.separator = requireValue(argv, ++i, arg); break
      case '--json': options.json = true; break
      case '--strip-prefix': options.stripPrefix = true; break
      default:
        if (arg.startsWith('--')) throw new FixLogError(`Unknown option: ${arg}`)
        positional.push(arg)
    }
  }

  options.command = positional[0]
  options.file = positional[1]
  return options
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index]
  if (value === undefined) throw new FixLogError(`${flag} needs a value`)
  return value
}

function buildStore(configPath: string | undefined): { store: DictionaryStore; separator: string; stripPrefix: boolean } {
  const { config, baseDir } = loadConfig(resolveConfigPath(configPath))
  const store = DictionaryStore.load(loadSchemaSources(config, baseDir))
  logger.info(`Dictionaries loaded: ${store.versions().join(', ') || 'none'}`)
  return { store, separator: config.separator, stripPrefix: config.stripPrefix }
}

async function runDecode(options: CliOptions, io: CliIO): Promise<number> {
  const loaded = buildStore(options.config)
  const separator = options.separator ?? loaded.separator
  const stripPrefix = options.stripPrefix || loaded.stripPrefix

  if (options.file && !existsSync(options.file)) {
    throw new FixLogError(`Input file not found: ${options.file}`)
  }
  const input = options.file ? createReadStream(options.file, 'utf8') : io.stdin
  const lines = createInterface({ input, crlfDelay: Infinity })

  for await (const line of lines) {
    if (options.json) {
      const resolved = resolveLine(line, loaded.store, stripPrefix)
      if (resolved.length > 0) io.write(JSON.stringify(resolved) + '\n')
      continue
    }
    const formatted = decodeLine(line, loaded.store, stripPrefix)
    if (formatted.length === 0) continue
    io.write([...formatted, separator].join('\n') + '\n')
  }
  return 0
}

function runVersions(options: CliOptions, io: CliIO): number {
  const { store } = buildStore(options.config)
  for (const version of store.versions()) io.write(version + '\n')
  for (const failure of store.failures) io.writeError(`unavailable: ${failure.message}\n`)
  return store.failures.length > 0 ? 2 : 0
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  try {
    const options = parseArgs(argv)
    switch (options.command) {
      case 'decode': return await runDecode(options, io)
      case 'versions': return runVersions(options, io)
      default:
        io.writeError(USAGE + '\n')
        return 1
    }
  } catch (err) {
    if (err instanceof FixLogError) {
      io.writeError(`fixlog: ${err.message}\n`)
      return 1
    }
    throw err
  }
}
