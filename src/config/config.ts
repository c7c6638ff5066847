import { existsSync, readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { z } from 'zod'
import { ConfigError } from '../lib/decoder/errors'

export const DEFAULT_CONFIG_FILE = 'fixlog.config.json'

const configSchema = z.object({
  // version id → schema path, or bare paths whose version is read from the file
  dictionaries: z.union([
    z.record(z.string().trim().min(1)),
    z.array(z.string().trim().min(1)),
  ]),
  separator: z.string().default(''),
  stripPrefix: z.boolean().default(false),
})

export type FixLogConfig = z.infer<typeof configSchema>

export interface LoadedConfig {
  config: FixLogConfig
  baseDir: string  // relative dictionary paths resolve against this
}

export function parseConfig(raw: unknown): FixLogConfig {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config: ${issues}`)
  }
  return result.data
}

export function resolveConfigPath(explicit: string | undefined, cwd: string = process.cwd()): string {
  return resolve(cwd, explicit ?? process.env.FIXLOG_CONFIG ?? DEFAULT_CONFIG_FILE)
}

export function loadConfig(path: string): LoadedConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, err)
  }

  return { config: parseConfig(raw), baseDir: dirname(path) }
}
