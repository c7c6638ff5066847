import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import type { SchemaProvider, SchemaSource } from '../lib/decoder/types'
import { parseFixXml, schemaVersionId } from '../lib/decoder/fixXmlParser'
import type { FixLogConfig } from './config'
import { logger } from '../utils/logger'

export function readSchemaFile(path: string): SchemaSource {
  return parseFixXml(readFileSync(path, 'utf8'))
}

function failingProvider(err: unknown): () => SchemaSource {
  return () => {
    throw err
  }
}

/**
 * Turns the configured dictionaries into providers for DictionaryStore.load.
 * Keyed entries are read lazily, so an unreadable file only surfaces when the
 * store is built. Path-only entries have to be read here to learn their
 * version; one that fails is keyed by its path instead.
 */
export function loadSchemaSources(config: FixLogConfig, baseDir: string): Record<string, SchemaProvider> {
  const sources: Record<string, SchemaProvider> = {}

  if (!Array.isArray(config.dictionaries)) {
    for (const [versionId, path] of Object.entries(config.dictionaries)) {
      const fullPath = resolve(baseDir, path)
      sources[versionId] = () => readSchemaFile(fullPath)
    }
    return sources
  }

  for (const path of config.dictionaries) {
    const fullPath = resolve(baseDir, path)
    let source: SchemaSource
    try {
      source = readSchemaFile(fullPath)
    } catch (err) {
      sources[fullPath] = failingProvider(err)
      continue
    }

    const versionId = schemaVersionId(source)
    if (!versionId) {
      sources[fullPath] = failingProvider(new Error('No type/major/minor on <fix> root, cannot tell its version'))
      continue
    }
    if (versionId in sources) {
      logger.warn(`${fullPath} also declares ${versionId}; keeping the first one`)
      continue
    }
    sources[versionId] = source
  }

  return sources
}
