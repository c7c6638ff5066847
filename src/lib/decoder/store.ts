import type { Dictionary, SchemaProvider, SchemaSource } from './types'
import { buildDictionary } from './dictionary'
import { SchemaUnavailableError } from './errors'
import { logger } from '../../utils/logger'

function readProvider(provider: SchemaProvider): SchemaSource {
  return typeof provider === 'function' ? provider() : provider
}

/**
 * One Dictionary per protocol version id (the value carried in tag 8).
 * Built once by `load`; nothing mutates it afterwards, so a single instance
 * can back any number of decode calls.
 */
export class DictionaryStore {
  private readonly dictionaries: ReadonlyMap<string, Dictionary>
  readonly failures: readonly SchemaUnavailableError[]

  private constructor(dictionaries: Map<string, Dictionary>, failures: SchemaUnavailableError[]) {
    this.dictionaries = dictionaries
    this.failures = Object.freeze(failures)
    Object.freeze(this)
  }

  static empty(): DictionaryStore {
    return new DictionaryStore(new Map(), [])
  }

  // A source that cannot be read or built leaves its version out of the store
  static load(sources: Record<string, SchemaProvider>): DictionaryStore {
    const dictionaries = new Map<string, Dictionary>()
    const failures: SchemaUnavailableError[] = []

    for (const [versionId, provider] of Object.entries(sources)) {
      try {
        const dictionary = buildDictionary(readProvider(provider))
        dictionaries.set(versionId, dictionary)
        logger.debug(`Loaded ${dictionary.fields.size} fields for ${versionId}`)
      } catch (err) {
        const failure = new SchemaUnavailableError(versionId, err)
        logger.warn(failure.message)
        failures.push(failure)
      }
    }

    return new DictionaryStore(dictionaries, failures)
  }

  lookup(versionId: string | undefined): Dictionary | undefined {
    if (versionId === undefined) return undefined
    return this.dictionaries.get(versionId)
  }

  has(versionId: string): boolean {
    return this.dictionaries.has(versionId)
  }

  versions(): string[] {
    return [...this.dictionaries.keys()].sort()
  }
}

export function loadStore(sources: Record<string, SchemaProvider>): DictionaryStore {
  return DictionaryStore.load(sources)
}

export function lookup(store: DictionaryStore, versionId: string | undefined): Dictionary | undefined {
  return store.lookup(versionId)
}
