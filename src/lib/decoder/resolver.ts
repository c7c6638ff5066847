import type { Dictionary, Field, IndexedField, RawPair, ResolvedField } from './types'
import type { DictionaryStore } from './store'

// BeginString carries the protocol version, e.g. FIX.4.4
export const VERSION_TAG = '8'

function isIndexed(field: Field): field is IndexedField {
  return 'descriptions' in field
}

export function resolveVersion(pairs: readonly RawPair[]): string | undefined {
  return pairs.find((p) => p.tag === VERSION_TAG)?.value
}

export function resolveField(dictionary: Dictionary | undefined, tag: string): IndexedField | undefined {
  return dictionary?.fields.get(tag)
}

export function resolveValueName(field: Field | undefined, rawValue: string): string | undefined {
  if (!field || field.enums.length === 0) return undefined
  if (isIndexed(field)) return field.descriptions.get(rawValue)
  return field.enums.find((e) => e.value === rawValue)?.description
}

export function resolvePair(dictionary: Dictionary | undefined, pair: RawPair): ResolvedField {
  const field = resolveField(dictionary, pair.tag)
  const resolved: ResolvedField = { tag: pair.tag, value: pair.value }
  if (field) resolved.tagName = field.name
  const valueName = resolveValueName(field, pair.value)
  if (valueName !== undefined) resolved.valueName = valueName
  return resolved
}

// Every pair yields exactly one ResolvedField, in input order
export function decode(pairs: readonly RawPair[], store: DictionaryStore): ResolvedField[] {
  const dictionary = store.lookup(resolveVersion(pairs))
  return pairs.map((pair) => resolvePair(dictionary, pair))
}
