export { decodeLine, decodeLines, resolveLine } from './pipeline'
export { DictionaryStore, loadStore, lookup } from './store'
export { buildDictionary } from './dictionary'
export { detectDelimiter, tokenize, extractMessage, SOH, PIPE } from './tokenizer'
export { decode, resolveVersion, resolveField, resolveValueName, VERSION_TAG } from './resolver'
export { format, formatMessage } from './formatter'
export { parseFixXml, schemaVersionId } from './fixXmlParser'
export { FixLogError, SchemaUnavailableError, ConfigError } from './errors'
export type {
  Enum,
  Field,
  IndexedField,
  Dictionary,
  RawPair,
  ResolvedField,
  SchemaField,
  SchemaSource,
  SchemaValue,
  SchemaProvider,
  Delimiter,
  DecodeOptions,
} from './types'
