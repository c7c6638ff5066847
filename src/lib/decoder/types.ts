export interface Enum {
  value: string
  description: string
}

export interface Field {
  number: string
  name: string
  enums: readonly Enum[]  // empty = free-form field
}

// Field with its coded values indexed by value string
export interface IndexedField extends Field {
  descriptions: ReadonlyMap<string, string>
}

export interface Dictionary {
  fields: ReadonlyMap<string, IndexedField>  // keyed by field number
}

export interface RawPair {
  tag: string
  value: string
}

export interface ResolvedField {
  tag: string
  tagName?: string
  value: string
  valueName?: string
}

// Structured schema input, as produced by parseFixXml or any other front end
export interface SchemaValue {
  enum: string
  description: string
}

export interface SchemaField {
  number: string
  name: string
  type?: string
  values?: SchemaValue[]
}

export interface SchemaSource {
  type?: string         // 'FIX' | 'FIXT'
  major?: string
  minor?: string
  servicepack?: string
  fields: SchemaField[]
}

export type SchemaProvider = SchemaSource | (() => SchemaSource)

export type Delimiter = '\x01' | '|'

export interface DecodeOptions {
  separator?: string     // appended after each decoded message
  stripPrefix?: boolean  // skip log text before the first 8= field
}
