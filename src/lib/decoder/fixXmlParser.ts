import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { SchemaField, SchemaSource, SchemaValue } from './types'

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  isArray: (name) => ['field', 'value'].includes(name),
})

type XmlNode = Record<string, unknown>

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node[`@_${name}`]
  return typeof value === 'string' ? value : undefined
}

function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name]
  return Array.isArray(value) ? value.filter(isNode) : []
}

function parseValues(fieldEl: XmlNode): SchemaValue[] {
  const values: SchemaValue[] = []
  for (const valueEl of children(fieldEl, 'value')) {
    const value = attr(valueEl, 'enum')
    if (value === undefined) continue
    values.push({ enum: value, description: attr(valueEl, 'description') ?? '' })
  }
  return values
}

/**
 * Reads a FIX repository dictionary (the `<fix><fields><field number name>`
 * layout with `<value enum description/>` children) into a SchemaSource.
 * Only the `<fields>` section is consulted; header, trailer, messages and
 * components describe structure, which decoding ignores.
 */
export function parseFixXml(xmlText: string): SchemaSource {
  const validation = XMLValidator.validate(xmlText)
  if (validation !== true) {
    throw new Error(`Invalid XML: ${validation.err.msg} (line ${validation.err.line})`)
  }

  const doc: unknown = parser.parse(xmlText)
  const root = isNode(doc) ? doc.fix : undefined
  if (!isNode(root)) {
    throw new Error('Missing <fix> root element')
  }

  const fields: SchemaField[] = []
  const fieldsEl = root.fields
  if (isNode(fieldsEl)) {
    for (const fieldEl of children(fieldsEl, 'field')) {
      const number = attr(fieldEl, 'number')
      const name = attr(fieldEl, 'name')
      if (!number || !name) {
        throw new Error(`Field definition missing number or name: ${JSON.stringify(fieldEl)}`)
      }
      const values = parseValues(fieldEl)
      fields.push({
        number,
        name,
        type: attr(fieldEl, 'type'),
        ...(values.length > 0 ? { values } : {}),
      })
    }
  }

  return {
    type: attr(root, 'type'),
    major: attr(root, 'major'),
    minor: attr(root, 'minor'),
    servicepack: attr(root, 'servicepack'),
    fields,
  }
}

// The id a message built against this schema carries in tag 8
export function schemaVersionId(source: SchemaSource): string | undefined {
  if (!source.type || source.major === undefined || source.minor === undefined) return undefined
  const base = `${source.type}.${source.major}.${source.minor}`
  const sp = source.servicepack !== undefined ? parseInt(source.servicepack, 10) : 0
  return sp > 0 ? `${base}SP${sp}` : base
}
