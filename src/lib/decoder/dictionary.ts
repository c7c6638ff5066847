import type { Dictionary, Enum, IndexedField, SchemaSource } from './types'
import { logger } from '../../utils/logger'

export function buildDictionary(source: SchemaSource): Dictionary {
  const fields = new Map<string, IndexedField>()

  for (const def of source.fields) {
    if (fields.has(def.number)) {
      logger.debug(`Duplicate definition for field ${def.number} (${def.name}) ignored`)
      continue
    }

    const enums: Enum[] = (def.values ?? []).map((v) => ({ value: v.enum, description: v.description }))
    const descriptions = new Map<string, string>()
    for (const e of enums) {
      // First description wins, same as scanning the list front to back
      if (!descriptions.has(e.value)) descriptions.set(e.value, e.description)
    }

    fields.set(def.number, Object.freeze({
      number: def.number,
      name: def.name,
      enums: Object.freeze(enums),
      descriptions,
    }))
  }

  return Object.freeze({ fields })
}
