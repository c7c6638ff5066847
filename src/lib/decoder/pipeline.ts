import type { DecodeOptions, ResolvedField } from './types'
import type { DictionaryStore } from './store'
import { extractMessage, tokenize } from './tokenizer'
import { decode } from './resolver'
import { formatMessage } from './formatter'

export function resolveLine(line: string, store: DictionaryStore, stripPrefix = false): ResolvedField[] {
  const text = stripPrefix ? extractMessage(line) : line
  return decode(tokenize(text), store)
}

export function decodeLine(line: string, store: DictionaryStore, stripPrefix = false): string[] {
  return formatMessage(resolveLine(line, store, stripPrefix))
}

export function decodeLines(
  lines: Iterable<string>,
  store: DictionaryStore,
  options: DecodeOptions = {},
): string[] {
  const separator = options.separator ?? ''
  const output: string[] = []

  for (const line of lines) {
    const formatted = decodeLine(line, store, options.stripPrefix)
    // Non-message lines produce no output, not even a separator
    if (formatted.length === 0) continue
    output.push(...formatted, separator)
  }

  return output
}
