import type { Delimiter, RawPair } from './types'

export const SOH: Delimiter = '\x01'
export const PIPE: Delimiter = '|'

// Checked in order; the first one present in the line wins
const DELIMITERS: readonly Delimiter[] = [SOH, PIPE]

const BEGIN_STRING_RE = /(?:^|[^A-Za-z0-9])8=/

export function detectDelimiter(line: string): Delimiter | undefined {
  return DELIMITERS.find((d) => line.includes(d))
}

export function tokenize(line: string): RawPair[] {
  const delimiter = detectDelimiter(line)
  if (!delimiter) return []

  const pairs: RawPair[] = []
  for (const segment of line.split(delimiter)) {
    if (segment.length === 0) continue
    const eq = segment.indexOf('=')
    if (eq === -1) continue  // malformed token, skipped
    pairs.push({ tag: segment.slice(0, eq), value: segment.slice(eq + 1) })
  }
  return pairs
}

/**
 * Drops log text ahead of the message, e.g. a timestamp or session tag,
 * so the first pair is the 8= BeginString field. Lines without one come
 * back unchanged.
 */
export function extractMessage(line: string): string {
  const match = BEGIN_STRING_RE.exec(line)
  if (!match) return line
  return line.slice(match.index + match[0].length - 2)
}
