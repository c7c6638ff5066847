import type { ResolvedField } from './types'

export function format(resolved: ResolvedField): string {
  return `> ${resolved.tagName ?? ''}[${resolved.tag}] = ${resolved.valueName ?? ''}[${resolved.value}]`
}

export function formatMessage(resolved: readonly ResolvedField[]): string[] {
  return resolved.map(format)
}
