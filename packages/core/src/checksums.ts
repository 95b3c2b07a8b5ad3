import {createHash} from 'node:crypto'
import type {CompilationRule, Content, Item, Layout, LayoutFilterRule} from './types.js'

/**
 * JSON with object keys sorted at every level, so that equal values always
 * hash the same.
 */
export function stableStringify(value: unknown): string {
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString())
  }

  if (Array.isArray(value)) {
    return `[${value.map(v => stableStringify(v)).join(',')}]`
  }

  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`)
    return `{${entries.join(',')}}`
  }

  return JSON.stringify(value) ?? 'null'
}

function updateContent(hash: ReturnType<typeof createHash>, content: Content): void {
  hash.update(content.kind)
  if (content.kind === 'text') {
    hash.update(content.text)
  } else {
    hash.update(content.data)
  }
}

export function checksumContent(content: Content): string {
  const hash = createHash('sha256')
  updateContent(hash, content)
  return hash.digest('hex')
}

/** SHA256 of the item's content kind, content and attributes. */
export function checksumItem(item: Item): string {
  const hash = createHash('sha256')
  updateContent(hash, item.content)
  hash.update(stableStringify(item.attributes))
  return hash.digest('hex')
}

export function checksumLayout(layout: Layout): string {
  const hash = createHash('sha256')
  hash.update(layout.content)
  hash.update(stableStringify(layout.attributes))
  return hash.digest('hex')
}

/**
 * Fingerprint of what decides a rep's compiled content besides its item and
 * its layouts: the compilation rule (matcher, actions) and the layout filter
 * rules.
 */
export function checksumRules(rule: CompilationRule, layoutFilters: readonly LayoutFilterRule[]): string {
  const hash = createHash('sha256')
  hash.update(stableStringify({
    matcher: rule.matcher.source,
    rep: rule.rep,
    actions: rule.actions,
    layoutFilters: layoutFilters.map(r => ({matcher: r.matcher.source, filter: r.filter, args: r.args}))
  }))
  return hash.digest('hex')
}
