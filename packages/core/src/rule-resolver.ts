import {posix} from 'node:path'
import {KilnError} from './errors.js'
import type {ItemRep} from './item-rep.js'
import {patternMatcher} from './matcher.js'
import type {CompilationRule, FilterBinding, Item, Layout, RoutingRule, RuleSet, RuleSubject} from './types.js'

/**
 * Ordered, first-match lookups over an immutable rule set.
 *
 * Rule order is significant: when several rules match, the one declared first
 * is used. Layout filters are the exception: a layout must match exactly one
 * layout rule.
 */
export class RuleResolver {
  constructor(
    private readonly rules: RuleSet,
    private readonly layouts: readonly Layout[] = []
  ) {}

  /** Distinct rep names of every compilation rule matching the item, in rule order. */
  repNamesFor(item: Item): string[] {
    const names: string[] = []
    const subject = itemSubject(item)
    for (const rule of this.rules.compilation) {
      if (!names.includes(rule.rep) && rule.matcher.matches({...subject, rep: rule.rep})) {
        names.push(rule.rep)
      }
    }

    return names
  }

  compilationRuleFor(rep: ItemRep): CompilationRule {
    const subject = repSubject(rep)
    const rule = this.rules.compilation.find(r => r.rep === rep.name && r.matcher.matches(subject))
    if (!rule) {
      throw new KilnError('NO_MATCHING_COMPILATION_RULE', {identifier: rep.item.identifier, rep: rep.name})
    }

    return rule
  }

  routingRuleFor(rep: ItemRep): RoutingRule {
    const subject = repSubject(rep)
    const rule = this.rules.routing.find(r => r.rep === rep.name && r.matcher.matches(subject))
    if (!rule) {
      throw new KilnError('NO_MATCHING_ROUTING_RULE', {rep})
    }

    return rule
  }

  layoutFilterFor(layout: Layout): FilterBinding {
    const subject: RuleSubject = {identifier: layout.identifier, attributes: layout.attributes}
    const matching = this.rules.layoutFilters.filter(r => r.matcher.matches(subject))
    if (matching.length !== 1) {
      throw new KilnError('CANNOT_DETERMINE_FILTER', {
        layout: layout.identifier,
        matches: matching.map(r => r.matcher.source)
      })
    }

    const [rule] = matching
    return {filter: rule.filter, args: rule.args}
  }

  /** Exact identifier first, then the first layout matching it as a pattern. */
  layoutFor(identifierOrPattern: string): Layout {
    const exact = this.layouts.find(l => l.identifier === identifierOrPattern)
    if (exact) {
      return exact
    }

    const matcher = patternMatcher(identifierOrPattern)
    const layout = this.layouts.find(l => matcher.matches({identifier: l.identifier, attributes: l.attributes}))
    if (!layout) {
      throw new KilnError('UNKNOWN_LAYOUT', {layout: identifierOrPattern})
    }

    return layout
  }

  /**
   * Output path of a rep, or undefined when its routing rule says it is not
   * written.
   */
  outputPathFor(rep: ItemRep): string | undefined {
    const {path} = this.routingRuleFor(rep)
    const raw = typeof path === 'function' ? path(rep) : path
    if (raw === null) {
      return undefined
    }

    const expanded = expandPathTemplate(raw, rep)
    if (!expanded.startsWith('/') || expanded.split('/').includes('..')) {
      throw new KilnError('INVALID_ROUTE_PATH', {rep, path: expanded})
    }

    return expanded
  }
}

/**
 * Expands `:identifier`, `:dirname`, `:basename`, `:name`, `:extension` and
 * `:rep` in a route template, then collapses repeated slashes.
 *
 * For "/blog/first-post.md": identifier "blog/first-post.md", dirname "blog",
 * basename "first-post.md", name "first-post", extension "md".
 */
export function expandPathTemplate(template: string, rep: ItemRep): string {
  const identifier = rep.item.identifier.replace(/^\/+/, '')
  const dir = posix.dirname(identifier)
  const base = posix.basename(identifier)
  const ext = posix.extname(base)
  const tokens: Record<string, string> = {
    identifier,
    dirname: dir === '.' ? '' : dir,
    basename: base,
    name: ext ? base.slice(0, -ext.length) : base,
    extension: ext.replace(/^\./, ''),
    rep: rep.name
  }

  return template
    .replaceAll(/:(identifier|dirname|basename|name|extension|rep)\b/g, (_, token: string) => tokens[token])
    .replaceAll(/\/{2,}/g, '/')
}

function itemSubject(item: Item): RuleSubject {
  return {identifier: item.identifier, attributes: item.attributes}
}

function repSubject(rep: ItemRep): RuleSubject {
  return {identifier: rep.item.identifier, attributes: rep.item.attributes, rep: rep.name}
}
