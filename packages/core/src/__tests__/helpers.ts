import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {CompilationEngine} from '../compilation-engine.js'
import {FilterRegistry} from '../filter-registry.js'
import {defaultFilters} from '../filters/index.js'
import {ItemRep, ItemRepSet} from '../item-rep.js'
import {patternMatcher} from '../matcher.js'
import type {CompileEvent, Reporter} from '../reporter.js'
import {RuleResolver} from '../rule-resolver.js'
import {
  binaryContent,
  textContent,
  type Action,
  type Attributes,
  type CompilationRule,
  type Content,
  type DataSourceFactory,
  type Filter,
  type FilterArgs,
  type FilterDefinition,
  type Item,
  type Layout,
  type LayoutFilterRule,
  type RouteTarget,
  type RoutingRule,
  type RuleSet
} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'kiln-test-'))
}

/**
 * Returns a reporter that records every event for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: CompileEvent[]} {
  const events: CompileEvent[] = []
  return {reporter: {emit: event => events.push(event)}, events}
}

export function textItem(identifier: string, text: string, attributes: Attributes = {}): Item {
  return {identifier, content: textContent(text), attributes}
}

export function binaryItem(identifier: string, bytes: number[], attributes: Attributes = {}): Item {
  return {identifier, content: binaryContent(new Uint8Array(bytes)), attributes}
}

export function layout(identifier: string, content: string, attributes: Attributes = {}): Layout {
  return {identifier, content, attributes}
}

// -- Rule builders ------------------------------------------------------------

export function compileRule(pattern: string, actions: Action[], rep = 'default'): CompilationRule {
  return {matcher: patternMatcher(pattern), rep, actions}
}

export function routeRule(pattern: string, path: RouteTarget, rep = 'default'): RoutingRule {
  return {matcher: patternMatcher(pattern), rep, path}
}

export function layoutRule(pattern: string, filter: string, args: FilterArgs = {}): LayoutFilterRule {
  return {matcher: patternMatcher(pattern), filter, args}
}

export function filter(name: string, args: FilterArgs = {}): Action {
  return {type: 'filter', filter: name, args}
}

export function applyLayout(name: string, args: FilterArgs = {}): Action {
  return {type: 'layout', layout: name, args}
}

export function snapshot(name: string): Action {
  return {type: 'snapshot', name}
}

export function ruleSet(rules: Partial<RuleSet>): RuleSet {
  return {compilation: [], routing: [], layoutFilters: [], ...rules}
}

// -- Filters ------------------------------------------------------------------

export const upperFilter: FilterDefinition<'text', 'text'> = {
  name: 'upper',
  from: 'text',
  to: 'text',
  run: input => input.toUpperCase()
}

export const wrapFilter: FilterDefinition<'text', 'text'> = {
  name: 'wrap',
  from: 'text',
  to: 'text',
  run: (input, args) => `${String(args.prefix ?? '')}${input}${String(args.suffix ?? '')}`
}

/** Appends the compiled content of the item named by the `reads` attribute. */
export const readFilter: FilterDefinition<'text', 'text'> = {
  name: 'read',
  from: 'text',
  to: 'text',
  run(input, _args, context) {
    const target = context.item.attributes.reads
    return typeof target === 'string' ? input + context.compiledContent(target) : input
  }
}

export const reverseBytesFilter: FilterDefinition<'binary', 'binary'> = {
  name: 'reverse-bytes',
  from: 'binary',
  to: 'binary',
  run: input => Uint8Array.from(input).reverse()
}

/** A text filter that counts its runs. */
export function countingFilter(name: string): {filter: FilterDefinition<'text', 'text'>; calls: () => number} {
  let calls = 0
  return {
    filter: {
      name,
      from: 'text',
      to: 'text',
      run(input) {
        calls++
        return input
      }
    },
    calls: () => calls
  }
}

export const testFilters: Filter[] = [upperFilter, wrapFilter, readFilter, reverseBytesFilter]

// -- Engine -------------------------------------------------------------------

export type EngineSetup = {
  items: Item[];
  layouts?: Layout[];
  rules: Partial<RuleSet>;
  filters?: Filter[];
  reporter?: Reporter;
}

/**
 * Builds the reps of every item (one per matching rep name) and an engine
 * over them, with the built-in and test filters registered.
 */
export function setupEngine(setup: EngineSetup): {engine: CompilationEngine; reps: ItemRepSet; resolver: RuleResolver} {
  const resolver = new RuleResolver(ruleSet(setup.rules), setup.layouts ?? [])
  const reps = new ItemRepSet()
  for (const item of setup.items) {
    for (const name of resolver.repNamesFor(item)) {
      reps.add(new ItemRep(item, name))
    }
  }

  const filters = new FilterRegistry([...defaultFilters.values(), ...testFilters, ...(setup.filters ?? [])])
  const engine = new CompilationEngine({reps, items: setup.items, rules: resolver, filters, reporter: setup.reporter})
  return {engine, reps, resolver}
}

/** Looks a rep up, failing loudly when the test set-up did not create it. */
export function repOf(reps: ItemRepSet, identifier: string, name = 'default'): ItemRep {
  const rep = reps.get(identifier, name)
  if (!rep) {
    throw new Error(`test set-up has no rep ${identifier} (${name})`)
  }

  return rep
}

export function textOf(content: Content | undefined): string | undefined {
  return content?.kind === 'text' ? content.text : undefined
}

// -- Data sources ---------------------------------------------------------------

/** In-process data source serving fixed items and layouts. */
export function memoryDataSource(items: Item[], layouts: Layout[] = [], type = 'memory'): DataSourceFactory {
  return {
    type,
    create: () => ({
      items: async () => items,
      layouts: async () => layouts
    })
  }
}
