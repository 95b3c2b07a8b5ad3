import {performance} from 'node:perf_hooks'
import {detectCycle, DependencyTracker} from './dependency-tracker.js'
import {isKilnError, KilnError} from './errors.js'
import type {FilterRegistry} from './filter-registry.js'
import {defaultRepName, type ItemRep, type ItemRepSet} from './item-rep.js'
import {silentReporter, type Reporter, type OutdatednessReason} from './reporter.js'
import type {RuleResolver} from './rule-resolver.js'
import {
  binaryContent,
  textContent,
  type CompiledContentOptions,
  type Content,
  type Filter,
  type FilterAction,
  type FilterArgs,
  type FilterContext,
  type Item,
  type Layout,
  type LayoutAction
} from './types.js'

export type CompilationEngineOptions = {
  reps: ItemRepSet;
  items: readonly Item[];
  rules: RuleResolver;
  filters: FilterRegistry;
  tracker?: DependencyTracker;
  reporter?: Reporter;
  /** Why each rep is being compiled, for reporting. */
  reasons?: Map<ItemRep, OutdatednessReason>;
}

/** The in-progress stack of one compilation chain, outermost rep first. */
type Stack = readonly ItemRep[]

/**
 * Compiles item reps by running their compilation rule's actions.
 *
 * Compilation is depth-first and re-entrant: when a filter reads another
 * rep's compiled content, that rep is compiled on the spot with the current
 * stack extended. Each rep is compiled at most once per run; its snapshots
 * are committed only when every action succeeded.
 */
export class CompilationEngine {
  readonly tracker: DependencyTracker
  private readonly reps: ItemRepSet
  private readonly items: readonly Item[]
  private readonly rules: RuleResolver
  private readonly filters: FilterRegistry
  private readonly reporter: Reporter
  private readonly reasons: Map<ItemRep, OutdatednessReason>

  constructor(options: CompilationEngineOptions) {
    this.reps = options.reps
    this.items = options.items
    this.rules = options.rules
    this.filters = options.filters
    this.tracker = options.tracker ?? new DependencyTracker()
    this.reporter = options.reporter ?? silentReporter
    this.reasons = options.reasons ?? new Map()
  }

  /** Compiled content of a rep (its "last" snapshot), compiling it if needed. */
  compile(rep: ItemRep): Content {
    return this.compileRep(rep, [])
  }

  /** Compiles every rep of the run, in iteration order. */
  compileAll(): void {
    for (const rep of this.reps) {
      this.compile(rep)
    }
  }

  private compileRep(rep: ItemRep, stack: Stack): Content {
    if (rep.compiled) {
      return lastSnapshot(rep)
    }

    const active = [...stack, rep]
    const cycle = detectCycle(active)
    if (cycle) {
      throw new KilnError('DEPENDENCY_CYCLE', {cycle})
    }

    const started = performance.now()
    try {
      const snapshots = this.runActions(rep, active)
      for (const [name, content] of snapshots) {
        rep.snapshots.set(name, content)
      }

      rep.compiled = true
    } catch (error) {
      if (isKilnError(error, 'COMPILATION_FAILED')) {
        throw error
      }

      throw new KilnError('COMPILATION_FAILED', {rep, stack: active}, {cause: error})
    }

    this.reporter.emit({
      event: 'REP_COMPILED',
      rep: {identifier: rep.item.identifier, rep: rep.name},
      durationMs: Math.round(performance.now() - started),
      reason: this.reasons.get(rep)
    })

    return lastSnapshot(rep)
  }

  private runActions(rep: ItemRep, active: Stack): Map<string, Content> {
    const rule = this.rules.compilationRuleFor(rep)
    if (rep.binary && rule.actions.some(action => action.type === 'layout')) {
      throw new KilnError('CANNOT_LAYOUT_BINARY_ITEM', {rep})
    }

    const snapshots = new Map<string, Content>()
    let content = rep.item.content
    snapshots.set('raw', content)

    for (const action of rule.actions) {
      switch (action.type) {
        case 'filter': {
          content = this.applyFilter(rep, active, content, action)
          break
        }

        case 'layout': {
          if (!snapshots.has('pre')) {
            snapshots.set('pre', content)
          }

          content = this.applyLayout(rep, active, content, action)
          break
        }

        case 'snapshot': {
          snapshots.set(action.name, content)
          break
        }
      }
    }

    if (!snapshots.has('pre')) {
      snapshots.set('pre', content)
    }

    snapshots.set('last', content)
    return snapshots
  }

  private applyFilter(rep: ItemRep, active: Stack, content: Content, action: FilterAction): Content {
    const filter = this.filters.get(action.filter)
    const context = this.filterContext(rep, active)
    return runFilter(filter, content, action.args, context)
  }

  private applyLayout(rep: ItemRep, active: Stack, content: Content, action: LayoutAction): Content {
    const layout = this.rules.layoutFor(action.layout)
    const binding = this.rules.layoutFilterFor(layout)
    if (content.kind !== 'text') {
      throw new KilnError('CANNOT_LAYOUT_BINARY_ITEM', {rep})
    }

    const filter = this.filters.get(binding.filter)
    if (filter.from !== 'text') {
      throw new KilnError('CANNOT_USE_BINARY_FILTER', {rep, filter: filter.name})
    }

    this.tracker.recordLayout(rep, layout)
    const context = this.filterContext(rep, active, {layout, content: content.text})
    return runFilter(filter, textContent(layout.content), {...binding.args, ...action.args}, context)
  }

  private filterContext(rep: ItemRep, active: Stack, laidOut?: {layout: Layout; content: string}): FilterContext {
    const {item} = rep
    const assigns: Record<string, unknown> = {
      ...item.attributes,
      item: {...item.attributes, identifier: item.identifier},
      identifier: item.identifier,
      rep: rep.name,
      path: rep.path
    }

    if (laidOut) {
      assigns.content = laidOut.content
      assigns.layout = {...laidOut.layout.attributes, identifier: laidOut.layout.identifier}
    }

    const {items, tracker} = this
    return {
      rep,
      item,
      get items() {
        tracker.recordItems(rep)
        return items
      },
      layout: laidOut?.layout,
      assigns,
      compiledContent: (identifier, options) => this.readCompiledContent(rep, active, identifier, options),
      pathOf: (identifier, repName) => {
        const producer = this.findRep(identifier, repName ?? defaultRepName)
        this.tracker.recordPath(rep, producer)
        return producer.path
      }
    }
  }

  private readCompiledContent(consumer: ItemRep, active: Stack, identifier: string, options?: CompiledContentOptions): string {
    const producer = this.findRep(identifier, options?.rep ?? defaultRepName)

    if (this.tracker.wouldCycle(consumer, producer)) {
      const cycle = detectCycle([...active, producer])
      if (!cycle) {
        throw new KilnError('INTERNAL_INCONSISTENCY', {
          reason: `dependency graph has a cycle through ${producer.toString()} that the compilation stack does not show`
        })
      }

      throw new KilnError('DEPENDENCY_CYCLE', {cycle})
    }

    this.tracker.record(consumer, producer)
    this.compileRep(producer, active)

    const snapshot = options?.snapshot ?? 'last'
    const content = producer.snapshots.get(snapshot)
    if (!content) {
      throw new KilnError('NO_SUCH_SNAPSHOT', {rep: producer, snapshot})
    }

    if (content.kind !== 'text') {
      throw new KilnError('CANNOT_GET_COMPILED_CONTENT_OF_BINARY_ITEM', {rep: producer})
    }

    return content.text
  }

  private findRep(identifier: string, name: string): ItemRep {
    const rep = this.reps.get(identifier, name)
    if (!rep) {
      throw new KilnError('NO_SUCH_ITEM_REP', {identifier, rep: name})
    }

    return rep
  }
}

/**
 * Runs a filter after checking that the content has the kind the filter
 * accepts, and checks its output against the kind it declares.
 */
export function runFilter(filter: Filter, content: Content, args: FilterArgs, context: FilterContext): Content {
  const {rep} = context
  if (filter.from === 'text') {
    if (content.kind !== 'text') {
      throw new KilnError('CANNOT_USE_TEXTUAL_FILTER', {rep, filter: filter.name})
    }

    return wrapOutput(filter, filter.run(content.text, args, context), context)
  }

  if (content.kind !== 'binary') {
    throw new KilnError('CANNOT_USE_BINARY_FILTER', {rep, filter: filter.name})
  }

  return wrapOutput(filter, filter.run(content.data, args, context), context)
}

function wrapOutput(filter: Filter, output: string | Uint8Array, context: FilterContext): Content {
  if (filter.to === 'text' && typeof output === 'string') {
    return textContent(output)
  }

  if (filter.to === 'binary' && output instanceof Uint8Array) {
    return binaryContent(output)
  }

  throw new KilnError('FILTER_OUTPUT_MISMATCH', {rep: context.rep, filter: filter.name, expected: filter.to})
}

function lastSnapshot(rep: ItemRep): Content {
  const content = rep.snapshots.get('last')
  if (!content) {
    throw new KilnError('INTERNAL_INCONSISTENCY', {reason: `${rep.toString()} is compiled but has no "last" snapshot`})
  }

  return content
}
