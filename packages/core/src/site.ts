import process from 'node:process'
import {access} from 'node:fs/promises'
import {join, posix, resolve} from 'node:path'
import {performance} from 'node:perf_hooks'
import {checksumItem, checksumLayout, checksumRules} from './checksums.js'
import {CompilationEngine} from './compilation-engine.js'
import {parseConfig, type SiteConfig} from './config.js'
import {resolveDataSource} from './data-source-registry.js'
import {DependencyTracker} from './dependency-tracker.js'
import {KilnError, isKilnError} from './errors.js'
import {createFilterRegistry, type FilterRegistry} from './filter-registry.js'
import {ItemRep, ItemRepSet} from './item-rep.js'
import {OutdatednessChecker, type CurrentChecksums} from './outdatedness-checker.js'
import {withConcurrency, writeOutput} from './output-writer.js'
import {ConsoleReporter, type OutdatednessReason, type OutputAction, type Reporter} from './reporter.js'
import {RuleResolver} from './rule-resolver.js'
import {loadRules} from './rules-loader.js'
import {
  deserializeContent,
  emptyState,
  serializeContent,
  stateVersion,
  StateStore,
  type CompilationState
} from './state.js'
import type {Content, DataSourceFactory, Filter, Item, Layout, RuleSet} from './types.js'

const writeConcurrency = 8

export type SiteOptions = {
  /** Site directory (default: current directory). */
  root?: string;
  config?: SiteConfig;
  /** Built-in data source factories, keyed by type. */
  builtinDataSources?: ReadonlyMap<string, DataSourceFactory>;
  /** Extra data source factories; they take precedence over built-ins. */
  dataSources?: DataSourceFactory[];
  /** Extra filters; they take precedence over built-ins. */
  filters?: Filter[];
  /** Rules given programmatically instead of a rules file. */
  rules?: RuleSet;
  reporter?: Reporter;
}

export type CompileOptions = {
  /** Recompile every rep, ignoring the previous run's state. */
  force?: boolean;
}

export type CompiledRep = {
  identifier: string;
  rep: string;
  /** Output path, when the rep is written. */
  path?: string;
  content: Content;
  /** Why the rep was compiled; undefined when reused from the previous run. */
  reason?: OutdatednessReason;
  action?: OutputAction;
}

export type CompileResult = {
  reps: CompiledRep[];
  compiled: number;
  cached: number;
  written: Record<OutputAction, number>;
  durationMs: number;
}

/**
 * A loaded site: its configuration, items, layouts, rules and filters.
 *
 * `Site.load()` fails early on anything that can be checked before filters
 * run: unknown data sources, duplicate identifiers, an invalid rules file,
 * items without a compilation rule, reps without a routing rule and reps
 * routed to the same path.
 */
export class Site {
  static async load(options: SiteOptions = {}): Promise<Site> {
    const root = resolve(options.root ?? process.cwd())
    const config = options.config ?? parseConfig(undefined)

    const items: Item[] = []
    const layouts: Layout[] = []
    for (const dataSource of config.dataSources) {
      const factory = await resolveDataSource(dataSource.type, {
        builtins: options.builtinDataSources,
        factories: options.dataSources,
        aliases: config.dataSourceModules,
        cwd: root
      })
      const source = factory.create({
        siteRoot: root,
        itemsRoot: dataSource.itemsRoot,
        layoutsRoot: dataSource.layoutsRoot,
        textExtensions: config.textExtensions,
        config: dataSource.config
      })

      const [sourceItems, sourceLayouts] = await Promise.all([source.items(), source.layouts()])
      for (const item of sourceItems) {
        items.push(Object.freeze({...item, identifier: prefixIdentifier(dataSource.itemsRoot, item.identifier)}))
      }

      for (const layout of sourceLayouts) {
        layouts.push(Object.freeze({...layout, identifier: prefixIdentifier(dataSource.layoutsRoot, layout.identifier)}))
      }
    }

    assertUniqueIdentifiers(items, 'item')
    assertUniqueIdentifiers(layouts, 'layout')

    const rules = options.rules ?? (await loadRules(root, config.rulesFile)).rules
    const filters = await createFilterRegistry({aliases: config.filters, cwd: root, filters: options.filters})

    return new Site({
      root,
      config,
      items,
      layouts,
      rules,
      filters,
      reporter: options.reporter ?? new ConsoleReporter()
    })
  }

  readonly root: string
  readonly config: SiteConfig
  readonly items: readonly Item[]
  readonly layouts: readonly Layout[]
  readonly rules: RuleSet
  readonly resolver: RuleResolver
  readonly filters: FilterRegistry
  private readonly reporter: Reporter
  private readonly state: StateStore
  private currentReps: ItemRepSet

  private constructor(parts: {
    root: string;
    config: SiteConfig;
    items: Item[];
    layouts: Layout[];
    rules: RuleSet;
    filters: FilterRegistry;
    reporter: Reporter;
  }) {
    this.root = parts.root
    this.config = parts.config
    this.items = parts.items
    this.layouts = parts.layouts
    this.rules = parts.rules
    this.resolver = new RuleResolver(parts.rules, parts.layouts)
    this.filters = parts.filters
    this.reporter = parts.reporter
    this.state = new StateStore(resolve(this.root, this.config.tmpDir))
    this.currentReps = this.createReps()
  }

  get outputDir(): string {
    return resolve(this.root, this.config.outputDir)
  }

  /** Reps of the latest compilation, or freshly routed ones before any. */
  get reps(): ItemRepSet {
    return this.currentReps
  }

  /** State left behind by the previous successful compilation. */
  async loadState(): Promise<CompilationState> {
    return this.state.load()
  }

  async compile(options: CompileOptions = {}): Promise<CompileResult> {
    const started = performance.now()
    try {
      const result = await this.run(options, started)
      this.reporter.emit({
        event: 'COMPILE_FINISHED',
        durationMs: result.durationMs,
        compiled: result.compiled,
        cached: result.cached,
        written: result.written
      })
      return result
    } catch (error) {
      this.reporter.emit({
        event: 'COMPILE_FAILED',
        code: isKilnError(error) ? error.code : undefined,
        message: error instanceof Error ? error.message : String(error)
      })
      throw error
    }
  }

  private async run(options: CompileOptions, started: number): Promise<CompileResult> {
    const reps = this.createReps()
    this.currentReps = reps
    this.reporter.emit({event: 'COMPILE_START', siteRoot: this.root, items: this.items.length, reps: reps.size})

    const previous = options.force ? emptyState() : await this.state.load()
    const current = this.checksums(reps)
    const reasons = await this.outdatedReps(reps, previous, current, options.force === true)

    const tracker = new DependencyTracker()
    for (const rep of reps) {
      if (reasons.has(rep)) {
        continue
      }

      for (const [name, content] of Object.entries(previous.snapshots[rep.reference] ?? {})) {
        rep.snapshots.set(name, deserializeContent(content))
      }

      rep.compiled = true
      tracker.restore(rep, previous.dependencies, reps, this.layouts)
      this.reporter.emit({event: 'REP_CACHED', rep: {identifier: rep.item.identifier, rep: rep.name}})
    }

    const engine = new CompilationEngine({
      reps,
      items: this.items,
      rules: this.resolver,
      filters: this.filters,
      tracker,
      reporter: this.reporter,
      reasons
    })
    engine.compileAll()

    const actions = await this.writeOutputs(reps, engine)

    await this.state.save({
      ...current,
      version: stateVersion,
      dependencies: tracker.serialize(),
      snapshots: Object.fromEntries([...reps].map(rep => [
        rep.reference,
        Object.fromEntries([...rep.snapshots].map(([name, content]) => [name, serializeContent(content)]))
      ]))
    })

    const written: Record<OutputAction, number> = {create: 0, update: 0, identical: 0}
    for (const action of actions.values()) {
      written[action]++
    }

    return {
      reps: [...reps].map(rep => ({
        identifier: rep.item.identifier,
        rep: rep.name,
        path: rep.path,
        content: engine.compile(rep),
        reason: reasons.get(rep),
        action: actions.get(rep)
      })),
      compiled: reasons.size,
      cached: reps.size - reasons.size,
      written,
      durationMs: Math.round(performance.now() - started)
    }
  }

  /**
   * Builds one rep per rep name of each item's matching compilation rules and
   * routes it.
   */
  private createReps(): ItemRepSet {
    const reps = new ItemRepSet()
    const byPath = new Map<string, ItemRep[]>()

    for (const item of this.items) {
      const names = this.resolver.repNamesFor(item)
      if (names.length === 0) {
        throw new KilnError('NO_MATCHING_COMPILATION_RULE', {identifier: item.identifier})
      }

      for (const name of names) {
        const rep = new ItemRep(item, name)
        rep.path = this.resolver.outputPathFor(rep)
        reps.add(rep)

        if (rep.path !== undefined) {
          byPath.set(rep.path, [...(byPath.get(rep.path) ?? []), rep])
        }
      }
    }

    for (const [path, routed] of byPath) {
      if (routed.length > 1) {
        throw new KilnError('DUPLICATE_OUTPUT_PATH', {path, reps: routed})
      }
    }

    return reps
  }

  private checksums(reps: ItemRepSet): CurrentChecksums {
    const {layoutFilters} = this.rules
    return {
      items: Object.fromEntries(this.items.map(item => [item.identifier, checksumItem(item)])),
      layouts: Object.fromEntries(this.layouts.map(layout => [layout.identifier, checksumLayout(layout)])),
      rules: Object.fromEntries([...reps].map(rep => [
        rep.reference,
        checksumRules(this.resolver.compilationRuleFor(rep), layoutFilters)
      ]))
    }
  }

  private async outdatedReps(
    reps: ItemRepSet,
    previous: CompilationState,
    current: CurrentChecksums,
    force: boolean
  ): Promise<Map<ItemRep, OutdatednessReason>> {
    const reasons = new Map<ItemRep, OutdatednessReason>()
    if (force) {
      for (const rep of reps) {
        reasons.set(rep, 'forced')
      }

      return reasons
    }

    const missingOutputs = new Set<ItemRep>()
    for (const rep of reps) {
      if (rep.path !== undefined && !(await exists(join(this.outputDir, rep.path)))) {
        missingOutputs.add(rep)
      }
    }

    const checker = new OutdatednessChecker({previous, current, reps, missingOutputs})
    for (const rep of reps) {
      const reason = checker.reasonFor(rep)
      if (reason) {
        reasons.set(rep, reason)
      }
    }

    return reasons
  }

  private async writeOutputs(reps: ItemRepSet, engine: CompilationEngine): Promise<Map<ItemRep, OutputAction>> {
    const routed = [...reps].filter(rep => rep.path !== undefined)
    const actions = new Map<ItemRep, OutputAction>()

    await withConcurrency(routed.map(rep => async () => {
      const {path} = rep
      if (path === undefined) {
        return
      }

      const startedAt = performance.now()
      const action = await writeOutput(this.outputDir, path, engine.compile(rep))
      actions.set(rep, action)
      this.reporter.emit({
        event: 'REP_WRITTEN',
        rep: {identifier: rep.item.identifier, rep: rep.name},
        path,
        action,
        durationMs: Math.round(performance.now() - startedAt)
      })
    }), writeConcurrency)

    return actions
  }
}

/** Places an identifier returned by a data source under its configured root. */
export function prefixIdentifier(root: string, identifier: string): string {
  return posix.join('/', root, identifier)
}

function assertUniqueIdentifiers(entries: ReadonlyArray<{identifier: string}>, kind: 'item' | 'layout'): void {
  const seen = new Set<string>()
  for (const {identifier} of entries) {
    if (seen.has(identifier)) {
      throw new KilnError('DUPLICATE_IDENTIFIER', {identifier, kind})
    }

    seen.add(identifier)
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}
