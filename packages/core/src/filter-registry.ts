import {KilnError} from './errors.js'
import {defaultFilters} from './filters/index.js'
import type {Filter} from './types.js'
import {errorMessage, importDefault} from './utils.js'

export type FilterRegistryContext = {
  /** Filter name → module specifier, from the site configuration. */
  aliases?: Record<string, string>;
  /** Base directory for relative specifiers. */
  cwd: string;
  /** Filters provided programmatically. */
  filters?: Filter[];
}

/**
 * Filters available to a compilation run, keyed by name.
 */
export class FilterRegistry {
  private readonly filters: Map<string, Filter>

  constructor(filters: Iterable<Filter> = defaultFilters.values()) {
    this.filters = new Map([...filters].map(f => [f.name, f]))
  }

  get names(): string[] {
    return [...this.filters.keys()].sort()
  }

  has(name: string): boolean {
    return this.filters.has(name)
  }

  get(name: string): Filter {
    const filter = this.filters.get(name)
    if (!filter) {
      throw new KilnError('UNKNOWN_FILTER', {filter: name, available: this.names})
    }

    return filter
  }
}

/**
 * Builds the registry of a site.
 *
 * Precedence, highest first:
 * 1. Aliases from the configuration, loaded from their module
 * 2. Filters passed programmatically
 * 3. Built-in filters
 */
export async function createFilterRegistry(context?: FilterRegistryContext): Promise<FilterRegistry> {
  const filters = new Map(defaultFilters)

  for (const filter of context?.filters ?? []) {
    filters.set(filter.name, filter)
  }

  if (context?.aliases) {
    for (const [name, specifier] of Object.entries(context.aliases)) {
      filters.set(name, await loadExternalFilter(name, specifier, context.cwd))
    }
  }

  return new FilterRegistry(filters.values())
}

/**
 * Loads a filter from a file path or package name. The module's default
 * export must be a filter; it is registered under `name`.
 */
export async function loadExternalFilter(name: string, specifier: string, basedir: string): Promise<Filter> {
  let exported: unknown
  try {
    exported = await importDefault(specifier, basedir)
  } catch (error) {
    throw new KilnError('PLUGIN_LOAD_FAILED', {kind: 'filter', name, specifier, reason: errorMessage(error)}, {cause: error})
  }

  if (!isFilter(exported)) {
    throw new KilnError('PLUGIN_LOAD_FAILED', {
      kind: 'filter',
      name,
      specifier,
      reason: 'the default export must be a filter with "from", "to" and "run"'
    })
  }

  return {...exported, name}
}

function isContentKind(value: unknown): boolean {
  return value === 'text' || value === 'binary'
}

export function isFilter(value: unknown): value is Filter {
  return typeof value === 'object'
    && value !== null
    && 'from' in value && isContentKind(value.from)
    && 'to' in value && isContentKind(value.to)
    && 'run' in value && typeof value.run === 'function'
}
