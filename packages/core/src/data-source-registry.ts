import {KilnError} from './errors.js'
import type {DataSource, DataSourceFactory} from './types.js'
import {errorMessage, importDefault} from './utils.js'

export type DataSourceRegistryContext = {
  /** Built-in factories, keyed by type. */
  builtins?: ReadonlyMap<string, DataSourceFactory>;
  /** Factories provided programmatically. */
  factories?: DataSourceFactory[];
  /** Data source type → module specifier, from the site configuration. */
  aliases?: Record<string, string>;
  /** Base directory for relative specifiers. */
  cwd: string;
}

/**
 * Resolves a data source factory by type.
 *
 * Resolution order:
 * 1. Alias — `aliases[type]` → load the factory from that module
 * 2. Programmatic factories
 * 3. Built-ins
 */
export async function resolveDataSource(type: string, context: DataSourceRegistryContext): Promise<DataSourceFactory> {
  const alias = context.aliases?.[type]
  if (alias) {
    return loadExternalDataSource(type, alias, context.cwd)
  }

  const custom = context.factories?.find(factory => factory.type === type)
  if (custom) {
    return custom
  }

  const builtin = context.builtins?.get(type)
  if (builtin) {
    return builtin
  }

  const available = new Set([
    ...Object.keys(context.aliases ?? {}),
    ...(context.factories ?? []).map(factory => factory.type),
    ...(context.builtins?.keys() ?? [])
  ])
  throw new KilnError('UNKNOWN_DATA_SOURCE', {type, available: [...available].sort()})
}

/**
 * Loads a data source factory from a file path or package name. The module's
 * default export must have a `create` function; it is registered under `type`.
 */
export async function loadExternalDataSource(type: string, specifier: string, basedir: string): Promise<DataSourceFactory> {
  let exported: unknown
  try {
    exported = await importDefault(specifier, basedir)
  } catch (error) {
    throw new KilnError('PLUGIN_LOAD_FAILED', {kind: 'data source', name: type, specifier, reason: errorMessage(error)}, {cause: error})
  }

  if (typeof exported !== 'object' || exported === null || !('create' in exported) || typeof exported.create !== 'function') {
    throw new KilnError('PLUGIN_LOAD_FAILED', {
      kind: 'data source',
      name: type,
      specifier,
      reason: 'the default export must be a data source factory with a "create" function'
    })
  }

  const {create} = exported
  return {
    type,
    create(options) {
      const source: unknown = create.call(exported, options)
      if (!isDataSource(source)) {
        throw new KilnError('PLUGIN_LOAD_FAILED', {
          kind: 'data source',
          name: type,
          specifier,
          reason: 'create() must return an object with "items" and "layouts" functions'
        })
      }

      return source
    }
  }
}

export function isDataSource(value: unknown): value is DataSource {
  return typeof value === 'object'
    && value !== null
    && 'items' in value && typeof value.items === 'function'
    && 'layouts' in value && typeof value.layouts === 'function'
}
