import type {ItemRep} from './item-rep.js'
import type {ContentKind} from './types.js'

/**
 * Structured payload carried by each error code. The human-readable message
 * is derived from it, so callers can always get at the identifiers involved.
 */
export type ErrorDetails = {
  UNKNOWN_DATA_SOURCE: {type: string; available: string[]};
  UNKNOWN_LAYOUT: {layout: string};
  CANNOT_DETERMINE_FILTER: {layout: string; matches: string[]};
  DEPENDENCY_CYCLE: {cycle: ItemRep[]};
  NO_RULES_FILE_FOUND: {siteRoot: string; candidates: string[]};
  NO_MATCHING_COMPILATION_RULE: {identifier: string; rep?: string};
  NO_MATCHING_ROUTING_RULE: {rep: ItemRep};
  CANNOT_LAYOUT_BINARY_ITEM: {rep: ItemRep};
  CANNOT_USE_TEXTUAL_FILTER: {rep: ItemRep; filter: string};
  CANNOT_USE_BINARY_FILTER: {rep: ItemRep; filter: string};
  AMBIGUOUS_METADATA_ASSOCIATION: {contentFilenames: string[]; metaFilename: string};
  COMPILATION_FAILED: {rep: ItemRep; stack: ItemRep[]};
  INTERNAL_INCONSISTENCY: {reason: string};
  UNKNOWN_FILTER: {filter: string; available: string[]};
  NO_SUCH_ITEM_REP: {identifier: string; rep: string};
  NO_SUCH_SNAPSHOT: {rep: ItemRep; snapshot: string};
  CANNOT_GET_COMPILED_CONTENT_OF_BINARY_ITEM: {rep: ItemRep};
  FILTER_OUTPUT_MISMATCH: {rep: ItemRep; filter: string; expected: ContentKind};
  DUPLICATE_IDENTIFIER: {identifier: string; kind: 'item' | 'layout'};
  DUPLICATE_OUTPUT_PATH: {path: string; reps: ItemRep[]};
  INVALID_ROUTE_PATH: {rep: ItemRep; path: string};
  INVALID_RULES: {file: string; issues: string[]};
  INVALID_CONFIG: {file: string; issues: string[]};
  PLUGIN_LOAD_FAILED: {kind: 'filter' | 'data source'; name: string; specifier: string; reason: string};
}

export type ErrorCode = keyof ErrorDetails

/** Codes that point at a bug rather than an operator mistake. */
const nonTrivialCodes = new Set<ErrorCode>(['INTERNAL_INCONSISTENCY', 'FILTER_OUTPUT_MISMATCH'])

function describeRep(rep: ItemRep): string {
  return `"${rep.item.identifier}" item (rep "${rep.name}")`
}

function formatCycle(cycle: ItemRep[]): string {
  const lines = ['The site cannot be compiled because there is a dependency cycle:', '']
  for (const [i, rep] of cycle.entries()) {
    lines.push(`    (${i + 1}) item ${rep.item.identifier}, rep "${rep.name}", uses compiled content of`)
  }

  lines.push(`${lines.pop() ?? ''} (1)`)
  return lines.join('\n')
}

const formatters: {[K in ErrorCode]: (details: ErrorDetails[K]) => string} = {
  UNKNOWN_DATA_SOURCE: ({type, available}) =>
    `The data source "${type}" does not exist. Available data sources: ${available.join(', ')}`,
  UNKNOWN_LAYOUT: ({layout}) => `The site does not have a layout matching "${layout}"`,
  CANNOT_DETERMINE_FILTER: ({layout, matches}) => matches.length === 0
    ? `The filter for the "${layout}" layout could not be determined: no layout rule matches it`
    : `The filter for the "${layout}" layout could not be determined: it matches several layout rules (${matches.join(', ')})`,
  DEPENDENCY_CYCLE: ({cycle}) => formatCycle(cycle),
  NO_RULES_FILE_FOUND: ({siteRoot, candidates}) =>
    `No rules file found in ${siteRoot}. Expected one of: ${candidates.join(', ')}`,
  NO_MATCHING_COMPILATION_RULE: ({identifier, rep}) => rep
    ? `No compilation rules were found for the "${identifier}" item (rep "${rep}")`
    : `No compilation rules were found for the "${identifier}" item`,
  NO_MATCHING_ROUTING_RULE: ({rep}) => `No routing rules were found for the ${describeRep(rep)}`,
  CANNOT_LAYOUT_BINARY_ITEM: ({rep}) =>
    `The ${describeRep(rep)} cannot be laid out because its content is binary. If it should be textual, add its extension to textExtensions in the site configuration`,
  CANNOT_USE_TEXTUAL_FILTER: ({rep, filter}) =>
    `The "${filter}" filter cannot be used to filter the ${describeRep(rep)}: textual filters cannot be applied to binary content`,
  CANNOT_USE_BINARY_FILTER: ({rep, filter}) =>
    `The "${filter}" filter cannot be used to filter the ${describeRep(rep)}: binary filters cannot be applied to textual content`,
  AMBIGUOUS_METADATA_ASSOCIATION: ({contentFilenames, metaFilename}) =>
    `There are multiple content files (${[...contentFilenames].sort().join(', ')}) that could match the metadata file ${metaFilename}`,
  COMPILATION_FAILED: ({rep}) => `Compilation of the ${describeRep(rep)} failed`,
  INTERNAL_INCONSISTENCY: ({reason}) => `Internal inconsistency: ${reason}`,
  UNKNOWN_FILTER: ({filter, available}) =>
    `Unknown filter: "${filter}". Available filters: ${available.join(', ')}`,
  NO_SUCH_ITEM_REP: ({identifier, rep}) => `The site has no "${identifier}" item with a rep "${rep}"`,
  NO_SUCH_SNAPSHOT: ({rep, snapshot}) => `The ${describeRep(rep)} has no snapshot "${snapshot}"`,
  CANNOT_GET_COMPILED_CONTENT_OF_BINARY_ITEM: ({rep}) =>
    `The compiled content of the ${describeRep(rep)} cannot be read as text because it is binary`,
  FILTER_OUTPUT_MISMATCH: ({rep, filter, expected}) =>
    `The "${filter}" filter declares ${expected} output but returned something else while filtering the ${describeRep(rep)}`,
  DUPLICATE_IDENTIFIER: ({identifier, kind}) => `Several ${kind}s have the identifier "${identifier}"`,
  DUPLICATE_OUTPUT_PATH: ({path, reps}) =>
    `Several item reps are routed to ${path}: ${reps.map(rep => describeRep(rep)).join(', ')}`,
  INVALID_ROUTE_PATH: ({rep, path}) => `The output path "${path}" of the ${describeRep(rep)} must start with a slash and stay inside the output directory`,
  INVALID_RULES: ({file, issues}) => `Invalid rules file ${file}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
  INVALID_CONFIG: ({file, issues}) => `Invalid configuration ${file}:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
  PLUGIN_LOAD_FAILED: ({kind, name, specifier, reason}) => `Failed to load ${kind} "${name}" from "${specifier}": ${reason}`
}

function formatMessage<C extends ErrorCode>(code: C, details: ErrorDetails[C]): string {
  const format: (details: ErrorDetails[C]) => string = formatters[code]
  return format(details)
}

export class KilnError<C extends ErrorCode = ErrorCode> extends Error {
  constructor(
    readonly code: C,
    readonly details: ErrorDetails[C],
    options?: {cause?: unknown}
  ) {
    super(formatMessage(code, details), options)
    this.name = 'KilnError'
  }

  /**
   * Trivial errors are operator mistakes (a missing rule, a cycle in the
   * content): a one-line message is enough. Anything else deserves a crash
   * report.
   */
  get trivial(): boolean {
    if (this.code === 'COMPILATION_FAILED') {
      const root = this.unwrap()
      return root instanceof KilnError && root.trivial
    }

    return !nonTrivialCodes.has(this.code)
  }

  /** Root cause behind any number of COMPILATION_FAILED wrappers. */
  unwrap(): unknown {
    let current: unknown = this
    while (current instanceof KilnError && current.code === 'COMPILATION_FAILED') {
      current = current.cause
    }

    return current
  }
}

export function isKilnError<C extends ErrorCode>(error: unknown, code?: C): error is KilnError<C> {
  return error instanceof KilnError && (code === undefined || error.code === code)
}
