// ---------------------------------------------------------------------------
// Site domain types.
//
// Shared by the compilation engine, the data sources and the CLI. Items and
// layouts are plain values; item reps live in item-rep.ts.
// ---------------------------------------------------------------------------

import type {ItemRep} from './item-rep.js'

// -- Content ----------------------------------------------------------------

export type ContentKind = 'text' | 'binary'

export type TextContent = {
  kind: 'text';
  text: string;
}

export type BinaryContent = {
  kind: 'binary';
  data: Uint8Array;
}

/** Compiled or raw content, always tagged with its kind. */
export type Content = TextContent | BinaryContent

/** Raw payload type for each content kind. */
export type ContentPayload = {
  text: string;
  binary: Uint8Array;
}

export function textContent(text: string): TextContent {
  return {kind: 'text', text}
}

export function binaryContent(data: Uint8Array): BinaryContent {
  return {kind: 'binary', data}
}

export type Attributes = Record<string, unknown>

// -- Items and layouts ------------------------------------------------------

export type Item = {
  /** Path-like identifier, e.g. "/blog/first-post.md". Unique within a site. */
  identifier: string;
  content: Content;
  attributes: Attributes;
}

export type Layout = {
  identifier: string;
  /** Raw, uncompiled layout source. */
  content: string;
  attributes: Attributes;
}

// -- Rules ------------------------------------------------------------------

/** What a rule's predicate sees. */
export type RuleSubject = {
  identifier: string;
  attributes: Attributes;
  /** Rep name, when matching on behalf of an item rep. */
  rep?: string;
}

export type Matcher = {
  /** Human-readable form, used in diagnostics. */
  source: string;
  matches(subject: RuleSubject): boolean;
}

export type FilterArgs = Record<string, unknown>

export type FilterAction = {type: 'filter'; filter: string; args: FilterArgs}
export type LayoutAction = {type: 'layout'; layout: string; args: FilterArgs}
export type SnapshotAction = {type: 'snapshot'; name: string}

export type Action = FilterAction | LayoutAction | SnapshotAction

export type CompilationRule = {
  matcher: Matcher;
  /** Rep this rule compiles (default: "default"). */
  rep: string;
  actions: Action[];
}

/** `null` means the rep is compiled but never written. */
export type RouteTarget = string | null | ((rep: ItemRep) => string | null)

export type RoutingRule = {
  matcher: Matcher;
  rep: string;
  path: RouteTarget;
}

export type LayoutFilterRule = {
  matcher: Matcher;
  filter: string;
  args: FilterArgs;
}

/** The three ordered rule lists of a site. Earlier rules win. */
export type RuleSet = {
  compilation: CompilationRule[];
  routing: RoutingRule[];
  layoutFilters: LayoutFilterRule[];
}

/** A layout filter resolved for a specific layout. */
export type FilterBinding = {
  filter: string;
  args: FilterArgs;
}

// -- Filters ----------------------------------------------------------------

export type CompiledContentOptions = {
  rep?: string;
  snapshot?: string;
}

/**
 * What a filter can see and do while it runs. Reading another rep's compiled
 * content compiles it on demand and records the dependency. Reading an output
 * path through `pathOf`, or the item list, is recorded as well.
 */
export type FilterContext = {
  rep: ItemRep;
  item: Item;
  items: readonly Item[];
  /** Set while a layout is being applied. */
  layout?: Layout;
  /** Values exposed to templates: item attributes, rep name, and `content` for layouts. */
  assigns: Record<string, unknown>;
  compiledContent(identifier: string, options?: CompiledContentOptions): string;
  pathOf(identifier: string, rep?: string): string | undefined;
}

export type FilterDefinition<From extends ContentKind, To extends ContentKind> = {
  name: string;
  from: From;
  to: To;
  run(input: ContentPayload[From], args: FilterArgs, context: FilterContext): ContentPayload[To];
}

export type Filter =
  | FilterDefinition<'text', 'text'>
  | FilterDefinition<'text', 'binary'>
  | FilterDefinition<'binary', 'text'>
  | FilterDefinition<'binary', 'binary'>

// -- Data sources -----------------------------------------------------------

export type DataSourceOptions = {
  /** Absolute path of the site directory. */
  siteRoot: string;
  /** Prefix added to every item identifier (default "/"). */
  itemsRoot: string;
  /** Prefix added to every layout identifier (default "/"). */
  layoutsRoot: string;
  /** Extensions (without dot) whose files are loaded as text. */
  textExtensions: string[];
  /** Data-source specific settings from the site configuration. */
  config: Record<string, unknown>;
}

/** Identifiers returned by a data source are relative to its roots. */
export type DataSource = {
  items(): Promise<Item[]>;
  layouts(): Promise<Layout[]>;
}

export type DataSourceFactory = {
  type: string;
  create(options: DataSourceOptions): DataSource;
}
