// Site facade
export {Site, prefixIdentifier, type SiteOptions, type CompileOptions, type CompileResult, type CompiledRep} from './site.js'

// Content model
export {ItemRep, ItemRepSet, defaultRepName, repReference} from './item-rep.js'
export {textContent, binaryContent} from './types.js'
export type {
  ContentKind,
  TextContent,
  BinaryContent,
  Content,
  ContentPayload,
  Attributes,
  Item,
  Layout,
  RuleSubject,
  Matcher,
  FilterArgs,
  FilterAction,
  LayoutAction,
  SnapshotAction,
  Action,
  CompilationRule,
  RouteTarget,
  RoutingRule,
  LayoutFilterRule,
  RuleSet,
  FilterBinding,
  CompiledContentOptions,
  FilterContext,
  FilterDefinition,
  Filter,
  DataSourceOptions,
  DataSource,
  DataSourceFactory
} from './types.js'

// Rules
export {RuleResolver, expandPathTemplate} from './rule-resolver.js'
export {patternMatcher, conditionMatcher, allOf, buildMatcher} from './matcher.js'
export {findRulesFile, loadRules, parseRules, buildRuleSet, rulesFilenames, type RulesDefinition} from './rules-loader.js'

// Compilation
export {CompilationEngine, runFilter, type CompilationEngineOptions} from './compilation-engine.js'
export {DependencyTracker, detectCycle, type SerializedDependencies} from './dependency-tracker.js'

// Filters
export {FilterRegistry, createFilterRegistry, loadExternalFilter, isFilter, type FilterRegistryContext} from './filter-registry.js'
export {defaultFilters, markdownFilter, handlebarsFilter, dataUriFilter} from './filters/index.js'

// Data sources
export {resolveDataSource, loadExternalDataSource, isDataSource, type DataSourceRegistryContext} from './data-source-registry.js'

// Configuration
export {
  parseConfig,
  resolveEnvironment,
  defaultTextExtensions,
  type SiteConfig,
  type SiteConfigInput,
  type DataSourceConfig,
  type ParseConfigOptions
} from './config.js'

// Incremental compilation
export {checksumContent, checksumItem, checksumLayout, checksumRules, stableStringify} from './checksums.js'
export {StateStore, emptyState, stateVersion, serializeContent, deserializeContent, type CompilationState, type SerializedContent} from './state.js'
export {OutdatednessChecker, type OutdatednessCheckerOptions, type CurrentChecksums} from './outdatedness-checker.js'
export {writeOutput} from './output-writer.js'

// Reporting
export {ConsoleReporter, silentReporter} from './reporter.js'
export type {
  Reporter,
  RepRef,
  OutputAction,
  OutdatednessReason,
  CompileEvent,
  CompileStartEvent,
  RepCachedEvent,
  RepCompiledEvent,
  RepWrittenEvent,
  CompileFinishedEvent,
  CompileFailedEvent
} from './reporter.js'

// Utilities
export {formatDuration, formatIssues, errorMessage} from './utils.js'

// Errors
export {KilnError, isKilnError, type ErrorCode, type ErrorDetails} from './errors.js'
