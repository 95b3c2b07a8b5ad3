import pino from 'pino'

/** Reference to an item rep for display and keying purposes. */
export type RepRef = {
  identifier: string;
  rep: string;
}

export type OutputAction = 'create' | 'update' | 'identical'

export type OutdatednessReason =
  | 'forced'
  | 'not-compiled-before'
  | 'item-modified'
  | 'rules-modified'
  | 'layout-modified'
  | 'output-missing'
  | 'dependency-outdated'

/**
 * Discriminated union of compilation events.
 *
 * Lifecycle:
 * 1. COMPILE_START - reps are built and routed
 * 2. For each rep:
 *    a. REP_CACHED - compiled content reused from the previous run
 *       OR REP_COMPILED - filters ran (reason says why it was outdated)
 *    b. REP_WRITTEN - output file created, updated or left identical
 * 3. COMPILE_FINISHED
 *    OR COMPILE_FAILED - the run stopped on its first error
 */
export type CompileStartEvent = {
  event: 'COMPILE_START';
  siteRoot: string;
  items: number;
  reps: number;
}

export type RepCachedEvent = {
  event: 'REP_CACHED';
  rep: RepRef;
}

export type RepCompiledEvent = {
  event: 'REP_COMPILED';
  rep: RepRef;
  durationMs: number;
  reason?: OutdatednessReason;
}

export type RepWrittenEvent = {
  event: 'REP_WRITTEN';
  rep: RepRef;
  path: string;
  action: OutputAction;
  durationMs?: number;
}

export type CompileFinishedEvent = {
  event: 'COMPILE_FINISHED';
  durationMs: number;
  compiled: number;
  cached: number;
  written: Record<OutputAction, number>;
}

export type CompileFailedEvent = {
  event: 'COMPILE_FAILED';
  code?: string;
  message: string;
}

export type CompileEvent =
  | CompileStartEvent
  | RepCachedEvent
  | RepCompiledEvent
  | RepWrittenEvent
  | CompileFinishedEvent
  | CompileFailedEvent

/**
 * Interface for reporting compilation events.
 */
export type Reporter = {
  emit(event: CompileEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'})

  emit(event: CompileEvent): void {
    if (event.event === 'COMPILE_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }
}

export const silentReporter: Reporter = {
  emit() {/* noop */}
}
