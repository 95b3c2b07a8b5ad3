import type {ItemRep, ItemRepSet} from './item-rep.js'
import type {OutdatednessReason} from './reporter.js'
import type {CompilationState} from './state.js'

/** Checksums of the current run, shaped like the persisted ones. */
export type CurrentChecksums = Pick<CompilationState, 'items' | 'layouts' | 'rules'>

export type OutdatednessCheckerOptions = {
  previous: CompilationState;
  current: CurrentChecksums;
  reps: ItemRepSet;
  /** Reps whose routed output file is missing on disk. */
  missingOutputs?: ReadonlySet<ItemRep>;
}

/**
 * Decides which reps must be recompiled, by comparing the current run with
 * the state the previous run left behind.
 *
 * A rep is outdated when it has no stored snapshots, its item, compilation
 * rules or any layout it used changed, or its output file is gone. It is
 * also outdated when a rep whose content it read is outdated (transitively)
 * or gone, when an output path it read changed, and when it read the item
 * list and any item was added, removed or modified.
 */
export class OutdatednessChecker {
  private readonly reasons = new Map<ItemRep, OutdatednessReason | undefined>()
  private readonly visiting = new Set<ItemRep>()

  constructor(private readonly options: OutdatednessCheckerOptions) {}

  isOutdated(rep: ItemRep): boolean {
    return this.reasonFor(rep) !== undefined
  }

  reasonFor(rep: ItemRep): OutdatednessReason | undefined {
    if (this.reasons.has(rep)) {
      return this.reasons.get(rep)
    }

    // Stored edges come from a run that succeeded, so they are acyclic; this
    // only guards against a hand-edited state file.
    if (this.visiting.has(rep)) {
      return undefined
    }

    this.visiting.add(rep)
    const reason = this.computeReason(rep)
    this.visiting.delete(rep)
    this.reasons.set(rep, reason)
    return reason
  }

  private computeReason(rep: ItemRep): OutdatednessReason | undefined {
    const {previous, current, reps, missingOutputs} = this.options
    const {reference} = rep
    const identifier = rep.item.identifier

    if (!previous.snapshots[reference]?.last) {
      return 'not-compiled-before'
    }

    if (previous.items[identifier] !== current.items[identifier]) {
      return 'item-modified'
    }

    if (previous.rules[reference] !== current.rules[reference]) {
      return 'rules-modified'
    }

    for (const layout of previous.dependencies.layouts[reference] ?? []) {
      if (previous.layouts[layout] !== current.layouts[layout]) {
        return 'layout-modified'
      }
    }

    if (missingOutputs?.has(rep)) {
      return 'output-missing'
    }

    for (const producerReference of previous.dependencies.reps[reference] ?? []) {
      const producer = reps.getByReference(producerReference)
      if (!producer || this.reasonFor(producer) !== undefined) {
        return 'dependency-outdated'
      }
    }

    for (const [producerReference, path] of Object.entries(previous.dependencies.paths[reference] ?? {})) {
      const producer = reps.getByReference(producerReference)
      if (!producer || (producer.path ?? null) !== path) {
        return 'dependency-outdated'
      }
    }

    if (previous.dependencies.items.includes(reference) && !sameChecksums(previous.items, current.items)) {
      return 'dependency-outdated'
    }

    return undefined
  }
}

function sameChecksums(previous: Record<string, string>, current: Record<string, string>): boolean {
  const identifiers = Object.keys(current)
  return identifiers.length === Object.keys(previous).length
    && identifiers.every(identifier => previous[identifier] === current[identifier])
}
