import type {ItemRep, ItemRepSet} from './item-rep.js'
import type {Layout} from './types.js'

/** Dependency graph of a compilation run, keyed by rep reference. */
export type SerializedDependencies = {
  /** consumer reference → producer references */
  reps: Record<string, string[]>;
  /** consumer reference → layout identifiers */
  layouts: Record<string, string[]>;
  /** consumer reference → producer reference → output path read (null when not written) */
  paths: Record<string, Record<string, string | null>>;
  /** references of the reps that read the item list */
  items: string[];
}

/**
 * Records which reps read the compiled content or the output path of which
 * other reps during a run, which layouts each rep went through, and which
 * reps read the item list.
 *
 * Edges point from consumer to producer. The graph of a successful run is
 * acyclic; the engine detects cycles on its in-progress stack before an edge
 * could ever close one.
 */
export class DependencyTracker {
  private readonly producers = new Map<ItemRep, Set<ItemRep>>()
  private readonly layoutsUsed = new Map<ItemRep, Set<string>>()
  private readonly pathsRead = new Map<ItemRep, Map<ItemRep, string | undefined>>()
  private readonly itemsReaders = new Set<ItemRep>()

  record(consumer: ItemRep, producer: ItemRep): void {
    let set = this.producers.get(consumer)
    if (!set) {
      set = new Set()
      this.producers.set(consumer, set)
    }

    set.add(producer)
  }

  recordLayout(consumer: ItemRep, layout: Layout): void {
    let set = this.layoutsUsed.get(consumer)
    if (!set) {
      set = new Set()
      this.layoutsUsed.set(consumer, set)
    }

    set.add(layout.identifier)
  }

  /** Records that the consumer read the output path of the producer. */
  recordPath(consumer: ItemRep, producer: ItemRep): void {
    let paths = this.pathsRead.get(consumer)
    if (!paths) {
      paths = new Map()
      this.pathsRead.set(consumer, paths)
    }

    paths.set(producer, producer.path)
  }

  /** Records that the consumer read the site's item list. */
  recordItems(consumer: ItemRep): void {
    this.itemsReaders.add(consumer)
  }

  producersOf(rep: ItemRep): ItemRep[] {
    return [...(this.producers.get(rep) ?? [])]
  }

  consumersOf(rep: ItemRep): ItemRep[] {
    const consumers: ItemRep[] = []
    for (const [consumer, producers] of this.producers) {
      if (producers.has(rep)) {
        consumers.push(consumer)
      }
    }

    return consumers
  }

  layoutsUsedBy(rep: ItemRep): string[] {
    return [...(this.layoutsUsed.get(rep) ?? [])]
  }

  /**
   * Whether adding consumer → producer would close a cycle, i.e. the producer
   * is the consumer or already reaches it.
   */
  wouldCycle(consumer: ItemRep, producer: ItemRep): boolean {
    const seen = new Set<ItemRep>()
    const queue = [producer]

    while (queue.length > 0) {
      const current = queue.shift()
      if (current === undefined || seen.has(current)) {
        continue
      }

      if (current === consumer) {
        return true
      }

      seen.add(current)
      queue.push(...this.producersOf(current))
    }

    return false
  }

  serialize(): SerializedDependencies {
    const reps: Record<string, string[]> = {}
    for (const [consumer, producers] of this.producers) {
      reps[consumer.reference] = [...producers].map(p => p.reference).sort()
    }

    const layouts: Record<string, string[]> = {}
    for (const [consumer, identifiers] of this.layoutsUsed) {
      layouts[consumer.reference] = [...identifiers].sort()
    }

    const paths: Record<string, Record<string, string | null>> = {}
    for (const [consumer, read] of this.pathsRead) {
      paths[consumer.reference] = Object.fromEntries([...read].map(([producer, path]) => [producer.reference, path ?? null]))
    }

    const items = [...this.itemsReaders].map(rep => rep.reference).sort()
    return {reps, layouts, paths, items}
  }

  /**
   * Re-records the previous run's edges of a rep whose compiled content is
   * reused. Producers that no longer exist are dropped.
   */
  restore(rep: ItemRep, previous: SerializedDependencies, reps: ItemRepSet, layouts: readonly Layout[]): void {
    for (const reference of previous.reps[rep.reference] ?? []) {
      const producer = reps.getByReference(reference)
      if (producer) {
        this.record(rep, producer)
      }
    }

    for (const identifier of previous.layouts[rep.reference] ?? []) {
      const layout = layouts.find(l => l.identifier === identifier)
      if (layout) {
        this.recordLayout(rep, layout)
      }
    }

    for (const reference of Object.keys(previous.paths[rep.reference] ?? {})) {
      const producer = reps.getByReference(reference)
      if (producer) {
        this.recordPath(rep, producer)
      }
    }

    if (previous.items.includes(rep.reference)) {
      this.recordItems(rep)
    }
  }
}

/**
 * Finds the cycle closed by the last entry of an in-progress stack.
 *
 * When the last rep already occurs earlier in the stack, the cycle runs from
 * that first occurrence up to, but not including, the repeat:
 * `[A, B, C, B]` gives `[B, C]`, read as the ring B → C → B.
 */
export function detectCycle<T>(stack: readonly T[]): T[] | undefined {
  if (stack.length === 0) {
    return undefined
  }

  const last = stack[stack.length - 1]
  const start = stack.indexOf(last)
  if (start === stack.length - 1) {
    return undefined
  }

  return stack.slice(start, -1)
}
