import type {Content, Item} from './types.js'

export const defaultRepName = 'default'

/**
 * A named view of an item. The compilation engine is the only writer of its
 * snapshots: they are committed all at once when compilation succeeds.
 */
export class ItemRep {
  readonly snapshots = new Map<string, Content>()
  compiled = false
  /** Output path relative to the output directory; undefined when not written. */
  path: string | undefined

  constructor(
    readonly item: Item,
    readonly name: string = defaultRepName
  ) {}

  /** Whether the item's raw content is binary. */
  get binary(): boolean {
    return this.item.content.kind === 'binary'
  }

  /** Stable key used in persisted state. */
  get reference(): string {
    return repReference(this.item.identifier, this.name)
  }

  toString(): string {
    return `${this.item.identifier} (${this.name})`
  }
}

export function repReference(identifier: string, name: string): string {
  return `item:${identifier}:${name}`
}

/**
 * The reps of a compilation run, indexed by item identifier and rep name.
 */
export class ItemRepSet implements Iterable<ItemRep> {
  private readonly byReference = new Map<string, ItemRep>()

  constructor(reps: Iterable<ItemRep> = []) {
    for (const rep of reps) {
      this.add(rep)
    }
  }

  get size(): number {
    return this.byReference.size
  }

  add(rep: ItemRep): void {
    this.byReference.set(rep.reference, rep)
  }

  get(identifier: string, name: string = defaultRepName): ItemRep | undefined {
    return this.byReference.get(repReference(identifier, name))
  }

  getByReference(reference: string): ItemRep | undefined {
    return this.byReference.get(reference)
  }

  forItem(identifier: string): ItemRep[] {
    return [...this].filter(rep => rep.item.identifier === identifier)
  }

  [Symbol.iterator](): Iterator<ItemRep> {
    return this.byReference.values()
  }
}
