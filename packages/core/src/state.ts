import {Buffer} from 'node:buffer'
import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {z} from 'zod'
import type {SerializedDependencies} from './dependency-tracker.js'
import {binaryContent, textContent, type Content} from './types.js'

const serializedContentSchema = z.discriminatedUnion('kind', [
  z.object({kind: z.literal('text'), text: z.string()}),
  z.object({kind: z.literal('binary'), base64: z.string()})
])

/** Bumped whenever the shape below changes; older files are discarded. */
export const stateVersion = 2

const stateSchema = z.object({
  version: z.literal(stateVersion),
  items: z.record(z.string(), z.string()),
  layouts: z.record(z.string(), z.string()),
  rules: z.record(z.string(), z.string()),
  dependencies: z.object({
    reps: z.record(z.string(), z.array(z.string())),
    layouts: z.record(z.string(), z.array(z.string())),
    paths: z.record(z.string(), z.record(z.string(), z.string().nullable())),
    items: z.array(z.string())
  }),
  snapshots: z.record(z.string(), z.record(z.string(), serializedContentSchema))
})

export type SerializedContent = z.infer<typeof serializedContentSchema>

/**
 * What a compilation run leaves behind for the next one.
 *
 * - `items`, `layouts`: identifier → checksum
 * - `rules`: rep reference → rules checksum
 * - `dependencies`: edges, layouts used, output paths read and readers of
 *   the item list, by rep reference
 * - `snapshots`: rep reference → snapshot name → content
 */
export type CompilationState = {
  version: typeof stateVersion;
  items: Record<string, string>;
  layouts: Record<string, string>;
  rules: Record<string, string>;
  dependencies: SerializedDependencies;
  snapshots: Record<string, Record<string, SerializedContent>>;
}

export function emptyState(): CompilationState {
  return {
    version: stateVersion,
    items: {},
    layouts: {},
    rules: {},
    dependencies: {reps: {}, layouts: {}, paths: {}, items: []},
    snapshots: {}
  }
}

export function serializeContent(content: Content): SerializedContent {
  return content.kind === 'text'
    ? {kind: 'text', text: content.text}
    : {kind: 'binary', base64: Buffer.from(content.data).toString('base64')}
}

export function deserializeContent(serialized: SerializedContent): Content {
  return serialized.kind === 'text'
    ? textContent(serialized.text)
    : binaryContent(Buffer.from(serialized.base64, 'base64'))
}

/**
 * Persists the compilation state as state.json in the site's tmp directory.
 */
export class StateStore {
  readonly path: string

  constructor(tmpDir: string) {
    this.path = join(tmpDir, 'state.json')
  }

  /**
   * Loads the previous state. A missing, unreadable or outdated file yields
   * an empty state, which makes every rep outdated.
   */
  async load(): Promise<CompilationState> {
    let raw: unknown
    try {
      raw = JSON.parse(await readFile(this.path, 'utf8'))
    } catch {
      return emptyState()
    }

    const parsed = stateSchema.safeParse(raw)
    return parsed.success ? parsed.data : emptyState()
  }

  async save(state: CompilationState): Promise<void> {
    await mkdir(dirname(this.path), {recursive: true})
    await writeFile(this.path, JSON.stringify(state), 'utf8')
  }
}
