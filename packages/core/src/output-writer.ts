import {Buffer} from 'node:buffer'
import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import type {OutputAction} from './reporter.js'
import type {Content} from './types.js'

function toBuffer(content: Content): Buffer {
  return content.kind === 'text' ? Buffer.from(content.text, 'utf8') : Buffer.from(content.data)
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Writes compiled content to `outputDir` + `path`, leaving the file untouched
 * when its bytes are already identical.
 */
export async function writeOutput(outputDir: string, path: string, content: Content): Promise<OutputAction> {
  const target = join(outputDir, path)
  const data = toBuffer(content)

  let existing: Buffer | undefined
  try {
    existing = await readFile(target)
  } catch (error) {
    if (!isNotFound(error)) {
      throw error
    }
  }

  if (existing?.equals(data)) {
    return 'identical'
  }

  await mkdir(dirname(target), {recursive: true})
  await writeFile(target, data)
  return existing ? 'update' : 'create'
}

/** Resolves once every task has run, running at most `limit` at a time. */
export async function withConcurrency<T>(tasks: Array<() => Promise<T>>, limit: number): Promise<T[]> {
  const results: T[] = []
  let next = 0

  async function worker(): Promise<void> {
    while (next < tasks.length) {
      const index = next++
      results[index] = await tasks[index]()
    }
  }

  await Promise.all(Array.from({length: Math.max(1, Math.min(limit, tasks.length))}, async () => worker()))
  return results
}
