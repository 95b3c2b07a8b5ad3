import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import type {DataSourceOptions} from '@kiln/core'
import {defaultTextExtensions} from '@kiln/core'

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'kiln-test-'))
}

/** Writes files given as relative path → content under `root`. */
export async function writeTree(root: string, files: Record<string, string | Uint8Array>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path)
    await mkdir(dirname(target), {recursive: true})
    await writeFile(target, content)
  }
}

export function sourceOptions(siteRoot: string, config: Record<string, unknown> = {}): DataSourceOptions {
  return {siteRoot, itemsRoot: '/', layoutsRoot: '/', textExtensions: defaultTextExtensions, config}
}
