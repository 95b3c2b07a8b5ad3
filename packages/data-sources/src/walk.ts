import type {Dirent} from 'node:fs'
import {readdir} from 'node:fs/promises'
import {join, posix} from 'node:path'
import ignore from 'ignore'

/** Editor backups and OS droppings, never loaded. */
export const defaultExcludes = ['*~', '*.orig', '*.rej', '*.bak', '.DS_Store', '#*#', '.#*']

/**
 * Lists the files under `dir` as sorted posix paths relative to it, skipping
 * those matched by the gitignore-style `exclude` patterns. A missing
 * directory lists nothing.
 */
export async function listFiles(dir: string, exclude: readonly string[] = []): Promise<string[]> {
  const ig = ignore().add([...defaultExcludes, ...exclude])
  const files: string[] = []

  async function visit(relative: string): Promise<void> {
    let entries: Dirent[]
    try {
      entries = await readdir(join(dir, relative), {withFileTypes: true})
    } catch (error) {
      if (relative === '' && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return
      }

      throw error
    }

    for (const entry of entries) {
      const path = relative ? posix.join(relative, entry.name) : entry.name
      if (entry.isDirectory()) {
        if (!ig.ignores(`${path}/`)) {
          await visit(path)
        }
      } else if (entry.isFile() && !ig.ignores(path)) {
        files.push(path)
      }
    }
  }

  await visit('')
  return files.sort()
}

/** Extension without the dot, or '' when there is none. */
export function extensionOf(path: string): string {
  return posix.extname(path).replace(/^\./, '')
}

/** The path without its last extension: `blog/post.md` → `blog/post`. */
export function stripExtension(path: string): string {
  const extension = posix.extname(path)
  return extension ? path.slice(0, -extension.length) : path
}
