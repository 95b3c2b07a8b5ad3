import {isAbsolute, resolve} from 'node:path'
import {pathToFileURL} from 'node:url'
import type {ZodIssue} from 'zod'

/**
 * Imports a module from a file path or a package name. Relative paths
 * (./ ../) are resolved against basedir. Returns the module's default export.
 */
export async function importDefault(specifier: string, basedir: string): Promise<unknown> {
  const isPath = specifier.startsWith('./') || specifier.startsWith('../') || isAbsolute(specifier)
  const mod: unknown = isPath
    ? await import(pathToFileURL(resolve(basedir, specifier)).href)
    : await import(specifier)

  return typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** One line per issue: `compile.0.actions: Required`. */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}
