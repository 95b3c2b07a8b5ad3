import type {Command} from 'commander'
import {KilnError, isKilnError, type ItemRep} from '@kiln/core'

export type GlobalOptions = {
  site: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

function describe(error: unknown): string {
  if (error instanceof KilnError) {
    return `${error.code}: ${error.message}`
  }

  return error instanceof Error ? `${error.name}: ${error.message}` : String(error)
}

function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = []
  let current = error instanceof Error ? error.cause : undefined
  while (current !== undefined && !chain.includes(current)) {
    chain.push(current)
    current = current instanceof Error ? current.cause : undefined
  }

  return chain
}

function formatStack(stack: readonly ItemRep[]): string[] {
  return stack.map(rep => `  - item ${rep.item.identifier}, rep "${rep.name}"`)
}

/**
 * Text printed when a command fails. Operator mistakes get a single
 * `Error: …` message; anything else gets a crash report with the cause
 * chain and the stack trace of the root cause.
 */
export function renderError(error: unknown): string {
  if (error instanceof KilnError && error.trivial) {
    const root = error.unwrap()
    return `Error: ${root instanceof Error ? root.message : String(root)}`
  }

  const lines = ['Crash report', '', `Message: ${describe(error)}`]

  if (isKilnError(error, 'COMPILATION_FAILED')) {
    lines.push('', 'Compilation stack:', ...formatStack(error.details.stack))
  }

  const causes = causeChain(error)
  if (causes.length > 0) {
    lines.push('', 'Caused by:', ...causes.map((cause, i) => `  ${i + 1}. ${describe(cause)}`))
  }

  const root = causes.length > 0 ? causes[causes.length - 1] : error
  if (root instanceof Error && root.stack) {
    const frames = root.stack.split('\n').filter(line => line.trimStart().startsWith('at '))
    if (frames.length > 0) {
      lines.push('', 'Stack trace:', ...frames.map(frame => `  ${frame.trim()}`))
    }
  }

  return lines.join('\n')
}
