import process from 'node:process'
import chalk, {type ChalkInstance} from 'chalk'
import {formatDuration, type CompileEvent, type OutputAction, type Reporter} from '@kiln/core'

export type TerminalReporterOptions = {
  stream?: {write(chunk: string): unknown};
  chalk?: ChalkInstance;
  /** Also list outputs that did not change. */
  verbose?: boolean;
}

/**
 * Human-readable progress on stderr: one line per written output, then a
 * summary.
 */
export class TerminalReporter implements Reporter {
  private readonly stream: {write(chunk: string): unknown}
  private readonly chalk: ChalkInstance
  private readonly verbose: boolean

  constructor(options: TerminalReporterOptions = {}) {
    this.stream = options.stream ?? process.stderr
    this.chalk = options.chalk ?? chalk
    this.verbose = options.verbose ?? false
  }

  emit(event: CompileEvent): void {
    switch (event.event) {
      case 'COMPILE_START': {
        this.print(this.chalk.bold(`Compiling site (${event.items} items, ${event.reps} reps)`))
        break
      }

      case 'REP_WRITTEN': {
        if (event.action !== 'identical' || this.verbose) {
          this.print(`  ${this.colorAction(event.action)}  ${event.path}`)
        }

        break
      }

      case 'COMPILE_FINISHED': {
        const {create, update, identical} = event.written
        this.print('')
        this.print(`Site compiled in ${formatDuration(event.durationMs)}: ${event.compiled} compiled, ${event.cached} cached; ${create} created, ${update} updated, ${identical} identical.`)
        break
      }

      default: {
        break
      }
    }
  }

  private colorAction(action: OutputAction): string {
    const label = action.padStart(9)
    switch (action) {
      case 'create': {
        return this.chalk.green(label)
      }

      case 'update': {
        return this.chalk.yellow(label)
      }

      case 'identical': {
        return this.chalk.gray(label)
      }
    }
  }

  private print(line: string): void {
    this.stream.write(`${line}\n`)
  }
}
