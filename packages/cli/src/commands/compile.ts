import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {ConsoleReporter, Site} from '@kiln/core'
import {builtinDataSources} from '@kiln/data-sources'
import {loadConfig} from '../config.js'
import {TerminalReporter} from '../terminal-reporter.js'
import {getGlobalOptions} from '../utils.js'

export function registerCompileCommand(program: Command): void {
  program
    .command('compile')
    .description('Compile the site and write its output')
    .option('-f, --force', 'Recompile every item, ignoring the previous run')
    .option('--verbose', 'Also list outputs that did not change')
    .action(async (options: {force?: boolean; verbose?: boolean}, cmd: Command) => {
      const {site: siteArg, json} = getGlobalOptions(cmd)
      const root = resolve(siteArg)
      const config = await loadConfig(root)
      const reporter = json ? new ConsoleReporter() : new TerminalReporter({verbose: options.verbose})

      const site = await Site.load({root, config, builtinDataSources, reporter})
      const result = await site.compile({force: options.force})

      if (!json && result.compiled === 0 && result.written.create + result.written.update === 0) {
        console.error(chalk.gray('Nothing changed.'))
      }
    })
}
