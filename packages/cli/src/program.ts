import {Command} from 'commander'
import {registerCompileCommand} from './commands/compile.js'
import {registerShowDataCommand} from './commands/show-data.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('kiln')
    .description('Static site compiler')
    .version('0.1.0')
    .option('-s, --site <dir>', 'Site directory', '.')
    .option('--json', 'Output structured JSON logs')

  registerCompileCommand(program)
  registerShowDataCommand(program)

  return program
}
