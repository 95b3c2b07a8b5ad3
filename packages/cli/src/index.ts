import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {createProgram} from './program.js'
import {renderError} from './utils.js'

try {
  await createProgram().parseAsync()
} catch (error: unknown) {
  console.error(chalk.red(renderError(error)))
  process.exitCode = 1
}
