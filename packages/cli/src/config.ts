import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {KilnError, errorMessage, parseConfig, type SiteConfig} from '@kiln/core'

export const configFilename = 'kiln.yml'

/**
 * Loads `kiln.yml` from the site directory, merged with the overrides of the
 * environment named by KILN_ENV. A missing file gives the defaults.
 */
export async function loadConfig(siteRoot: string, env = process.env.KILN_ENV): Promise<SiteConfig> {
  const file = join(siteRoot, configFilename)
  const environment = env === '' ? undefined : env
  let content: string
  try {
    content = await readFile(file, 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return parseConfig(undefined, {file, env: environment})
    }

    throw error
  }

  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (error: unknown) {
    throw new KilnError('INVALID_CONFIG', {file, issues: [errorMessage(error)]}, {cause: error})
  }

  return parseConfig(raw, {file, env: environment})
}
