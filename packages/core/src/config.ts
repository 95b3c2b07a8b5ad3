import {merge} from 'lodash-es'
import {z} from 'zod'
import {KilnError} from './errors.js'
import {formatIssues} from './utils.js'

/** Extensions (without dot) loaded as text unless the configuration says otherwise. */
export const defaultTextExtensions = [
  'adoc', 'asciidoc', 'atom', 'coffee', 'css', 'erb', 'haml', 'handlebars', 'hb', 'hbs', 'htm', 'html',
  'js', 'json', 'less', 'markdown', 'md', 'ms', 'mustache', 'php', 'rb', 'rdoc', 'sass', 'scss', 'slim',
  'svg', 'tex', 'txt', 'xhtml', 'xml', 'yaml', 'yml'
]

const dataSourceConfigSchema = z.object({
  type: z.string().min(1),
  itemsRoot: z.string().startsWith('/').default('/'),
  layoutsRoot: z.string().startsWith('/').default('/'),
  config: z.record(z.string(), z.unknown()).default({})
}).strict()

const siteConfigSchema = z.object({
  dataSources: z.array(dataSourceConfigSchema).min(1).default([{type: 'filesystem'}]),
  outputDir: z.string().min(1).default('output'),
  tmpDir: z.string().min(1).default('tmp'),
  rulesFile: z.string().optional(),
  textExtensions: z.array(z.string().regex(/^[^.]/, 'extensions are written without a leading dot')).default(defaultTextExtensions),
  /** Filter name → module specifier */
  filters: z.record(z.string(), z.string()).default({}),
  /** Data source type → module specifier */
  dataSourceModules: z.record(z.string(), z.string()).default({}),
  /** Environment name → partial configuration merged over the base */
  environments: z.record(z.string(), z.record(z.string(), z.unknown())).default({})
}).strict()

export type DataSourceConfig = z.infer<typeof dataSourceConfigSchema>
export type SiteConfig = z.infer<typeof siteConfigSchema>
export type SiteConfigInput = z.input<typeof siteConfigSchema>

export type ParseConfigOptions = {
  /** Shown in validation errors. */
  file?: string;
  /** Environment whose overrides are merged over the base configuration. */
  env?: string;
}

/**
 * Validates a raw configuration object (as parsed from kiln.yml) and fills in
 * defaults. `null` and `undefined` give the default configuration.
 *
 * When `env` names an entry of `environments`, that entry is deep-merged over
 * the base before validation; an unknown environment adds nothing.
 */
export function parseConfig(raw: unknown, options: ParseConfigOptions = {}): SiteConfig {
  const file = options.file ?? 'configuration'
  const base = z.record(z.string(), z.unknown()).nullish().safeParse(raw)
  if (!base.success) {
    throw new KilnError('INVALID_CONFIG', {file, issues: ['the configuration must be a mapping']})
  }

  const source = base.data ?? {}
  const resolved = options.env === undefined ? source : resolveEnvironment(source, options.env)

  const parsed = siteConfigSchema.safeParse(resolved)
  if (!parsed.success) {
    throw new KilnError('INVALID_CONFIG', {file, issues: formatIssues(parsed.error.issues)})
  }

  return parsed.data
}

/** Deep-merges `environments[env]` over the base configuration. */
export function resolveEnvironment(config: Record<string, unknown>, env: string): Record<string, unknown> {
  const environments = z.record(z.string(), z.record(z.string(), z.unknown())).safeParse(config.environments)
  const overrides = environments.success ? environments.data[env] : undefined
  if (!overrides) {
    return config
  }

  return merge({}, config, overrides)
}
