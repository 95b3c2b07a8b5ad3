import {readFile} from 'node:fs/promises'
import {join, posix} from 'node:path'
import {z} from 'zod'
import {KilnError, binaryContent, formatIssues, type DataSource, type DataSourceFactory, type DataSourceOptions, type Item, type Layout} from '@kiln/core'
import {extensionOf, listFiles} from './walk.js'

const staticConfigSchema = z.object({
  dir: z.string().min(1).default('static'),
  exclude: z.array(z.string()).default([])
}).strict()

export type StaticConfig = z.infer<typeof staticConfigSchema>

/**
 * Every file under `static/` as a binary item, for assets copied as is.
 * Provides no layouts.
 */
export class StaticDataSource implements DataSource {
  readonly config: StaticConfig

  constructor(private readonly options: DataSourceOptions) {
    const parsed = staticConfigSchema.safeParse(options.config)
    if (!parsed.success) {
      throw new KilnError('INVALID_CONFIG', {file: 'data source "static"', issues: formatIssues(parsed.error.issues)})
    }

    this.config = parsed.data
  }

  async items(): Promise<Item[]> {
    const dir = join(this.options.siteRoot, this.config.dir)
    const files = await listFiles(dir, this.config.exclude)
    return Promise.all(files.map(async file => ({
      identifier: `/${file}`,
      content: binaryContent(await readFile(join(dir, file))),
      attributes: {
        filename: posix.join(this.config.dir, file),
        extension: extensionOf(file)
      }
    })))
  }

  async layouts(): Promise<Layout[]> {
    return []
  }
}

export const staticDataSource: DataSourceFactory = {
  type: 'static',
  create: options => new StaticDataSource(options)
}
