import {readFile, stat} from 'node:fs/promises'
import {join, posix} from 'node:path'
import matter from 'gray-matter'
import {parse as parseYaml} from 'yaml'
import {z} from 'zod'
import {
  KilnError,
  binaryContent,
  formatIssues,
  textContent,
  type Attributes,
  type Content,
  type DataSource,
  type DataSourceFactory,
  type DataSourceOptions,
  type Item,
  type Layout
} from '@kiln/core'
import {extensionOf, listFiles, stripExtension} from './walk.js'

const metaExtension = 'yaml'

const filesystemConfigSchema = z.object({
  contentDir: z.string().min(1).default('content'),
  layoutsDir: z.string().min(1).default('layouts'),
  /** Gitignore-style patterns, relative to the content and layouts directories. */
  exclude: z.array(z.string()).default([])
}).strict()

export type FilesystemConfig = z.infer<typeof filesystemConfigSchema>

/** One item or layout on disk: a content file, a metadata file, or both. */
type Entry = {
  /** Path relative to the directory, used as identifier. */
  path: string;
  contentFile?: string;
  metaFile?: string;
}

export function parseFilesystemConfig(config: Record<string, unknown>): FilesystemConfig {
  const parsed = filesystemConfigSchema.safeParse(config)
  if (!parsed.success) {
    throw new KilnError('INVALID_CONFIG', {file: 'data source "filesystem"', issues: formatIssues(parsed.error.issues)})
  }

  return parsed.data
}

/**
 * Pairs content files with their `.yaml` metadata files. `about.yaml` goes
 * with `about.md`; a metadata file alone describes an item with empty
 * content.
 */
export function groupEntries(files: readonly string[]): Entry[] {
  const metaFiles = files.filter(file => extensionOf(file) === metaExtension)
  const contentFiles = files.filter(file => extensionOf(file) !== metaExtension)

  const byBase = new Map<string, string[]>()
  for (const file of contentFiles) {
    const base = stripExtension(file)
    byBase.set(base, [...(byBase.get(base) ?? []), file])
  }

  const entries = new Map<string, Entry>(contentFiles.map(file => [file, {path: file, contentFile: file}]))
  for (const metaFile of metaFiles) {
    const candidates = byBase.get(stripExtension(metaFile)) ?? []
    if (candidates.length > 1) {
      throw new KilnError('AMBIGUOUS_METADATA_ASSOCIATION', {contentFilenames: candidates, metaFilename: metaFile})
    }

    const [contentFile] = candidates
    if (contentFile === undefined) {
      entries.set(metaFile, {path: metaFile, metaFile})
    } else {
      entries.set(contentFile, {path: contentFile, contentFile, metaFile})
    }
  }

  return [...entries.values()].sort((a, b) => a.path.localeCompare(b.path))
}

/**
 * Splits a YAML front matter block off textual content. Content without one
 * is returned as is, with no attributes.
 */
export function parseFrontMatter(text: string): {attributes: Attributes; body: string} {
  if (!matter.test(text)) {
    return {attributes: {}, body: text}
  }

  const {data, content} = matter(text, {})
  return {attributes: data, body: content}
}

async function readMeta(path: string): Promise<Attributes> {
  const parsed: unknown = parseYaml(await readFile(path, 'utf8'))
  const attributes = z.record(z.string(), z.unknown()).nullish().safeParse(parsed)
  if (!attributes.success) {
    throw new KilnError('INVALID_CONFIG', {file: path, issues: ['metadata files must contain a mapping']})
  }

  return attributes.data ?? {}
}

/**
 * Items from `content/` and layouts from `layouts/`. Identifiers are the
 * file paths with their extension: `content/blog/post.md` → `/blog/post.md`.
 * Files whose extension is not in `textExtensions` are binary.
 */
export class FilesystemDataSource implements DataSource {
  readonly config: FilesystemConfig

  constructor(private readonly options: DataSourceOptions) {
    this.config = parseFilesystemConfig(options.config)
  }

  async items(): Promise<Item[]> {
    const dir = this.config.contentDir
    const entries = groupEntries(await listFiles(join(this.options.siteRoot, dir), this.config.exclude))
    const items: Item[] = []
    for (const entry of entries) {
      const binary = entry.contentFile !== undefined && !this.isText(entry.contentFile)
      const {content, attributes} = await this.load(dir, entry, binary)
      items.push({identifier: `/${entry.path}`, content, attributes})
    }

    return items
  }

  async layouts(): Promise<Layout[]> {
    const dir = this.config.layoutsDir
    const entries = groupEntries(await listFiles(join(this.options.siteRoot, dir), this.config.exclude))
    const layouts: Layout[] = []
    for (const entry of entries) {
      const {content, attributes} = await this.load(dir, entry, false)
      layouts.push({identifier: `/${entry.path}`, content: content.kind === 'text' ? content.text : '', attributes})
    }

    return layouts
  }

  private isText(file: string): boolean {
    return this.options.textExtensions.includes(extensionOf(file))
  }

  private async load(dir: string, entry: Entry, binary: boolean): Promise<{content: Content; attributes: Attributes}> {
    const absolute = (file: string) => join(this.options.siteRoot, dir, file)
    const attributes: Attributes = {}
    let content: Content = textContent('')

    if (entry.metaFile !== undefined) {
      Object.assign(attributes, await readMeta(absolute(entry.metaFile)))
    }

    if (entry.contentFile !== undefined) {
      const path = absolute(entry.contentFile)
      if (binary) {
        content = binaryContent(await readFile(path))
      } else {
        const text = await readFile(path, 'utf8')
        // A metadata file takes the place of front matter.
        if (entry.metaFile === undefined) {
          const {attributes: frontMatter, body} = parseFrontMatter(text)
          Object.assign(attributes, frontMatter)
          content = textContent(body)
        } else {
          content = textContent(text)
        }
      }
    }

    const mainFile = entry.contentFile ?? entry.metaFile ?? entry.path
    const {mtime} = await stat(absolute(mainFile))
    return {
      content,
      attributes: {
        ...attributes,
        filename: posix.join(dir, mainFile),
        ...(entry.metaFile === undefined ? {} : {metaFilename: posix.join(dir, entry.metaFile)}),
        extension: extensionOf(mainFile),
        mtime
      }
    }
  }
}

export const filesystemDataSource: DataSourceFactory = {
  type: 'filesystem',
  create: options => new FilesystemDataSource(options)
}
