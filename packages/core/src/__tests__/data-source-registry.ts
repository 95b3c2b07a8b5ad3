import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {loadExternalDataSource, resolveDataSource} from '../data-source-registry.js'
import {KilnError} from '../errors.js'
import type {DataSourceFactory} from '../types.js'
import {createTmpDir, memoryDataSource} from './helpers.js'

const builtins = new Map([['memory', memoryDataSource([])]])

const options = {siteRoot: '/site', itemsRoot: '/', layoutsRoot: '/', textExtensions: ['md'], config: {}}

test('resolveDataSource finds built-in data sources', async t => {
  const factory = await resolveDataSource('memory', {builtins, cwd: '.'})
  t.is<DataSourceFactory | undefined, DataSourceFactory | undefined>(factory, builtins.get('memory'))
})

test('programmatic factories take precedence over built-ins', async t => {
  const custom = memoryDataSource([], [], 'memory')
  const factory = await resolveDataSource('memory', {builtins, factories: [custom], cwd: '.'})
  t.is(factory, custom)
})

test('unknown data sources list the available types', async t => {
  const error = await t.throwsAsync(
    resolveDataSource('sql', {builtins, factories: [memoryDataSource([], [], 'other')], cwd: '.'}),
    {instanceOf: KilnError}
  )
  t.is(error?.message, 'The data source "sql" does not exist. Available data sources: memory, other')
})

test('aliases load a factory from a module, under the alias type', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'notes.mjs'), [
    'export default {',
    '  type: "ignored",',
    '  create: options => ({',
    '    items: async () => [{identifier: "/note.txt", content: {kind: "text", text: options.siteRoot}, attributes: {}}],',
    '    layouts: async () => []',
    '  })',
    '}',
    ''
  ].join('\n'))

  const factory = await resolveDataSource('notes', {builtins, aliases: {notes: './notes.mjs'}, cwd: dir})
  t.is(factory.type, 'notes')

  const items = await factory.create(options).items()
  t.deepEqual(items, [{identifier: '/note.txt', content: {kind: 'text', text: '/site'}, attributes: {}}])
})

test('loadExternalDataSource rejects modules without a create function', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'bad.mjs'), 'export default {items: []}\n')

  const error = await t.throwsAsync(loadExternalDataSource('bad', './bad.mjs', dir), {instanceOf: KilnError})
  t.is(error?.message, 'Failed to load data source "bad" from "./bad.mjs": the default export must be a data source factory with a "create" function')
})

test('factories loaded from modules check what create returns', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'broken.mjs'), 'export default {create: () => 42}\n')

  const factory = await loadExternalDataSource('broken', './broken.mjs', dir)
  const error = t.throws(() => factory.create(options), {instanceOf: KilnError})
  t.is(error?.code, 'PLUGIN_LOAD_FAILED')
})
