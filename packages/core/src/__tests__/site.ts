import {access, readFile, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {parseConfig} from '../config.js'
import {KilnError, isKilnError} from '../errors.js'
import {buildRuleSet, type RulesDefinition} from '../rules-loader.js'
import {Site, prefixIdentifier} from '../site.js'
import {emptyState} from '../state.js'
import type {Filter, FilterDefinition, Item, Layout} from '../types.js'
import {
  createTmpDir,
  layout,
  memoryDataSource,
  recordingReporter,
  testFilters,
  textItem,
  textOf
} from './helpers.js'

const siteRules: RulesDefinition = {
  compile: [
    {pattern: '/**/*.md', actions: [{filter: 'upper'}, {layout: '/default.html'}]},
    {pattern: '/**/*'}
  ],
  route: [
    {pattern: '/**/*.md', path: '/:dirname/:name/index.html'},
    {pattern: '/**/*', path: '/:identifier'}
  ],
  layouts: [{pattern: '*.html', filter: 'handlebars'}]
}

const siteItems = [textItem('/index.md', 'Hello', {title: 'Home'}), textItem('/style.css', 'body{}')]
const siteLayouts = [layout('/default.html', '<h1>{{title}}</h1>{{{content}}}')]

type Fixture = {
  items?: Item[];
  layouts?: Layout[];
  rules?: RulesDefinition;
  filters?: Filter[];
  dataSources?: Array<{type: string; itemsRoot?: string}>;
}

async function loadSite(root: string, fixture: Fixture = {}) {
  const {reporter, events} = recordingReporter()
  const site = await Site.load({
    root,
    config: parseConfig({dataSources: fixture.dataSources ?? [{type: 'memory'}]}),
    dataSources: [memoryDataSource(fixture.items ?? siteItems, fixture.layouts ?? siteLayouts)],
    filters: [...testFilters, ...(fixture.filters ?? [])],
    rules: buildRuleSet(fixture.rules ?? siteRules),
    reporter
  })
  return {site, events}
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

test('prefixIdentifier places identifiers under a root', t => {
  t.is(prefixIdentifier('/', '/a.md'), '/a.md')
  t.is(prefixIdentifier('/docs', '/a.md'), '/docs/a.md')
  t.is(prefixIdentifier('/docs/', 'a.md'), '/docs/a.md')
})

test('load routes every rep and freezes items', async t => {
  const {site} = await loadSite(await createTmpDir())

  t.deepEqual([...site.reps].map(rep => [rep.reference, rep.path]), [
    ['item:/index.md:default', '/index/index.html'],
    ['item:/style.css:default', '/style.css']
  ])
  t.true(Object.isFrozen(site.items[0]))
})

test('the first compilation compiles and writes everything', async t => {
  const root = await createTmpDir()
  const {site, events} = await loadSite(root)

  const result = await site.compile()

  t.is(result.compiled, 2)
  t.is(result.cached, 0)
  t.deepEqual(result.written, {create: 2, update: 0, identical: 0})
  t.deepEqual(result.reps.map(rep => [rep.identifier, rep.reason, rep.action, textOf(rep.content)]), [
    ['/index.md', 'not-compiled-before', 'create', '<h1>Home</h1>HELLO'],
    ['/style.css', 'not-compiled-before', 'create', 'body{}']
  ])

  t.is(await readFile(join(root, 'output', 'index', 'index.html'), 'utf8'), '<h1>Home</h1>HELLO')
  t.is(await readFile(join(root, 'output', 'style.css'), 'utf8'), 'body{}')
  t.true(await exists(join(root, 'tmp', 'state.json')))

  t.is(events[0].event, 'COMPILE_START')
  t.like(events[0], {items: 2, reps: 2, siteRoot: root})
  t.is(events.at(-1)?.event, 'COMPILE_FINISHED')
})

test('a second compilation reuses every rep', async t => {
  const root = await createTmpDir()
  await (await loadSite(root)).site.compile()

  const {site, events} = await loadSite(root)
  const result = await site.compile()

  t.is(result.compiled, 0)
  t.is(result.cached, 2)
  t.deepEqual(result.written, {create: 0, update: 0, identical: 2})
  t.is(textOf(result.reps[0].content), '<h1>Home</h1>HELLO')
  t.is(events.filter(event => event.event === 'REP_CACHED').length, 2)
  t.is(events.filter(event => event.event === 'REP_COMPILED').length, 0)
})

test('a modified item is the only one recompiled', async t => {
  const root = await createTmpDir()
  await (await loadSite(root)).site.compile()

  const items = [siteItems[0], textItem('/style.css', 'body{margin:0}')]
  const {site} = await loadSite(root, {items})
  const result = await site.compile()

  t.deepEqual(result.reps.map(rep => [rep.identifier, rep.reason, rep.action]), [
    ['/index.md', undefined, 'identical'],
    ['/style.css', 'item-modified', 'update']
  ])
  t.is(await readFile(join(root, 'output', 'style.css'), 'utf8'), 'body{margin:0}')
})

test('a modified layout recompiles the reps laid out with it', async t => {
  const root = await createTmpDir()
  await (await loadSite(root)).site.compile()

  const {site} = await loadSite(root, {layouts: [layout('/default.html', '<h2>{{title}}</h2>{{{content}}}')]})
  const result = await site.compile()

  t.deepEqual(result.reps.map(rep => rep.reason), ['layout-modified', undefined])
  t.is(textOf(result.reps[0].content), '<h2>Home</h2>HELLO')
})

test('consumers are recompiled when what they read changed', async t => {
  const rules: RulesDefinition = {
    compile: [{pattern: '/**/*', actions: [{filter: 'read'}]}],
    route: [{pattern: '/**/*', path: '/:identifier'}]
  }
  const index = textItem('/index.txt', 'home:', {reads: '/nav.txt'})

  const root = await createTmpDir()
  const first = await (await loadSite(root, {rules, items: [index, textItem('/nav.txt', 'v1')]})).site.compile()
  t.is(textOf(first.reps[0].content), 'home:v1')

  const {site} = await loadSite(root, {rules, items: [index, textItem('/nav.txt', 'v2')]})
  const result = await site.compile()

  t.deepEqual(result.reps.map(rep => [rep.identifier, rep.reason, textOf(rep.content)]), [
    ['/index.txt', 'dependency-outdated', 'home:v2'],
    ['/nav.txt', 'item-modified', 'v2']
  ])
  t.deepEqual((await site.loadState()).dependencies.reps, {'item:/index.txt:default': ['item:/nav.txt:default']})
})

test('reps linking to another rep are recompiled when its route changed', async t => {
  const rulesRoutingB = (path: string): RulesDefinition => ({
    compile: [{pattern: '/**/*', actions: [{filter: 'handlebars'}]}],
    route: [{pattern: '/b.txt', path}, {pattern: '/**/*', path: '/:identifier'}]
  })
  const items = [textItem('/a.txt', 'link={{pathOf "/b.txt"}}'), textItem('/b.txt', 'B')]

  const root = await createTmpDir()
  const first = await (await loadSite(root, {rules: rulesRoutingB('/old/b.txt'), items})).site.compile()
  t.is(textOf(first.reps[0].content), 'link=/old/b.txt')

  const {site} = await loadSite(root, {rules: rulesRoutingB('/new/b.txt'), items})
  const result = await site.compile()

  t.deepEqual(result.reps.map(rep => [rep.identifier, rep.reason, textOf(rep.content)]), [
    ['/a.txt', 'dependency-outdated', 'link=/new/b.txt'],
    ['/b.txt', 'output-missing', 'B']
  ])
  t.is(await readFile(join(root, 'output', 'a.txt'), 'utf8'), 'link=/new/b.txt')
  t.deepEqual((await site.loadState()).dependencies.paths, {'item:/a.txt:default': {'item:/b.txt:default': '/new/b.txt'}})
})

test('reps reading the item list are recompiled when an item is added', async t => {
  const countItems: FilterDefinition<'text', 'text'> = {
    name: 'count-items',
    from: 'text',
    to: 'text',
    run: (input, _args, context) => `${input}${context.items.length}`
  }
  const rules: RulesDefinition = {
    compile: [{pattern: '/index.txt', actions: [{filter: 'count-items'}]}, {pattern: '/**/*'}],
    route: [{pattern: '/**/*', path: '/:identifier'}]
  }
  const index = textItem('/index.txt', 'n=')
  const a = textItem('/a.txt', 'a')

  const root = await createTmpDir()
  const first = await (await loadSite(root, {rules, items: [index, a], filters: [countItems]})).site.compile()
  t.is(textOf(first.reps[0].content), 'n=2')

  const {site} = await loadSite(root, {rules, items: [index, a, textItem('/b.txt', 'b')], filters: [countItems]})
  const result = await site.compile()

  t.deepEqual(result.reps.map(rep => [rep.identifier, rep.reason, textOf(rep.content)]), [
    ['/index.txt', 'dependency-outdated', 'n=3'],
    ['/a.txt', undefined, 'a'],
    ['/b.txt', 'not-compiled-before', 'b']
  ])
  t.deepEqual((await site.loadState()).dependencies.items, ['item:/index.txt:default'])
})

test('reps whose output file is gone are recompiled', async t => {
  const root = await createTmpDir()
  await (await loadSite(root)).site.compile()
  await rm(join(root, 'output', 'style.css'))

  const result = await (await loadSite(root)).site.compile()
  t.deepEqual(result.reps.map(rep => [rep.reason, rep.action]), [
    [undefined, 'identical'],
    ['output-missing', 'create']
  ])
})

test('a forced compilation recompiles everything', async t => {
  const root = await createTmpDir()
  const {site} = await loadSite(root)
  await site.compile()

  const result = await site.compile({force: true})
  t.is(result.compiled, 2)
  t.deepEqual(result.reps.map(rep => rep.reason), ['forced', 'forced'])
  t.deepEqual(result.written, {create: 0, update: 0, identical: 2})
})

test('reps routed to null are compiled but not written', async t => {
  const rules: RulesDefinition = {
    compile: [{pattern: '/**/*', actions: [{filter: 'upper'}]}],
    route: [{pattern: '/_*', path: null}, {pattern: '/**/*', path: '/:identifier'}]
  }
  const root = await createTmpDir()
  const {site} = await loadSite(root, {rules, items: [textItem('/_partial.txt', 'p'), textItem('/page.txt', 'x')]})

  const result = await site.compile()
  const [partial] = result.reps
  t.is(partial.identifier, '/_partial.txt')
  t.is(partial.path, undefined)
  t.is(partial.action, undefined)
  t.is(partial.reason, 'not-compiled-before')
  t.is(textOf(partial.content), 'P')
  t.deepEqual(result.written, {create: 1, update: 0, identical: 0})
  t.false(await exists(join(root, 'output', '_partial.txt')))
})

test('items are placed under the itemsRoot of their data source', async t => {
  const {site} = await loadSite(await createTmpDir(), {dataSources: [{type: 'memory', itemsRoot: '/docs'}]})
  t.deepEqual(site.items.map(item => item.identifier), ['/docs/index.md', '/docs/style.css'])
  t.deepEqual([...site.reps].map(rep => rep.path), ['/docs/index/index.html', '/docs/style.css'])
})

test('load rejects two items with the same identifier', async t => {
  const error = await t.throwsAsync(
    loadSite(await createTmpDir(), {dataSources: [{type: 'memory'}, {type: 'memory'}]}),
    {instanceOf: KilnError}
  )
  t.is(error?.message, 'Several items have the identifier "/index.md"')
})

test('load rejects items without a compilation rule', async t => {
  const rules: RulesDefinition = {compile: [{pattern: '*.md'}], route: [{pattern: '*', path: '/:identifier'}]}
  const error = await t.throwsAsync(loadSite(await createTmpDir(), {rules}), {instanceOf: KilnError})
  t.is(error?.message, 'No compilation rules were found for the "/style.css" item')
})

test('load rejects reps without a routing rule', async t => {
  const rules: RulesDefinition = {compile: [{pattern: '*'}], route: [{pattern: '*.md', path: '/:name.html'}]}
  const error = await t.throwsAsync(loadSite(await createTmpDir(), {rules}), {instanceOf: KilnError})
  t.is(error?.code, 'NO_MATCHING_ROUTING_RULE')
})

test('load rejects reps routed to the same path', async t => {
  const rules: RulesDefinition = {compile: [{pattern: '*'}], route: [{pattern: '*', path: '/index.html'}]}
  const error = await t.throwsAsync(loadSite(await createTmpDir(), {rules}), {instanceOf: KilnError})
  t.is(
    error?.message,
    'Several item reps are routed to /index.html: "/index.md" item (rep "default"), "/style.css" item (rep "default")'
  )
})

test('load reads the rules file when no rules are given', async t => {
  const root = await createTmpDir()
  await writeFile(join(root, 'rules.yml'), 'compile:\n  - pattern: "*"\nroute:\n  - pattern: "*"\n    path: /:identifier\n')

  const site = await Site.load({
    root,
    config: parseConfig({dataSources: [{type: 'memory'}]}),
    dataSources: [memoryDataSource(siteItems)],
    reporter: recordingReporter().reporter
  })

  t.deepEqual([...site.reps].map(rep => rep.path), ['/index.md', '/style.css'])
})

test('a failed compilation reports and saves no state', async t => {
  const boom: Filter = {
    name: 'boom',
    from: 'text',
    to: 'text',
    run() {
      throw new Error('boom')
    }
  }
  const rules: RulesDefinition = {
    compile: [{pattern: '/**/*', actions: [{filter: 'boom'}]}],
    route: [{pattern: '/**/*', path: '/:identifier'}]
  }
  const root = await createTmpDir()
  const {site, events} = await loadSite(root, {rules, filters: [boom]})

  const error = await t.throwsAsync(site.compile(), {instanceOf: KilnError})
  t.is(error?.code, 'COMPILATION_FAILED')
  t.is(error?.message, 'Compilation of the "/index.md" item (rep "default") failed')
  t.like(events.at(-1), {event: 'COMPILE_FAILED', code: 'COMPILATION_FAILED'})

  t.false(await exists(join(root, 'tmp', 'state.json')))
  t.deepEqual(await site.loadState(), emptyState())
  t.false(isKilnError(error?.unwrap()))
})
