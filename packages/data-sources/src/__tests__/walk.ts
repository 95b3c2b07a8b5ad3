import {join} from 'node:path'
import test from 'ava'
import {extensionOf, listFiles, stripExtension} from '../walk.js'
import {createTmpDir, writeTree} from './helpers.js'

test('listFiles lists nested files as sorted relative paths', async t => {
  const dir = await createTmpDir()
  await writeTree(dir, {'b.md': '', 'a/z.txt': '', 'a/b/c.css': ''})

  t.deepEqual(await listFiles(dir), ['a/b/c.css', 'a/z.txt', 'b.md'])
})

test('listFiles skips editor backups and excluded patterns', async t => {
  const dir = await createTmpDir()
  await writeTree(dir, {
    'post.md': '',
    'post.md~': '',
    '.DS_Store': '',
    'drafts/wip.md': '',
    'notes.bak': '',
    'blog/drafts.md': ''
  })

  t.deepEqual(await listFiles(dir, ['/drafts/']), ['blog/drafts.md', 'post.md'])
})

test('listFiles lists nothing for a missing directory', async t => {
  t.deepEqual(await listFiles(join(await createTmpDir(), 'nope')), [])
})

test('extensionOf and stripExtension only look at the last extension', t => {
  t.is(extensionOf('blog/archive.tar.gz'), 'gz')
  t.is(extensionOf('README'), '')
  t.is(stripExtension('blog/post.md'), 'blog/post')
  t.is(stripExtension('blog/archive.tar.gz'), 'blog/archive.tar')
  t.is(stripExtension('Makefile'), 'Makefile')
})
