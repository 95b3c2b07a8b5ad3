import test from 'ava'
import {ItemRep, KilnError, textContent} from '@kiln/core'
import {renderError} from '../utils.js'

function rep(identifier: string): ItemRep {
  return new ItemRep({identifier, content: textContent(''), attributes: {}})
}

test('trivial errors are a single line', t => {
  t.is(renderError(new KilnError('UNKNOWN_LAYOUT', {layout: '/nope.html'})), 'Error: The site does not have a layout matching "/nope.html"')
})

test('compilation failures caused by a trivial error show the root message', t => {
  const a = rep('/a.md')
  const cause = new KilnError('NO_SUCH_ITEM_REP', {identifier: '/b.md', rep: 'summary'})
  const error = new KilnError('COMPILATION_FAILED', {rep: a, stack: [a]}, {cause})

  t.is(renderError(error), 'Error: The site has no "/b.md" item with a rep "summary"')
})

test('other failures get a crash report', t => {
  const a = rep('/a.md')
  const b = rep('/b.md')
  const cause = new Error('boom')
  cause.stack = 'Error: boom\n    at run (filters/boom.js:3:11)\n    at compile (engine.js:10:5)'
  const error = new KilnError('COMPILATION_FAILED', {rep: b, stack: [a, b]}, {cause})

  t.is(renderError(error), [
    'Crash report',
    '',
    'Message: COMPILATION_FAILED: Compilation of the "/b.md" item (rep "default") failed',
    '',
    'Compilation stack:',
    '  - item /a.md, rep "default"',
    '  - item /b.md, rep "default"',
    '',
    'Caused by:',
    '  1. Error: boom',
    '',
    'Stack trace:',
    '  at run (filters/boom.js:3:11)',
    '  at compile (engine.js:10:5)'
  ].join('\n'))
})

test('internal inconsistencies are never trivial', t => {
  const error = new KilnError('INTERNAL_INCONSISTENCY', {reason: 'lost a snapshot'})
  error.stack = 'KilnError: Internal inconsistency: lost a snapshot'

  t.is(renderError(error), 'Crash report\n\nMessage: INTERNAL_INCONSISTENCY: Internal inconsistency: lost a snapshot')
})

test('values that are not errors are reported as they are', t => {
  t.is(renderError('oops'), 'Crash report\n\nMessage: oops')
})
