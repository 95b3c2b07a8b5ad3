import {marked} from 'marked'
import {KilnError} from '../errors.js'
import type {FilterDefinition} from '../types.js'

/**
 * Renders Markdown to HTML. Args: `gfm` (default true), `breaks` (default false).
 */
export const markdownFilter: FilterDefinition<'text', 'text'> = {
  name: 'markdown',
  from: 'text',
  to: 'text',
  run(input, args) {
    const html = marked.parse(input, {
      async: false,
      gfm: args.gfm !== false,
      breaks: args.breaks === true
    })

    if (typeof html !== 'string') {
      throw new KilnError('INTERNAL_INCONSISTENCY', {reason: 'marked returned a promise for a synchronous parse'})
    }

    return html
  }
}
