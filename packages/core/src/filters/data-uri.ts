import {Buffer} from 'node:buffer'
import type {FilterDefinition} from '../types.js'

/**
 * Turns binary content into a `data:` URI. The media type comes from the
 * `mediaType` arg, then the item's `mediaType` attribute.
 */
export const dataUriFilter: FilterDefinition<'binary', 'text'> = {
  name: 'data-uri',
  from: 'binary',
  to: 'text',
  run(input, args, context) {
    const fromArgs = args.mediaType
    const fromItem = context.item.attributes.mediaType
    const mediaType = typeof fromArgs === 'string'
      ? fromArgs
      : (typeof fromItem === 'string' ? fromItem : 'application/octet-stream')
    return `data:${mediaType};base64,${Buffer.from(input).toString('base64')}`
  }
}
