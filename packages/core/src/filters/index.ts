import type {Filter} from '../types.js'
import {dataUriFilter} from './data-uri.js'
import {handlebarsFilter} from './handlebars.js'
import {markdownFilter} from './markdown.js'

export {dataUriFilter} from './data-uri.js'
export {handlebarsFilter} from './handlebars.js'
export {markdownFilter} from './markdown.js'

export const defaultFilters = new Map<string, Filter>([
  [markdownFilter.name, markdownFilter],
  [handlebarsFilter.name, handlebarsFilter],
  [dataUriFilter.name, dataUriFilter]
])
