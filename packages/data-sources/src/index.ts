import type {DataSourceFactory} from '@kiln/core'
import {filesystemDataSource} from './filesystem.js'
import {staticDataSource} from './static.js'

export {FilesystemDataSource, filesystemDataSource, groupEntries, parseFrontMatter, parseFilesystemConfig, type FilesystemConfig} from './filesystem.js'
export {StaticDataSource, staticDataSource, type StaticConfig} from './static.js'
export {listFiles, defaultExcludes} from './walk.js'

export const builtinDataSources: ReadonlyMap<string, DataSourceFactory> = new Map([
  [filesystemDataSource.type, filesystemDataSource],
  [staticDataSource.type, staticDataSource]
])
