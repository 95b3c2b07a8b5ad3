import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Site, silentReporter, type CompilationState} from '@kiln/core'
import {builtinDataSources} from '@kiln/data-sources'
import {loadConfig} from '../config.js'
import {getGlobalOptions} from '../utils.js'

export type RepData = {
  name: string;
  path?: string;
  /** Reps whose compiled content this rep read during the last compilation. */
  dependencies: string[];
  layouts: string[];
}

export type ItemData = {
  identifier: string;
  binary: boolean;
  reps: RepData[];
}

export type SiteData = {
  items: ItemData[];
  layouts: string[];
}

/** Items with their reps and routes, plus the dependencies recorded by the last compilation. */
export function collectSiteData(site: Site, state: CompilationState): SiteData {
  return {
    items: site.items.map(item => ({
      identifier: item.identifier,
      binary: item.content.kind === 'binary',
      reps: site.reps.forItem(item.identifier).map(rep => ({
        name: rep.name,
        path: rep.path,
        dependencies: state.dependencies.reps[rep.reference] ?? [],
        layouts: state.dependencies.layouts[rep.reference] ?? []
      }))
    })),
    layouts: site.layouts.map(layout => layout.identifier)
  }
}

export function formatSiteData(data: SiteData, color = chalk): string[] {
  const lines: string[] = []
  for (const item of data.items) {
    lines.push(color.bold(`item ${item.identifier}${item.binary ? ' (binary)' : ''}`))
    for (const rep of item.reps) {
      lines.push(`  rep ${rep.name} → ${rep.path ?? color.gray('(not written)')}`)
      for (const dependency of rep.dependencies) {
        lines.push(`    uses ${dependency}`)
      }

      for (const layout of rep.layouts) {
        lines.push(`    layout ${layout}`)
      }
    }
  }

  for (const layout of data.layouts) {
    lines.push(color.bold(`layout ${layout}`))
  }

  return lines
}

export function registerShowDataCommand(program: Command): void {
  program
    .command('show-data')
    .description('Show items, reps, routes and the dependencies of the last compilation')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {site: siteArg, json} = getGlobalOptions(cmd)
      const root = resolve(siteArg)
      const config = await loadConfig(root)

      const site = await Site.load({root, config, builtinDataSources, reporter: silentReporter})
      const data = collectSiteData(site, await site.loadState())

      if (json) {
        console.log(JSON.stringify(data, null, 2))
        return
      }

      for (const line of formatSiteData(data)) {
        console.log(line)
      }
    })
}
