import {access, readFile} from 'node:fs/promises'
import {extname, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {z} from 'zod'
import {defaultRepName} from './item-rep.js'
import {KilnError} from './errors.js'
import {buildMatcher} from './matcher.js'
import type {Action, Matcher, RuleSet} from './types.js'
import {errorMessage, formatIssues} from './utils.js'

export const rulesFilenames = ['rules.yml', 'rules.yaml', 'rules.json']

/** Snapshot names the engine sets itself. */
const reservedSnapshots = new Set(['raw', 'last'])

const argsSchema = z.record(z.string(), z.unknown()).default({})

const matcherShape = {
  pattern: z.string().min(1).optional(),
  if: z.string().min(1).optional()
}

const hasMatcher = (rule: {pattern?: string; if?: string}) => rule.pattern !== undefined || rule.if !== undefined
const matcherRequired = {message: 'a rule needs a "pattern", an "if" condition or both'}

const actionSchema = z.union([
  z.object({filter: z.string().min(1), args: argsSchema}).strict(),
  z.object({layout: z.string().min(1), args: argsSchema}).strict(),
  z.object({snapshot: z.string().min(1)}).strict()
])

const compileRuleSchema = z.object({
  ...matcherShape,
  rep: z.string().min(1).default(defaultRepName),
  actions: z.array(actionSchema).default([])
}).strict().refine(hasMatcher, matcherRequired).superRefine((rule, ctx) => {
  const seen = new Set<string>()
  for (const [index, action] of rule.actions.entries()) {
    if (!('snapshot' in action)) {
      continue
    }

    if (reservedSnapshots.has(action.snapshot)) {
      ctx.addIssue({code: z.ZodIssueCode.custom, path: ['actions', index, 'snapshot'], message: `"${action.snapshot}" is a reserved snapshot name`})
    } else if (seen.has(action.snapshot)) {
      ctx.addIssue({code: z.ZodIssueCode.custom, path: ['actions', index, 'snapshot'], message: `snapshot "${action.snapshot}" is taken more than once`})
    }

    seen.add(action.snapshot)
  }
})

const routeRuleSchema = z.object({
  ...matcherShape,
  rep: z.string().min(1).default(defaultRepName),
  path: z.string().nullable()
}).strict().refine(hasMatcher, matcherRequired)

const layoutRuleSchema = z.object({
  ...matcherShape,
  filter: z.string().min(1),
  args: argsSchema
}).strict().refine(hasMatcher, matcherRequired)

const rulesFileSchema = z.object({
  compile: z.array(compileRuleSchema).default([]),
  route: z.array(routeRuleSchema).default([]),
  layouts: z.array(layoutRuleSchema).default([])
}).strict()

export type RulesDefinition = z.input<typeof rulesFileSchema>

/**
 * Finds the rules file of a site: `rulesFile` when given (relative to the
 * site root), otherwise the first of rules.yml, rules.yaml, rules.json.
 */
export async function findRulesFile(siteRoot: string, rulesFile?: string): Promise<string> {
  const candidates = rulesFile ? [rulesFile] : rulesFilenames
  for (const candidate of candidates) {
    const path = resolve(siteRoot, candidate)
    try {
      await access(path)
      return path
    } catch {
      // Try the next candidate
    }
  }

  throw new KilnError('NO_RULES_FILE_FOUND', {siteRoot, candidates})
}

export async function loadRules(siteRoot: string, rulesFile?: string): Promise<{file: string; rules: RuleSet}> {
  const file = await findRulesFile(siteRoot, rulesFile)
  const content = await readFile(file, 'utf8')
  return {file, rules: parseRules(content, file)}
}

/** Parses rules from YAML, or JSON when the file name ends in .json. */
export function parseRules(content: string, file = 'rules.yml'): RuleSet {
  let raw: unknown
  try {
    raw = extname(file) === '.json' ? JSON.parse(content) : parseYaml(content)
  } catch (error) {
    throw new KilnError('INVALID_RULES', {file, issues: [errorMessage(error)]}, {cause: error})
  }

  return buildRuleSet(raw ?? {}, file)
}

/**
 * Validates a rules definition and compiles its matchers. Invalid `if`
 * expressions are reported along with schema issues.
 */
export function buildRuleSet(definition: unknown, file = 'rules'): RuleSet {
  const parsed = rulesFileSchema.safeParse(definition)
  if (!parsed.success) {
    throw new KilnError('INVALID_RULES', {file, issues: formatIssues(parsed.error.issues)})
  }

  const issues: string[] = []
  const matcher = (section: string, index: number, matcherDefinition: {pattern?: string; if?: string}): Matcher => {
    try {
      return buildMatcher(matcherDefinition)
    } catch (error) {
      issues.push(`${section}.${index}.if: ${errorMessage(error)}`)
      return {source: '', matches: () => false}
    }
  }

  const {compile, route, layouts} = parsed.data
  const rules: RuleSet = {
    compilation: compile.map((rule, index) => ({
      matcher: matcher('compile', index, rule),
      rep: rule.rep,
      actions: rule.actions.map(action => toAction(action))
    })),
    routing: route.map((rule, index) => ({
      matcher: matcher('route', index, rule),
      rep: rule.rep,
      path: rule.path
    })),
    layoutFilters: layouts.map((rule, index) => ({
      matcher: matcher('layouts', index, rule),
      filter: rule.filter,
      args: rule.args
    }))
  }

  if (issues.length > 0) {
    throw new KilnError('INVALID_RULES', {file, issues})
  }

  return rules
}

function toAction(action: z.infer<typeof actionSchema>): Action {
  if ('filter' in action) {
    return {type: 'filter', filter: action.filter, args: action.args}
  }

  if ('layout' in action) {
    return {type: 'layout', layout: action.layout, args: action.args}
  }

  return {type: 'snapshot', name: action.snapshot}
}
