import ignore from 'ignore'
import jexlModule from 'jexl'
import type {Matcher, RuleSubject} from './types.js'

const jexl = new jexlModule.Jexl()

/**
 * Matches identifiers against a gitignore-style glob: `/**\/*.md`,
 * `/about.md`, `/blog/**\/*`. A leading `/` anchors the pattern at the site
 * root; without it the pattern matches at any depth.
 */
export function patternMatcher(pattern: string): Matcher {
  const ig = ignore().add(pattern)
  return {
    source: pattern,
    matches({identifier}) {
      const relative = identifier.replace(/^\/+/, '')
      if (!ignore.isPathValid(relative)) {
        return false
      }

      return ig.ignores(relative)
    }
  }
}

/**
 * Matches when a jexl expression is truthy. The expression sees `identifier`,
 * `attributes`, `rep` and `item` (the identifier merged with the attributes).
 * An expression that fails to evaluate does not match.
 */
export function conditionMatcher(expression: string): Matcher {
  const compiled = jexl.compile(expression)
  return {
    source: `if(${expression})`,
    matches(subject) {
      try {
        return Boolean(compiled.evalSync(conditionContext(subject)))
      } catch {
        return false
      }
    }
  }
}

/** Matches when every given matcher does. */
export function allOf(matchers: Matcher[]): Matcher {
  return {
    source: matchers.map(m => m.source).join(' && '),
    matches: subject => matchers.every(m => m.matches(subject))
  }
}

export function buildMatcher(definition: {pattern?: string; if?: string}): Matcher {
  const matchers: Matcher[] = []
  if (definition.pattern !== undefined) {
    matchers.push(patternMatcher(definition.pattern))
  }

  if (definition.if !== undefined) {
    matchers.push(conditionMatcher(definition.if))
  }

  return matchers.length === 1 ? matchers[0] : allOf(matchers)
}

function conditionContext(subject: RuleSubject): Record<string, unknown> {
  return {
    identifier: subject.identifier,
    attributes: subject.attributes,
    rep: subject.rep,
    item: {...subject.attributes, identifier: subject.identifier}
  }
}
