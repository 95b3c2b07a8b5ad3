import Handlebars from 'handlebars'
import type {FilterContext, FilterDefinition} from '../types.js'

function hashString(options: Handlebars.HelperOptions, key: string): string | undefined {
  const hash: Record<string, unknown> = options.hash
  const value = hash[key]
  return typeof value === 'string' ? value : undefined
}

function createEnvironment(context: FilterContext): typeof Handlebars {
  const hbs = Handlebars.create()

  // {{contentOf "/about.md"}}, {{contentOf "/about.md" rep="summary" snapshot="pre"}}
  hbs.registerHelper('contentOf', (identifier: unknown, options: Handlebars.HelperOptions) => {
    const html = context.compiledContent(String(identifier), {
      rep: hashString(options, 'rep'),
      snapshot: hashString(options, 'snapshot')
    })
    return new hbs.SafeString(html)
  })

  // {{pathOf "/about.md"}}
  hbs.registerHelper('pathOf', (identifier: unknown, options: Handlebars.HelperOptions) =>
    context.pathOf(String(identifier), hashString(options, 'rep')) ?? '')

  return hbs
}

/**
 * Renders the input as a Handlebars template. The template sees the filter
 * context's assigns (item attributes, `content` when laying out) merged with
 * the filter args, plus the `contentOf` and `pathOf` helpers, which read
 * other reps.
 */
export const handlebarsFilter: FilterDefinition<'text', 'text'> = {
  name: 'handlebars',
  from: 'text',
  to: 'text',
  run(input, args, context) {
    const hbs = createEnvironment(context)
    const template = hbs.compile(input, {strict: args.strict === true, noEscape: args.noEscape === true})
    return template({...context.assigns, ...args})
  }
}
