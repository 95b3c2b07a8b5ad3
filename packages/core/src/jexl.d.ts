declare module 'jexl' {
  class Expression {
    evalSync(context?: Record<string, unknown>): unknown
  }

  class Jexl {
    compile(expression: string): Expression
  }

  const jexlModule: {Jexl: typeof Jexl}
  export default jexlModule
}
