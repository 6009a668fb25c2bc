import { Environment } from "./environment"
import { Evaluator } from "./evaluator"
import { parse } from "./parser"
import { inspect, isError } from "./value"

export const PROMPT = ">> "

/**
 * Line-at-a-time front end. Every line gets a fresh parser, but all lines
 * share one top-level environment, so `let` bindings carry over.
 */
export class Session {
  private evaluator: Evaluator
  constructor(readonly env: Environment = new Environment()) {
    this.evaluator = new Evaluator(env)
  }
  // returns the lines to print for this input
  run(line: string): string[] {
    const { program, errors } = parse(line)
    if (errors.length) return errors.map((err) => String(err))

    const result = this.evaluator.eval(program)
    if (!result) return []
    if (isError(result)) return [`ERROR: ${result.message}`]
    return [inspect(result)]
  }
}
