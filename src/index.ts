import { readFileSync } from "fs"
import type { Program } from "./ast"
import { Environment } from "./environment"
import { Evaluator } from "./evaluator"
import type { Result } from "./evaluator"
import { parse } from "./parser"
import type { ParseError } from "./parser"

export { Lexer } from "./lexer"
export { Parser, ParseError, parse } from "./parser"
export { Environment } from "./environment"
export { Evaluator, evaluate } from "./evaluator"
export { Session } from "./repl"
export { inspect, isTruthy } from "./value"
export { print } from "./ast"
export type { Token } from "./token"
export type { Expr, Program, Stmt } from "./ast"
export type { Result } from "./evaluator"
export type { Outcome, Value } from "./value"

export type RunResult = {
  errors: ParseError[]
  program: Program
  result: Result | undefined
}

// a program with parse errors is not evaluated at all
export function run(
  source: string,
  env: Environment = new Environment()
): RunResult {
  const { program, errors } = parse(source)
  if (errors.length) return { errors, program, result: undefined }
  return { errors, program, result: new Evaluator(env).eval(program) }
}

export function runFile(file: string): RunResult {
  const source = readFileSync(file, { encoding: "utf-8" })
  return run(source)
}
