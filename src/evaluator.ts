import type { Block, Expr, InfixOp, PrefixOp, Program, Stmt } from "./ast"
import { Environment } from "./environment"
import {
  bool,
  error,
  fn,
  inspect,
  int,
  isSignal,
  isTruthy,
  NULL,
  returned,
} from "./value"
import type { ErrorSignal, Outcome, Value } from "./value"

export type Result = Value | ErrorSignal

export class Evaluator {
  constructor(private env: Environment) {}
  get environment(): Environment {
    return this.env
  }
  /**
   * Runs a program against the active environment. Returns `undefined` when
   * the last statement produced nothing (a `let`, or an `if` with no branch
   * taken). A top-level `return` ends the program with its value.
   *
   * Recursion deep enough to exhaust the host stack ends the program with a
   * `stack overflow` error; every call frame has restored its caller's
   * environment by the time it is caught.
   */
  eval(program: Program): Result | undefined {
    try {
      return this.evalProgram(program)
    } catch (err) {
      if (err instanceof RangeError) return error("stack overflow")
      throw err
    }
  }
  private evalProgram(program: Program): Result | undefined {
    let result: Value | undefined
    for (const stmt of program) {
      const outcome = this.evalStatement(stmt)
      if (isSignal(outcome)) {
        return outcome.tag === "return" ? outcome.value : outcome
      }
      result = outcome
    }
    return result
  }
  // unlike `eval`, passes a return signal through so that it can end the
  // enclosing function rather than just this block
  private evalBlock(block: Block): Outcome | undefined {
    let result: Value | undefined
    for (const stmt of block) {
      const outcome = this.evalStatement(stmt)
      if (isSignal(outcome)) return outcome
      result = outcome
    }
    return result
  }
  private evalStatement(stmt: Stmt): Outcome | undefined {
    switch (stmt.tag) {
      case "let": {
        const value = this.evalExpression(stmt.value)
        if (isSignal(value)) return value
        this.env.set(stmt.name.value, value ?? NULL)
        return undefined
      }
      case "return": {
        const value = this.evalExpression(stmt.value)
        if (isSignal(value)) return value
        return returned(value ?? NULL)
      }
      case "expr":
        return this.evalExpression(stmt.value)
    }
  }
  private evalExpression(expr: Expr): Outcome | undefined {
    switch (expr.tag) {
      case "identifier":
        return (
          this.env.get(expr.value) ??
          error(`identifier not found: ${expr.value}`)
        )
      case "integer":
        return int(expr.value)
      case "boolean":
        return bool(expr.value)
      case "prefix": {
        const right = this.evalExpression(expr.right)
        if (isSignal(right)) return right
        return evalPrefix(expr.op, right ?? NULL)
      }
      case "infix": {
        const left = this.evalExpression(expr.left)
        if (isSignal(left)) return left
        const right = this.evalExpression(expr.right)
        if (isSignal(right)) return right
        return evalInfix(expr.op, left ?? NULL, right ?? NULL)
      }
      case "if": {
        const condition = this.evalExpression(expr.condition)
        if (isSignal(condition)) return condition
        if (isTruthy(condition ?? NULL)) {
          return this.evalBlock(expr.consequence)
        }
        if (expr.alternative) return this.evalBlock(expr.alternative)
        return undefined
      }
      case "function":
        return fn(expr.params, expr.body, this.env)
      case "call":
        return this.evalCall(expr.callee, expr.args)
    }
  }
  private evalCall(callee: Expr, argExprs: Expr[]): Outcome {
    const args: Value[] = []
    for (const argExpr of argExprs) {
      const arg = this.evalExpression(argExpr)
      if (isSignal(arg)) return arg
      args.push(arg ?? NULL)
    }

    const target = this.evalExpression(callee)
    if (isSignal(target)) return target
    const func = target ?? NULL
    if (func.tag !== "function") {
      return error(`${inspect(func)} is not valid function`)
    }
    if (func.params.length !== args.length) {
      return error(
        `wrong number of arguments: ${func.params.length} expected but ${args.length} given`
      )
    }

    // parameters live in a child of the closure's scope, not the caller's
    const scope = new Environment(func.env)
    for (const [i, param] of func.params.entries()) {
      scope.set(param.value, args[i])
    }

    const caller = this.env
    this.env = scope
    try {
      const result = this.evalBlock(func.body)
      if (!result) return NULL
      if (result.tag === "return") return result.value
      return result
    } finally {
      this.env = caller
    }
  }
}

function evalPrefix(op: PrefixOp, right: Value): Result {
  switch (op) {
    case "!":
      return bool(!isTruthy(right))
    case "-":
      if (right.tag !== "integer") {
        return error(`unknown operator: -${inspect(right)}`)
      }
      return int(-right.value)
  }
}

function evalInfix(op: InfixOp, left: Value, right: Value): Result {
  if (left.tag === "integer" && right.tag === "integer") {
    return evalIntegerInfix(op, left.value, right.value)
  }
  if (left.tag === "boolean" && right.tag === "boolean") {
    switch (op) {
      case "==":
        return bool(left.value === right.value)
      case "!=":
        return bool(left.value !== right.value)
      default:
        return error(
          `unknown operator: ${inspect(left)} ${op} ${inspect(right)}`
        )
    }
  }
  return error(`type mismatch: ${inspect(left)} ${op} ${inspect(right)}`)
}

function evalIntegerInfix(op: InfixOp, left: bigint, right: bigint): Result {
  switch (op) {
    case "+":
      return int(left + right)
    case "-":
      return int(left - right)
    case "*":
      return int(left * right)
    case "/":
      if (right === 0n) return error(`division by zero: ${left} / 0`)
      // bigint division truncates toward zero
      return int(left / right)
    case "==":
      return bool(left === right)
    case "!=":
      return bool(left !== right)
    case "<":
      return bool(left < right)
    case "<=":
      return bool(left <= right)
    case ">":
      return bool(left > right)
    case ">=":
      return bool(left >= right)
  }
}

export function evaluate(
  program: Program,
  env: Environment = new Environment()
): Result | undefined {
  return new Evaluator(env).eval(program)
}
