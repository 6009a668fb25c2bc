import { params } from "./ast"
import type { Block, Identifier } from "./ast"
import type { Environment } from "./environment"

export type IntegerValue = { tag: "integer"; value: bigint }
export type BooleanValue = { tag: "boolean"; value: boolean }
export type NullValue = { tag: "null" }
export type FunctionValue = {
  tag: "function"
  params: Identifier[]
  body: Block
  env: Environment
}

export type Value = IntegerValue | BooleanValue | NullValue | FunctionValue

// Control-flow carriers. These travel up through evaluation results and are
// never bound to a name or passed as an argument.
export type ReturnSignal = { tag: "return"; value: Value }
export type ErrorSignal = { tag: "error"; message: string }
export type Signal = ReturnSignal | ErrorSignal

export type Outcome = Value | Signal

export const TRUE: BooleanValue = { tag: "boolean", value: true }
export const FALSE: BooleanValue = { tag: "boolean", value: false }
export const NULL: NullValue = { tag: "null" }

// signed 64-bit, two's complement
export function int(value: bigint): IntegerValue {
  return { tag: "integer", value: BigInt.asIntN(64, value) }
}

export function bool(value: boolean): BooleanValue {
  return value ? TRUE : FALSE
}

export function fn(
  params: Identifier[],
  body: Block,
  env: Environment
): FunctionValue {
  return { tag: "function", params, body, env }
}

export function returned(value: Value): ReturnSignal {
  return { tag: "return", value }
}

export function error(message: string): ErrorSignal {
  return { tag: "error", message }
}

export function isError(outcome: Outcome | undefined): outcome is ErrorSignal {
  return outcome?.tag === "error"
}

export function isSignal(outcome: Outcome | undefined): outcome is Signal {
  return outcome?.tag === "return" || outcome?.tag === "error"
}

export function isTruthy(value: Value): boolean {
  switch (value.tag) {
    case "null":
      return false
    case "boolean":
      return value.value
    default:
      return true
  }
}

export function inspect(outcome: Outcome): string {
  switch (outcome.tag) {
    case "integer":
    case "boolean":
      return String(outcome.value)
    case "null":
      return "null"
    case "function":
      return `fn(${params(outcome.params)}) { ... }`
    case "return":
      return inspect(outcome.value)
    case "error":
      return outcome.message
  }
}
