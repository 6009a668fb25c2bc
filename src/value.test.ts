import { test } from "node:test"
import assert from "node:assert/strict"

import { Environment } from "./environment"
import {
  error,
  FALSE,
  fn,
  inspect,
  int,
  isError,
  isSignal,
  isTruthy,
  NULL,
  returned,
  TRUE,
} from "./value"

test("truthiness", () => {
  assert.equal(isTruthy(NULL), false)
  assert.equal(isTruthy(FALSE), false)
  assert.equal(isTruthy(TRUE), true)
  assert.equal(isTruthy(int(0n)), true)
  assert.equal(isTruthy(fn([], [], new Environment())), true)
})

test("inspect", () => {
  assert.equal(inspect(int(-42n)), "-42")
  assert.equal(inspect(TRUE), "true")
  assert.equal(inspect(NULL), "null")
  assert.equal(inspect(fn([], [], new Environment())), "fn() { ... }")
  assert.equal(
    inspect(
      fn(
        [
          { tag: "identifier", value: "a" },
          { tag: "identifier", value: "b" },
        ],
        [],
        new Environment()
      )
    ),
    "fn(a, b) { ... }"
  )
  assert.equal(inspect(returned(int(3n))), "3")
  assert.equal(inspect(error("identifier not found: x")), "identifier not found: x")
})

test("int wraps to signed 64 bits", () => {
  assert.deepEqual(int(2n ** 63n), int(-(2n ** 63n)))
  assert.equal(int(2n ** 64n + 5n).value, 5n)
})

test("signals", () => {
  assert.equal(isSignal(returned(NULL)), true)
  assert.equal(isSignal(error("x")), true)
  assert.equal(isSignal(NULL), false)
  assert.equal(isSignal(undefined), false)
  assert.equal(isError(error("x")), true)
  assert.equal(isError(returned(NULL)), false)
})
