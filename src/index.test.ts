import { test } from "node:test"
import assert from "node:assert/strict"
import { join } from "path"

import { Environment } from "./environment"
import { run, runFile } from "./index"
import { int } from "./value"

function fixture(name: string): string {
  return join(__dirname, "fixtures", name)
}

test("run", () => {
  const { errors, result } = run("let x = 3; x * x")
  assert.deepEqual(errors, [])
  assert.deepEqual(result, int(9n))
})

test("run with a shared environment", () => {
  const env = new Environment()
  assert.equal(run("let a = 2;", env).result, undefined)
  assert.deepEqual(run("a * 21", env).result, int(42n))
})

test("run skips evaluation when there are parse errors", () => {
  const env = new Environment()
  const { errors, result } = run("let a = 1; let b 2;", env)
  assert.equal(errors.length, 1)
  assert.equal(result, undefined)
  assert.equal(env.has("a"), false)
})

test("run a file", () => {
  const { errors, result } = runFile(fixture("fibonacci.sim"))
  assert.deepEqual(errors, [])
  assert.deepEqual(result, int(610n))
})

test("run a file with a parse error", () => {
  const { errors, result } = runFile(fixture("broken.sim"))
  assert.deepEqual(
    errors.map((err) => err.message),
    ["expected next token to be assign, got identifier(total) instead"]
  )
  assert.equal(result, undefined)
})
