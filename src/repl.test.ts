import { test } from "node:test"
import assert from "node:assert/strict"

import { Session } from "./repl"

test("bindings persist across lines", () => {
  const session = new Session()
  assert.deepEqual(session.run("let a = 5;"), [])
  assert.deepEqual(session.run("a * 2"), ["10"])
  assert.deepEqual(session.run("let newAdder = fn(x) { fn(y) { x + y } };"), [])
  assert.deepEqual(session.run("let addTwo = newAdder(2);"), [])
  assert.deepEqual(session.run("addTwo(3)"), ["5"])
  assert.equal(session.env.has("addTwo"), true)
})

test("value forms", () => {
  const session = new Session()
  assert.deepEqual(session.run("true"), ["true"])
  assert.deepEqual(session.run("-7"), ["-7"])
  assert.deepEqual(session.run("fn(x, y) { x }"), ["fn(x, y) { ... }"])
  assert.deepEqual(session.run("fn() {}()"), ["null"])
  assert.deepEqual(session.run("if (false) { 1 }"), [])
  assert.deepEqual(session.run(""), [])
})

test("runtime errors", () => {
  const session = new Session()
  assert.deepEqual(session.run("5 + true"), ["ERROR: type mismatch: 5 + true"])
  assert.deepEqual(session.run("nope"), ["ERROR: identifier not found: nope"])
})

test("lines with parse errors are not evaluated", () => {
  const session = new Session()
  assert.deepEqual(session.run("let y = 1; let x 5;"), [
    "Unexpected token: expected next token to be assign, got integer(5) instead",
  ])
  assert.deepEqual(session.run("y"), ["ERROR: identifier not found: y"])
})

test("one line per parse error", () => {
  const session = new Session()
  assert.deepEqual(session.run("let 1; let = 2;"), [
    "Unexpected token: expected next token to be identifier, got integer(1) instead",
    "Unexpected token: expected next token to be identifier, got assign instead",
  ])
})

test("deep recursion does not end the session", () => {
  const session = new Session()
  assert.deepEqual(session.run("let f = fn(x) { f(x) };"), [])
  assert.deepEqual(session.run("f(1)"), ["ERROR: stack overflow"])
  assert.deepEqual(session.run("let g = 7;"), [])
  assert.deepEqual(session.run("g"), ["7"])
})
