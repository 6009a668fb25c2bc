import type { Value } from "./value"

/**
 * A lexical scope. Function values hold on to the environment they were
 * created in, so one instance can be shared by any number of closures and
 * live call frames; a `let` in it is visible to all of them.
 */
export class Environment {
  private bindings = new Map<string, Value>()
  constructor(readonly outer: Environment | null = null) {}
  get(key: string): Value | undefined {
    const found = this.bindings.get(key)
    if (found) return found
    return this.outer?.get(key)
  }
  // always binds in this scope, shadowing any outer binding
  set(key: string, value: Value): Value {
    this.bindings.set(key, value)
    return value
  }
  has(key: string): boolean {
    return this.bindings.has(key)
  }
}
