#!/usr/bin/env node
import { createInterface } from "readline"
import { runFile } from "./index"
import { PROMPT, Session } from "./repl"
import { inspect } from "./value"

// prints what running the file produced and returns the exit code
export function runScript(file: string): number {
  const { errors, result } = runFile(file)
  if (errors.length) {
    for (const err of errors) console.error(String(err))
    return 1
  }
  if (!result) return 0
  if (result.tag === "error") {
    console.error(`ERROR: ${result.message}`)
    return 1
  }
  console.log(inspect(result))
  return 0
}

function startRepl() {
  const session = new Session()
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: PROMPT,
  })
  console.log("Feel free to type in commands")
  rl.prompt()
  rl.on("line", (line) => {
    for (const out of session.run(line)) console.log(out)
    rl.prompt()
  })
  rl.on("close", () => {
    console.log()
  })
}

if (require.main === module) {
  const [file] = process.argv.slice(2)
  if (file) {
    process.exitCode = runScript(file)
  } else {
    startRepl()
  }
}
