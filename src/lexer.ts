import { UnreachableError } from "./error"
import type { Token } from "./token"

const re = {
  whitespace: /\s+/y,
  integer: /[0-9]+/y,
  identKw: /[a-zA-Z_][a-zA-Z0-9_]*/y,
  operator: /==|!=|<=|>=|[=+\-!*\/<>]/y,
  punctuation: /[,;(){}]/y,
}

const keywords: ReadonlyMap<string, Token> = new Map<string, Token>([
  ["fn", { tag: "function" }],
  ["let", { tag: "let" }],
  ["if", { tag: "if" }],
  ["else", { tag: "else" }],
  ["return", { tag: "return" }],
  ["true", { tag: "boolean", value: true }],
  ["false", { tag: "boolean", value: false }],
])

const matcherTable: Record<string, Token> = {
  "=": { tag: "assign" },
  "+": { tag: "plus" },
  "-": { tag: "minus" },
  "!": { tag: "bang" },
  "*": { tag: "asterisk" },
  "/": { tag: "slash" },
  "==": { tag: "equal" },
  "!=": { tag: "notEqual" },
  "<": { tag: "lessThan" },
  "<=": { tag: "lessThanEqual" },
  ">": { tag: "greaterThan" },
  ">=": { tag: "greaterThanEqual" },
  ",": { tag: "comma" },
  ";": { tag: "semicolon" },
  "(": { tag: "openParen" },
  ")": { tag: "closeParen" },
  "{": { tag: "openBrace" },
  "}": { tag: "closeBrace" },
}

const maxInt = 2n ** 63n - 1n

type Option<T> = { value: T } | null

export class Lexer implements Iterable<Token> {
  private index = 0
  constructor(private readonly code: string) {}
  nextToken(): Token {
    this.ignoreWhitespace()
    if (this.index >= this.code.length) return { tag: "eof" }

    const int = this.callRe(re.integer)
    if (int) {
      const value = BigInt(int.value)
      if (value > maxInt) return { tag: "illegal", value: int.value }
      return { tag: "integer", value }
    }

    const ident = this.callRe(re.identKw)
    if (ident) {
      const keyword = keywords.get(ident.value)
      if (keyword) return keyword
      return { tag: "identifier", value: ident.value }
    }

    const op = this.callRe(re.operator) ?? this.callRe(re.punctuation)
    if (op) {
      const token = matcherTable[op.value]
      if (!token) throw new UnreachableError(`no token for ${op.value}`)
      return token
    }

    // one whole code point, so astral characters are not split
    const ch = String.fromCodePoint(this.code.codePointAt(this.index) ?? 0)
    this.index += ch.length
    return { tag: "illegal", value: ch }
  }
  *[Symbol.iterator](): Iterator<Token> {
    while (true) {
      const token = this.nextToken()
      if (token.tag === "eof") return
      yield token
    }
  }
  private ignoreWhitespace() {
    re.whitespace.lastIndex = this.index
    if (re.whitespace.exec(this.code)) {
      this.index = re.whitespace.lastIndex
    }
  }
  private callRe(re: RegExp): Option<string> {
    re.lastIndex = this.index
    const out = re.exec(this.code)
    if (out) {
      this.index = re.lastIndex
      return { value: out[0] }
    }
    return null
  }
}
