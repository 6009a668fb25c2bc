// Precedence-climbing parser. `current` is the token being parsed and `peek`
// the one after it; every parselet leaves `current` on the last token of the
// construct it parsed.

import { Lexer } from "./lexer"
import { describe, is } from "./token"
import type { Token, TokenOf, TokenTag } from "./token"
import { Precedence } from "./ast"
import type {
  Block,
  Expr,
  Identifier,
  InfixOp,
  PrefixOp,
  Program,
  Stmt,
} from "./ast"

export type ParseErrorKind = "unexpectedToken"

export class ParseError {
  readonly kind: ParseErrorKind = "unexpectedToken"
  readonly message: string
  constructor(readonly expected: TokenTag, readonly received: Token) {
    this.message = `expected next token to be ${expected}, got ${describe(
      received
    )} instead`
  }
  toString(): string {
    return `Unexpected token: ${this.message}`
  }
}

type InfixRule = { op: InfixOp; precedence: Precedence }

const infixRules: Partial<Record<TokenTag, InfixRule>> = {
  equal: { op: "==", precedence: Precedence.equals },
  notEqual: { op: "!=", precedence: Precedence.equals },
  lessThan: { op: "<", precedence: Precedence.lessGreater },
  lessThanEqual: { op: "<=", precedence: Precedence.lessGreater },
  greaterThan: { op: ">", precedence: Precedence.lessGreater },
  greaterThanEqual: { op: ">=", precedence: Precedence.lessGreater },
  plus: { op: "+", precedence: Precedence.sum },
  minus: { op: "-", precedence: Precedence.sum },
  asterisk: { op: "*", precedence: Precedence.product },
  slash: { op: "/", precedence: Precedence.product },
}

function precedenceOf(token: Token): Precedence {
  if (token.tag === "openParen") return Precedence.call
  return infixRules[token.tag]?.precedence ?? Precedence.lowest
}

export class Parser {
  private current: Token
  private peek: Token
  readonly errors: ParseError[] = []
  constructor(private readonly lexer: Lexer) {
    this.current = lexer.nextToken()
    this.peek = lexer.nextToken()
  }
  parseProgram(): Program {
    const program: Program = []
    while (this.current.tag !== "eof") {
      const stmt = this.parseStatement()
      if (stmt) program.push(stmt)
      this.advance()
    }
    return program
  }
  private advance() {
    this.current = this.peek
    this.peek = this.lexer.nextToken()
  }
  private expectPeek<Tag extends TokenTag>(tag: Tag): TokenOf<Tag> | null {
    const token = this.peek
    if (is(token, tag)) {
      this.advance()
      return token
    }
    this.errors.push(new ParseError(tag, token))
    return null
  }
  private skipSemicolon() {
    if (is(this.peek, "semicolon")) this.advance()
  }

  // statements

  private parseStatement(): Stmt | null {
    switch (this.current.tag) {
      case "let":
        return this.parseLet()
      case "return":
        return this.parseReturn()
      default:
        return this.parseExpressionStatement()
    }
  }
  private parseLet(): Stmt | null {
    const name = this.expectPeek("identifier")
    if (!name) return null
    if (!this.expectPeek("assign")) return null
    this.advance()
    const value = this.parseExpression(Precedence.lowest)
    if (!value) return null
    this.skipSemicolon()
    return { tag: "let", name: { tag: "identifier", value: name.value }, value }
  }
  private parseReturn(): Stmt | null {
    this.advance()
    const value = this.parseExpression(Precedence.lowest)
    if (!value) return null
    this.skipSemicolon()
    return { tag: "return", value }
  }
  private parseExpressionStatement(): Stmt | null {
    const value = this.parseExpression(Precedence.lowest)
    if (!value) return null
    this.skipSemicolon()
    return { tag: "expr", value }
  }
  // an unterminated block at eof is accepted as-is
  private parseBlock(): Block {
    const block: Block = []
    this.advance()
    while (this.current.tag !== "closeBrace" && this.current.tag !== "eof") {
      const stmt = this.parseStatement()
      if (stmt) block.push(stmt)
      this.advance()
    }
    return block
  }

  // expressions

  private parseExpression(precedence: Precedence): Expr | null {
    let left = this.parsePrefix()
    while (
      left &&
      !is(this.peek, "semicolon") &&
      precedence < precedenceOf(this.peek)
    ) {
      if (is(this.peek, "openParen")) {
        this.advance()
        left = this.parseCall(left)
        continue
      }
      const rule = infixRules[this.peek.tag]
      if (!rule) return left
      this.advance()
      left = this.parseInfix(left, rule)
    }
    return left
  }
  private parsePrefix(): Expr | null {
    const token = this.current
    switch (token.tag) {
      case "identifier":
        return { tag: "identifier", value: token.value }
      case "integer":
        return { tag: "integer", value: token.value }
      case "boolean":
        return { tag: "boolean", value: token.value }
      case "bang":
        return this.parsePrefixOp("!")
      case "minus":
        return this.parsePrefixOp("-")
      case "openParen":
        return this.parseGrouped()
      case "if":
        return this.parseIf()
      case "function":
        return this.parseFunction()
      default:
        return null
    }
  }
  private parsePrefixOp(op: PrefixOp): Expr | null {
    this.advance()
    const right = this.parseExpression(Precedence.prefix)
    if (!right) return null
    return { tag: "prefix", op, right }
  }
  // recursing at the operator's own precedence keeps equal-precedence
  // operators out of the right operand: they associate to the left
  private parseInfix(left: Expr, rule: InfixRule): Expr | null {
    this.advance()
    const right = this.parseExpression(rule.precedence)
    if (!right) return null
    return { tag: "infix", op: rule.op, left, right }
  }
  private parseGrouped(): Expr | null {
    this.advance()
    const value = this.parseExpression(Precedence.lowest)
    if (!this.expectPeek("closeParen")) return null
    return value
  }
  private parseIf(): Expr | null {
    if (!this.expectPeek("openParen")) return null
    this.advance()
    const condition = this.parseExpression(Precedence.lowest)
    if (!condition) return null
    if (!this.expectPeek("closeParen")) return null
    if (!this.expectPeek("openBrace")) return null
    const consequence = this.parseBlock()
    if (!is(this.peek, "else")) {
      return { tag: "if", condition, consequence, alternative: null }
    }
    this.advance()
    if (!this.expectPeek("openBrace")) return null
    const alternative = this.parseBlock()
    return { tag: "if", condition, consequence, alternative }
  }
  private parseFunction(): Expr | null {
    if (!this.expectPeek("openParen")) return null
    const params = this.parseParams()
    if (!params) return null
    if (!this.expectPeek("openBrace")) return null
    const body = this.parseBlock()
    return { tag: "function", params, body }
  }
  private parseParams(): Identifier[] | null {
    const params: Identifier[] = []
    if (is(this.peek, "closeParen")) {
      this.advance()
      return params
    }
    do {
      if (params.length) this.advance()
      const param = this.expectPeek("identifier")
      if (!param) return null
      params.push({ tag: "identifier", value: param.value })
    } while (is(this.peek, "comma"))
    if (!this.expectPeek("closeParen")) return null
    return params
  }
  private parseCall(callee: Expr): Expr | null {
    const args = this.parseArgs()
    if (!args) return null
    return { tag: "call", callee, args }
  }
  private parseArgs(): Expr[] | null {
    const args: Expr[] = []
    if (is(this.peek, "closeParen")) {
      this.advance()
      return args
    }
    do {
      if (args.length) this.advance()
      this.advance()
      const arg = this.parseExpression(Precedence.lowest)
      if (!arg) return null
      args.push(arg)
    } while (is(this.peek, "comma"))
    if (!this.expectPeek("closeParen")) return null
    return args
  }
}

export function parse(source: string): {
  program: Program
  errors: ParseError[]
} {
  const parser = new Parser(new Lexer(source))
  const program = parser.parseProgram()
  return { program, errors: parser.errors }
}
