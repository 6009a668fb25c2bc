export type Token =
  | { tag: "eof" }
  | { tag: "illegal"; value: string }
  | { tag: "identifier"; value: string }
  | { tag: "integer"; value: bigint }
  | { tag: "boolean"; value: boolean }
  // operators
  | { tag: "assign" }
  | { tag: "plus" }
  | { tag: "minus" }
  | { tag: "bang" }
  | { tag: "asterisk" }
  | { tag: "slash" }
  | { tag: "equal" }
  | { tag: "notEqual" }
  | { tag: "lessThan" }
  | { tag: "lessThanEqual" }
  | { tag: "greaterThan" }
  | { tag: "greaterThanEqual" }
  // delimiters
  | { tag: "comma" }
  | { tag: "semicolon" }
  | { tag: "openParen" }
  | { tag: "closeParen" }
  | { tag: "openBrace" }
  | { tag: "closeBrace" }
  // keywords
  | { tag: "function" }
  | { tag: "let" }
  | { tag: "if" }
  | { tag: "else" }
  | { tag: "return" }

export type TokenTag = Token["tag"]
export type TokenOf<Tag extends TokenTag> = Extract<Token, { tag: Tag }>

export function is<Tag extends TokenTag>(
  token: Token,
  tag: Tag
): token is TokenOf<Tag> {
  return token.tag === tag
}

// "integer(5)", "identifier(foo)", "semicolon"
export function describe(token: Token): string {
  switch (token.tag) {
    case "illegal":
    case "identifier":
    case "integer":
    case "boolean":
      return `${token.tag}(${String(token.value)})`
    default:
      return token.tag
  }
}
