export type Identifier = { tag: "identifier"; value: string }

export type PrefixOp = "!" | "-"
export type InfixOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="

export type Expr =
  | Identifier
  | { tag: "integer"; value: bigint }
  | { tag: "boolean"; value: boolean }
  | { tag: "prefix"; op: PrefixOp; right: Expr }
  | { tag: "infix"; op: InfixOp; left: Expr; right: Expr }
  | {
      tag: "if"
      condition: Expr
      consequence: Block
      alternative: Block | null
    }
  | { tag: "function"; params: Identifier[]; body: Block }
  | { tag: "call"; callee: Expr; args: Expr[] }

export type Stmt =
  | { tag: "let"; name: Identifier; value: Expr }
  | { tag: "return"; value: Expr }
  | { tag: "expr"; value: Expr }

export type Block = Stmt[]
export type Program = Stmt[]

// binding power, only ever compared
export const Precedence = {
  lowest: 0,
  equals: 1,
  lessGreater: 2,
  sum: 3,
  product: 4,
  prefix: 5,
  call: 6,
} as const
export type Precedence = (typeof Precedence)[keyof typeof Precedence]

/**
 * Source-like rendering with every prefix and infix expression
 * parenthesized, so `a + b - c` prints as `((a + b) - c)`.
 */
export function print(node: Expr | Stmt | Stmt[]): string {
  if (Array.isArray(node)) return node.map(print).join(" ")
  switch (node.tag) {
    case "let":
      return `let ${node.name.value} = ${print(node.value)};`
    case "return":
      return `return ${print(node.value)};`
    case "expr":
      return print(node.value)
    case "identifier":
      return node.value
    case "integer":
      return String(node.value)
    case "boolean":
      return String(node.value)
    case "prefix":
      return `(${node.op}${print(node.right)})`
    case "infix":
      return `(${print(node.left)} ${node.op} ${print(node.right)})`
    case "if": {
      const base = `if ${print(node.condition)} { ${print(node.consequence)} }`
      if (!node.alternative) return base
      return `${base} else { ${print(node.alternative)} }`
    }
    case "function":
      return `fn(${params(node.params)}) { ${print(node.body)} }`
    case "call":
      return `${print(node.callee)}(${node.args.map(print).join(", ")})`
  }
}

export function params(list: Identifier[]): string {
  return list.map((param) => param.value).join(", ")
}
