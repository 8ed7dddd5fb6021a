/**
 * Arithmetic expression evaluator for the calculator cell.
 *
 *   expression := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "%") unary)*
 *   unary      := ("+" | "-") unary | power
 *   power      := atom ("^" unary)?
 *   atom       := number | "(" expression ")"
 */
import { Either, Schema } from "effect"

export class InvalidExpression extends Schema.TaggedError<InvalidExpression>()(
  "InvalidExpression",
  {
    expression: Schema.String,
    message: Schema.String
  }
) {}

type Token =
  | { readonly kind: "number"; readonly value: number; readonly at: number }
  | { readonly kind: "operator"; readonly value: string; readonly at: number }

const OPERATORS = new Set(["+", "-", "*", "/", "%", "^", "(", ")"])

class ParseFailure extends Error {}

const tokenize = (input: string): Array<Token> => {
  const tokens: Array<Token> = []
  let i = 0
  while (i < input.length) {
    const char = input.charAt(i)
    if (/\s/.test(char)) {
      i++
      continue
    }
    if (OPERATORS.has(char)) {
      tokens.push({ kind: "operator", value: char, at: i })
      i++
      continue
    }
    const match = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(input.slice(i))
    if (match === null) throw new ParseFailure(`Unexpected character '${char}' at position ${i + 1}`)
    tokens.push({ kind: "number", value: Number(match[0]), at: i })
    i += match[0].length
  }
  return tokens
}

const parse = (tokens: ReadonlyArray<Token>): number => {
  let position = 0

  const peek = (): Token | undefined => tokens[position]
  const accept = (operator: string): boolean => {
    const token = peek()
    if (token?.kind === "operator" && token.value === operator) {
      position++
      return true
    }
    return false
  }

  const expression = (): number => {
    let value = term()
    for (;;) {
      if (accept("+")) value += term()
      else if (accept("-")) value -= term()
      else return value
    }
  }

  const term = (): number => {
    let value = unary()
    for (;;) {
      if (accept("*")) value *= unary()
      else if (accept("/")) {
        const divisor = unary()
        if (divisor === 0) throw new ParseFailure("Division by zero")
        value /= divisor
      } else if (accept("%")) {
        const divisor = unary()
        if (divisor === 0) throw new ParseFailure("Division by zero")
        value %= divisor
      } else return value
    }
  }

  const unary = (): number => {
    if (accept("-")) return -unary()
    if (accept("+")) return unary()
    return power()
  }

  const power = (): number => {
    const base = atom()
    return accept("^") ? base ** unary() : base
  }

  const atom = (): number => {
    const token = peek()
    if (token === undefined) throw new ParseFailure("Unexpected end of expression")
    if (token.kind === "number") {
      position++
      return token.value
    }
    if (accept("(")) {
      const value = expression()
      if (!accept(")")) throw new ParseFailure("Missing closing parenthesis")
      return value
    }
    throw new ParseFailure(`Unexpected '${token.value}' at position ${token.at + 1}`)
  }

  const value = expression()
  const rest = peek()
  if (rest !== undefined) throw new ParseFailure(`Unexpected '${rest.value}' at position ${rest.at + 1}`)
  return value
}

export const evaluate = (expression: string): Either.Either<number, InvalidExpression> =>
  Either.try({
    try: () => {
      if (expression.trim() === "") throw new ParseFailure("Empty expression")
      const value = parse(tokenize(expression))
      if (!Number.isFinite(value)) throw new ParseFailure("Result is not a finite number")
      return value
    },
    catch: (error) =>
      new InvalidExpression({
        expression,
        message: error instanceof Error ? error.message : String(error)
      })
  })
