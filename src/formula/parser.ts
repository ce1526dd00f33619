/**
 * Recursive-descent parser for the formula grammar:
 *
 *   expr     := term (("+" | "-") term)*
 *   term     := unary (("*" | "/") unary)*
 *   unary    := ("-" | "+") unary | postfix
 *   postfix  := primary ("." method "(" args? ")")*
 *   primary  := number | column | "(" expr ")"
 *   args     := arg ("," arg)*
 *   arg      := (name "=")? expr
 *
 * Column names and method names are resolved here against fixed allow-lists,
 * so an accepted tree can only ever reference OHLCV data and allow-listed methods.
 */

import { OHLCV_COLUMNS, type OhlcvColumn } from "../types/market.js";
import { FormulaError } from "./errors.js";
import { tokenize, type Token, type TokenType } from "./lexer.js";

export const FORMULA_METHODS = [
  "rolling",
  "ewm",
  "diff",
  "shift",
  "abs",
  "mean",
  "std",
  "min",
  "max",
  "sum",
] as const;

export type FormulaMethod = (typeof FORMULA_METHODS)[number];

export type BinaryOperator = "+" | "-" | "*" | "/";

export interface FormulaArgument {
  name: string | null;
  value: FormulaNode;
}

export type FormulaNode =
  | { type: "number"; value: number }
  | { type: "column"; name: OhlcvColumn }
  | { type: "negate"; operand: FormulaNode }
  | { type: "binary"; operator: BinaryOperator; left: FormulaNode; right: FormulaNode }
  | { type: "call"; target: FormulaNode; method: FormulaMethod; args: FormulaArgument[] };

export const MAX_DEPTH = 64;

function lookupColumn(name: string): OhlcvColumn | undefined {
  return OHLCV_COLUMNS.find((c) => c === name);
}

function lookupMethod(name: string): FormulaMethod | undefined {
  return FORMULA_METHODS.find((m) => m === name);
}

class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): FormulaNode {
    const node = this.expression();
    const next = this.peek();
    if (next.type !== "eof") {
      throw new FormulaError(`Unexpected '${next.text}'`, next.position);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "eof") this.index++;
    return token;
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw new FormulaError(
        `Expected ${description} but found ${token.type === "eof" ? "end of formula" : `'${token.text}'`}`,
        token.position
      );
    }
    return this.advance();
  }

  private enter(position: number): void {
    this.depth++;
    if (this.depth > MAX_DEPTH) {
      throw new FormulaError(`Formula nested deeper than ${MAX_DEPTH} levels`, position);
    }
  }

  private leave(): void {
    this.depth--;
  }

  private expression(): FormulaNode {
    this.enter(this.peek().position);
    let left = this.term();
    while (this.peek().type === "plus" || this.peek().type === "minus") {
      const operator: BinaryOperator = this.advance().type === "plus" ? "+" : "-";
      left = { type: "binary", operator, left, right: this.term() };
    }
    this.leave();
    return left;
  }

  private term(): FormulaNode {
    let left = this.unary();
    while (this.peek().type === "star" || this.peek().type === "slash") {
      const operator: BinaryOperator = this.advance().type === "star" ? "*" : "/";
      left = { type: "binary", operator, left, right: this.unary() };
    }
    return left;
  }

  private unary(): FormulaNode {
    const token = this.peek();
    if (token.type === "minus" || token.type === "plus") {
      this.advance();
      this.enter(token.position);
      const operand = this.unary();
      this.leave();
      return token.type === "minus" ? { type: "negate", operand } : operand;
    }
    return this.postfix();
  }

  private postfix(): FormulaNode {
    let node = this.primary();
    while (this.peek().type === "dot") {
      this.advance();
      const nameToken = this.expect("identifier", "a method name");
      const method = lookupMethod(nameToken.text);
      if (method === undefined) {
        throw new FormulaError(`Method '${nameToken.text}' is not allowed`, nameToken.position);
      }
      this.expect("lparen", "'('");
      const args = this.peek().type === "rparen" ? [] : this.arguments();
      this.expect("rparen", "')'");
      node = { type: "call", target: node, method, args };
    }
    return node;
  }

  private arguments(): FormulaArgument[] {
    const args: FormulaArgument[] = [this.argument()];
    while (this.peek().type === "comma") {
      this.advance();
      args.push(this.argument());
    }
    return args;
  }

  private argument(): FormulaArgument {
    const token = this.peek();
    const following = this.tokens[this.index + 1];
    if (token.type === "identifier" && following?.type === "equals") {
      this.advance();
      this.advance();
      return { name: token.text, value: this.expression() };
    }
    return { name: null, value: this.expression() };
  }

  private primary(): FormulaNode {
    const token = this.advance();
    switch (token.type) {
      case "number": {
        const value = Number(token.text);
        if (!Number.isFinite(value)) {
          throw new FormulaError(`Number '${token.text}' is out of range`, token.position);
        }
        return { type: "number", value };
      }
      case "identifier": {
        const column = lookupColumn(token.text);
        if (column === undefined) {
          throw new FormulaError(
            `Unknown name '${token.text}' (allowed: ${OHLCV_COLUMNS.join(", ")})`,
            token.position
          );
        }
        return { type: "column", name: column };
      }
      case "lparen": {
        const inner = this.expression();
        this.expect("rparen", "')'");
        return inner;
      }
      default:
        throw new FormulaError(
          token.type === "eof" ? "Unexpected end of formula" : `Unexpected '${token.text}'`,
          token.position
        );
    }
  }
}

/**
 * Parse a formula into a syntax tree.
 *
 * @throws FormulaError on any lexical or grammatical problem
 */
export function parseFormula(source: string): FormulaNode {
  return new Parser(tokenize(source)).parse();
}
