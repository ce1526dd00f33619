/**
 * Formula tokenizer.
 *
 * Recognizes numbers, identifiers and the punctuation of the formula grammar.
 * Names must start with a letter; quotes, brackets and any other character are rejected.
 */

import { FormulaError } from "./errors.js";

export type TokenType =
  | "number"
  | "identifier"
  | "plus"
  | "minus"
  | "star"
  | "slash"
  | "lparen"
  | "rparen"
  | "dot"
  | "comma"
  | "equals"
  | "eof";

export interface Token {
  type: TokenType;
  text: string;
  position: number;
}

const PUNCTUATION = new Map<string, TokenType>([
  ["+", "plus"],
  ["-", "minus"],
  ["*", "star"],
  ["/", "slash"],
  ["(", "lparen"],
  [")", "rparen"],
  [".", "dot"],
  [",", "comma"],
  ["=", "equals"],
]);

const NUMBER = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
      pos++;
      continue;
    }

    const rest = source.slice(pos);
    const previous = tokens[tokens.length - 1];

    // ".5" is a number unless it follows something a method call could attach to
    const numberAllowed =
      ch !== "." || previous === undefined || !["identifier", "rparen", "number"].includes(previous.type);
    const num = numberAllowed ? NUMBER.exec(rest) : null;
    if (num) {
      tokens.push({ type: "number", text: num[0], position: pos });
      pos += num[0].length;
      continue;
    }

    const ident = IDENTIFIER.exec(rest);
    if (ident) {
      tokens.push({ type: "identifier", text: ident[0], position: pos });
      pos += ident[0].length;
      continue;
    }

    const punct = PUNCTUATION.get(ch);
    if (punct !== undefined) {
      tokens.push({ type: punct, text: ch, position: pos });
      pos++;
      continue;
    }

    throw new FormulaError(`Unexpected character '${ch}'`, pos);
  }

  tokens.push({ type: "eof", text: "", position: source.length });
  return tokens;
}
