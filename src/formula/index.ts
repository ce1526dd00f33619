export { FormulaError } from "./errors.js";
export { tokenize, type Token, type TokenType } from "./lexer.js";
export {
  parseFormula,
  FORMULA_METHODS,
  MAX_DEPTH,
  type FormulaMethod,
  type FormulaNode,
  type FormulaArgument,
  type BinaryOperator,
} from "./parser.js";
export {
  evaluateFormula,
  tryEvaluateFormula,
  DEFAULT_MAX_FORMULA_LENGTH,
  type FormulaOutcome,
  type FormulaOptions,
} from "./evaluator.js";
