/**
 * Restricted Formula Evaluator
 *
 * Evaluates user formulas such as `Close.rolling(10).mean()` or
 * `(High + Low) / 2 - Close.ewm(span=20).mean()` against a PriceFrame.
 *
 * The only names in scope are the five OHLCV columns, and methods are
 * dispatched through a fixed switch over the parsed allow-list. Nothing here
 * performs property lookup on user-supplied names or calls into eval/Function.
 */

import { frameColumn, toSeries } from "../series/frame.js";
import {
  aggregateAll,
  combine,
  diff,
  ewm,
  mapValues,
  rolling,
  shift,
  type Aggregate,
} from "../indicators/rolling.js";
import { moduleLogger } from "../utils/logger.js";
import { FormulaError } from "./errors.js";
import {
  parseFormula,
  type BinaryOperator,
  type FormulaArgument,
  type FormulaMethod,
  type FormulaNode,
} from "./parser.js";
import type { PriceFrame, Series, SeriesValue } from "../types/market.js";

const log = moduleLogger("formula");

export const DEFAULT_MAX_FORMULA_LENGTH = 512;

/** Intermediate values; only a "series" can be a final result */
type FormulaValue =
  | { kind: "series"; values: SeriesValue[] }
  | { kind: "scalar"; value: number }
  | { kind: "rolling"; values: SeriesValue[]; window: number }
  | { kind: "ewm"; values: SeriesValue[]; span: number };

export type FormulaOutcome =
  | { ok: true; series: Series }
  | { ok: false; reason: string };

export interface FormulaOptions {
  /** Longest formula text accepted */
  maxLength?: number;
}

const OPERATORS: Record<BinaryOperator, (a: number, b: number) => number> = {
  "+": (a, b) => a + b,
  "-": (a, b) => a - b,
  "*": (a, b) => a * b,
  "/": (a, b) => a / b,
};

function describe(value: FormulaValue): string {
  switch (value.kind) {
    case "series":
      return "a series";
    case "scalar":
      return "a number";
    case "rolling":
      return "a rolling window (call mean/std/min/max/sum on it)";
    case "ewm":
      return "an ewm window (call mean on it)";
  }
}

// ─── Argument binding ──────────────────────────────────────

interface ParameterSpec {
  name: string;
  defaultValue?: number;
}

/**
 * Match positional and keyword arguments against a method's parameters.
 * Every argument must evaluate to a number.
 */
function bindArguments(
  method: FormulaMethod,
  args: FormulaArgument[],
  params: ParameterSpec[],
  evaluateArg: (node: FormulaNode) => FormulaValue
): number[] {
  if (args.length > params.length) {
    throw new FormulaError(`${method}() takes at most ${params.length} argument(s), got ${args.length}`);
  }

  const bound = new Map<string, number>();
  args.forEach((arg, i) => {
    const param = arg.name === null ? params[i] : params.find((p) => p.name === arg.name);
    if (param === undefined) {
      throw new FormulaError(`${method}() has no parameter '${arg.name ?? ""}'`);
    }
    if (bound.has(param.name)) {
      throw new FormulaError(`${method}() got '${param.name}' twice`);
    }
    const value = evaluateArg(arg.value);
    if (value.kind !== "scalar") {
      throw new FormulaError(`${method}() argument '${param.name}' must be a number, got ${describe(value)}`);
    }
    bound.set(param.name, value.value);
  });

  return params.map((param) => {
    const value = bound.get(param.name) ?? param.defaultValue;
    if (value === undefined) {
      throw new FormulaError(`${method}() is missing argument '${param.name}'`);
    }
    return value;
  });
}

function requireInteger(method: FormulaMethod, name: string, value: number, min?: number): number {
  if (!Number.isInteger(value) || (min !== undefined && value < min)) {
    const bound = min === undefined ? "" : ` >= ${min}`;
    throw new FormulaError(`${method}() ${name} must be an integer${bound}, got ${value}`);
  }
  return value;
}

// ─── Evaluation ────────────────────────────────────────────

class FormulaEvaluator {
  constructor(private readonly frame: PriceFrame) {}

  evaluate(node: FormulaNode): FormulaValue {
    switch (node.type) {
      case "number":
        return { kind: "scalar", value: node.value };
      case "column":
        return { kind: "series", values: [...frameColumn(this.frame, node.name)] };
      case "negate":
        return this.arithmetic("-", { kind: "scalar", value: 0 }, this.evaluate(node.operand));
      case "binary":
        return this.arithmetic(node.operator, this.evaluate(node.left), this.evaluate(node.right));
      case "call":
        return this.call(this.evaluate(node.target), node.method, node.args);
    }
  }

  private arithmetic(operator: BinaryOperator, left: FormulaValue, right: FormulaValue): FormulaValue {
    const fn = OPERATORS[operator];

    if (left.kind === "scalar" && right.kind === "scalar") {
      const value = fn(left.value, right.value);
      if (!Number.isFinite(value)) {
        throw new FormulaError(`${left.value} ${operator} ${right.value} is not a finite number`);
      }
      return { kind: "scalar", value };
    }
    if (left.kind === "series" && right.kind === "series") {
      return { kind: "series", values: combine(left.values, right.values, fn) };
    }
    if (left.kind === "series" && right.kind === "scalar") {
      const b = right.value;
      return { kind: "series", values: mapValues(left.values, (a) => fn(a, b)) };
    }
    if (left.kind === "scalar" && right.kind === "series") {
      const a = left.value;
      return { kind: "series", values: mapValues(right.values, (b) => fn(a, b)) };
    }
    throw new FormulaError(
      `Operator '${operator}' cannot combine ${describe(left)} with ${describe(right)}`
    );
  }

  private call(target: FormulaValue, method: FormulaMethod, args: FormulaArgument[]): FormulaValue {
    const bind = (params: ParameterSpec[]) =>
      bindArguments(method, args, params, (n) => this.evaluate(n));

    switch (target.kind) {
      case "series":
        return this.seriesMethod(target.values, method, bind);
      case "rolling": {
        if (method === "rolling" || method === "ewm" || method === "diff" || method === "shift" || method === "abs") {
          break;
        }
        bind([]);
        return { kind: "series", values: rolling(target.values, target.window, method) };
      }
      case "ewm": {
        if (method !== "mean") break;
        bind([]);
        return { kind: "series", values: ewm(target.values, target.span) };
      }
      case "scalar":
        break;
    }
    throw new FormulaError(`Method '${method}' is not available on ${describe(target)}`);
  }

  private seriesMethod(
    values: SeriesValue[],
    method: FormulaMethod,
    bind: (params: ParameterSpec[]) => number[]
  ): FormulaValue {
    switch (method) {
      case "rolling": {
        const [window] = bind([{ name: "window" }]);
        return { kind: "rolling", values, window: requireInteger(method, "window", window, 1) };
      }
      case "ewm": {
        const [span] = bind([{ name: "span" }]);
        if (!(span >= 1)) {
          throw new FormulaError(`ewm() span must be >= 1, got ${span}`);
        }
        return { kind: "ewm", values, span };
      }
      case "diff": {
        const [periods] = bind([{ name: "periods", defaultValue: 1 }]);
        return { kind: "series", values: diff(values, requireInteger(method, "periods", periods)) };
      }
      case "shift": {
        const [periods] = bind([{ name: "periods", defaultValue: 1 }]);
        return { kind: "series", values: shift(values, requireInteger(method, "periods", periods)) };
      }
      case "abs":
        bind([]);
        return { kind: "series", values: mapValues(values, Math.abs) };
      case "mean":
      case "std":
      case "min":
      case "max":
      case "sum":
        bind([]);
        return this.seriesAggregate(values, method);
    }
  }

  private seriesAggregate(values: SeriesValue[], kind: Aggregate): FormulaValue {
    const value = aggregateAll(values, kind);
    if (value === null) {
      throw new FormulaError(`${kind}() has no data to aggregate`);
    }
    return { kind: "scalar", value };
  }
}

// ─── Public API ────────────────────────────────────────────

/**
 * Evaluate a formula and explain any rejection.
 * Never throws: every failure is reported as `{ ok: false, reason }`.
 */
export function tryEvaluateFormula(
  frame: PriceFrame,
  formula: string,
  options: FormulaOptions = {}
): FormulaOutcome {
  const maxLength = options.maxLength ?? DEFAULT_MAX_FORMULA_LENGTH;

  try {
    if (formula.trim().length === 0) {
      return { ok: false, reason: "Formula is empty" };
    }
    if (formula.length > maxLength) {
      return { ok: false, reason: `Formula is longer than ${maxLength} characters` };
    }

    const result = new FormulaEvaluator(frame).evaluate(parseFormula(formula));
    if (result.kind !== "series") {
      return { ok: false, reason: `Formula must produce a series, got ${describe(result)}` };
    }
    if (result.values.length !== frame.length) {
      return { ok: false, reason: "Formula result does not line up with the input bars" };
    }
    return { ok: true, series: toSeries(frame, result.values) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.debug("Formula rejected", { formula, reason });
    return { ok: false, reason };
  }
}

/**
 * Evaluate a user formula over the frame's OHLCV columns.
 * Returns null ("no result") when the formula is invalid or does not yield
 * a series matching the frame.
 */
export function evaluateFormula(
  frame: PriceFrame,
  formula: string,
  options: FormulaOptions = {}
): Series | null {
  const outcome = tryEvaluateFormula(frame, formula, options);
  return outcome.ok ? outcome.series : null;
}
