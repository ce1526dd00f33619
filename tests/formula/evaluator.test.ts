/**
 * Formula Evaluator Tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_MAX_FORMULA_LENGTH,
  evaluateFormula,
  tryEvaluateFormula,
} from "../../src/formula/evaluator.js";
import { ema } from "../../src/indicators/moving-averages.js";
import { makeFrame, zigzag } from "../helpers/bars.js";

function reasonFor(formula: string, closes: number[] = [1, 2, 3]): string {
  const outcome = tryEvaluateFormula(makeFrame(closes), formula);
  if (outcome.ok) throw new Error(`expected '${formula}' to be rejected`);
  return outcome.reason;
}

describe("evaluateFormula", () => {
  it("should compute a rolling mean over Close", () => {
    const series = evaluateFormula(makeFrame(new Array<number>(20).fill(100)), "Close.rolling(10).mean()");
    expect(series?.values).toEqual([
      ...new Array<null>(9).fill(null),
      ...new Array<number>(11).fill(100),
    ]);
  });

  it("should combine columns arithmetically", () => {
    // default bars: high = close + 1, low = close − 1
    const series = evaluateFormula(makeFrame([10, 20]), "(High + Low) / 2");
    expect(series?.values).toEqual([10, 20]);
  });

  it("should negate a series", () => {
    expect(evaluateFormula(makeFrame([10, 20]), "-Close")?.values).toEqual([-10, -20]);
  });

  it("should match diff() with an explicit shift", () => {
    const frame = makeFrame([1, 4, 9]);
    expect(evaluateFormula(frame, "Close.diff()")?.values).toEqual([null, 3, 5]);
    expect(evaluateFormula(frame, "Close - Close.shift(1)")?.values).toEqual([null, 3, 5]);
    expect(evaluateFormula(frame, "Close.diff(periods=2)")?.values).toEqual([null, null, 8]);
  });

  it("should match the EMA indicator for ewm(span).mean()", () => {
    const frame = makeFrame(zigzag(30));
    expect(evaluateFormula(frame, "Close.ewm(span=10).mean()")?.values).toEqual(ema(frame, 10).values);
  });

  it("should support rolling max and sum with keyword windows", () => {
    const frame = makeFrame([1, 3, 2]);
    expect(evaluateFormula(frame, "Close.rolling(window=2).max()")?.values).toEqual([null, 3, 3]);
    expect(evaluateFormula(frame, "Volume.rolling(2).sum()")?.values).toEqual([null, 2000, 2000]);
  });

  it("should broadcast whole-series aggregates", () => {
    expect(evaluateFormula(makeFrame([1, 2, 3]), "Close - Close.mean()")?.values).toEqual([-1, 0, 1]);
  });

  it("should turn division by zero into unavailable points", () => {
    expect(evaluateFormula(makeFrame([1, 2]), "Close / 0")?.values).toEqual([null, null]);
  });

  it("should accept an empty frame", () => {
    expect(evaluateFormula(makeFrame([]), "Close.rolling(3).mean()")?.values).toEqual([]);
  });

  it("should return null for code injection attempts", () => {
    const frame = makeFrame([1, 2, 3]);
    for (const formula of [
      "__import__('os')",
      "os",
      "process.exit()",
      "Close.constructor",
      "Close.__class__",
      "Close.rolling(2).constructor()",
      "globalThis",
      "Close; 1",
      "`Close`",
      "Close[0]",
    ]) {
      expect(evaluateFormula(frame, formula)).toBeNull();
    }
  });

  it("should never throw", () => {
    const frame = makeFrame([1, 2, 3]);
    for (const formula of ["", ")", "((", "Close..mean()", "1e999", "Close.rolling(", "Close ** 2", "=", "Close.ewm(span=0).mean()"]) {
      expect(() => evaluateFormula(frame, formula)).not.toThrow();
      expect(evaluateFormula(frame, formula)).toBeNull();
    }
  });
});

describe("tryEvaluateFormula", () => {
  it("should explain why a formula was rejected", () => {
    expect(reasonFor("   ")).toBe("Formula is empty");
    expect(reasonFor("1 + 2")).toBe("Formula must produce a series, got a number");
    expect(reasonFor("Close.rolling(10)")).toBe(
      "Formula must produce a series, got a rolling window (call mean/std/min/max/sum on it)"
    );
    expect(reasonFor("Close.rolling(size=2).mean()")).toBe("rolling() has no parameter 'size'");
    expect(reasonFor("Close.rolling(2.5).mean()")).toBe("rolling() window must be an integer >= 1, got 2.5");
    expect(reasonFor("Close.abs(1)")).toBe("abs() takes at most 0 argument(s), got 1");
    expect(reasonFor("Close.rolling(Close).mean()")).toBe(
      "rolling() argument 'window' must be a number, got a series"
    );
    expect(reasonFor("Close.rolling()")).toBe("rolling() is missing argument 'window'");
    expect(reasonFor("Close.ewm(span=3).std()")).toBe(
      "Method 'std' is not available on an ewm window (call mean on it)"
    );
    expect(reasonFor("1 / 0 + Close")).toBe("1 / 0 is not a finite number");
  });

  it("should enforce the default length limit", () => {
    const formula = "Close+".repeat(100) + "Close";
    expect(formula.length).toBeGreaterThan(DEFAULT_MAX_FORMULA_LENGTH);
    expect(reasonFor(formula)).toBe(`Formula is longer than ${DEFAULT_MAX_FORMULA_LENGTH} characters`);
  });

  it("should take a custom length limit", () => {
    const outcome = tryEvaluateFormula(makeFrame([1, 2]), "Close * 2", { maxLength: 5 });
    expect(outcome).toEqual({ ok: false, reason: "Formula is longer than 5 characters" });
  });

  it("should return the series with the frame's timestamps", () => {
    const frame = makeFrame([1, 2]);
    const outcome = tryEvaluateFormula(frame, "Close * 2");
    expect(outcome).toEqual({ ok: true, series: { timestamps: frame.timestamps, values: [2, 4] } });
  });
});
