/**
 * Bollinger Bands / ATR Tests
 */

import { describe, it, expect } from "vitest";
import { atr, bollingerBands, trueRange } from "../../src/indicators/volatility.js";
import { rolling } from "../../src/indicators/rolling.js";
import { countLeadingNulls, makeFrame, zigzag } from "../helpers/bars.js";

describe("bollingerBands", () => {
  it("should place the bands multiplier sample deviations around the SMA", () => {
    // mean 2, sample σ = 1
    const { upper, middle, lower } = bollingerBands(makeFrame([1, 2, 3]), 3, 2);
    expect(middle.values).toEqual([null, null, 2]);
    expect(upper.values).toEqual([null, null, 4]);
    expect(lower.values).toEqual([null, null, 0]);
  });

  it("should be symmetric around the middle band", () => {
    const frame = makeFrame(zigzag(60));
    const { upper, middle, lower } = bollingerBands(frame);
    const std = rolling(frame.close, 20, "std");

    expect(countLeadingNulls(middle.values)).toBe(19);
    middle.values.forEach((m, i) => {
      const u = upper.values[i];
      const l = lower.values[i];
      const s = std[i];
      if (m === null || u === null || l === null || s === null) return;
      expect(u - m).toBeCloseTo(m - l, 10);
      expect(u - m).toBeCloseTo(2 * s, 10);
    });
  });

  it("should collapse onto the middle band for a flat series", () => {
    const { upper, lower } = bollingerBands(makeFrame(new Array<number>(20).fill(100)));
    expect(upper.values[19]).toBe(100);
    expect(lower.values[19]).toBe(100);
  });

  it("should reject a non-positive multiplier", () => {
    expect(() => bollingerBands(makeFrame([1, 2, 3]), 2, 0)).toThrow(RangeError);
  });
});

describe("atr", () => {
  const closes = [10, 12, 9];
  const high = [11, 13, 10];
  const low = [9, 11, 8];

  it("should take the widest of the three true-range candidates", () => {
    // bar 1: |13 − 10| = 3; bar 2: |8 − 12| = 4
    expect(trueRange(makeFrame(closes, { high, low }))).toEqual([null, 3, 4]);
  });

  it("should average true range over the window", () => {
    expect(atr(makeFrame(closes, { high, low }), 2).values).toEqual([null, null, 3.5]);
  });

  it("should have exactly `window` leading nulls", () => {
    const values = atr(makeFrame(zigzag(40)), 14).values;
    expect(countLeadingNulls(values)).toBe(14);
    expect(values.slice(14).every((v) => v !== null && v > 0)).toBe(true);
  });
});
