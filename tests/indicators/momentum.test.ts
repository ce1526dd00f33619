/**
 * RSI / MACD / Stochastic Tests
 */

import { describe, it, expect } from "vitest";
import { macd, rsi, stochastic } from "../../src/indicators/momentum.js";
import { ema } from "../../src/indicators/moving-averages.js";
import { countLeadingNulls, makeFrame, zigzag } from "../helpers/bars.js";

describe("rsi", () => {
  it("should compute RS from rolling mean gains and losses", () => {
    // deltas: -, +1, -1, +1, +1
    const frame = makeFrame([1, 2, 1, 2, 3]);
    expect(rsi(frame, 2).values).toEqual([null, null, 50, 50, 100]);
  });

  it("should have exactly `window` leading nulls", () => {
    const values = rsi(makeFrame(zigzag(60)), 14).values;
    expect(countLeadingNulls(values)).toBe(14);
    expect(values.slice(14).every((v) => v !== null && Number.isFinite(v))).toBe(true);
  });

  it("should report 100 when there are no losses", () => {
    const closes = Array.from({ length: 20 }, (_, i) => 100 + i);
    const values = rsi(makeFrame(closes), 14).values;
    expect(values.slice(14)).toEqual([100, 100, 100, 100, 100, 100]);
  });

  it("should report 0 when there are no gains", () => {
    const closes = Array.from({ length: 20 }, (_, i) => 100 - i);
    const values = rsi(makeFrame(closes), 14).values;
    expect(values.slice(14)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("should report 100 for a flat series instead of NaN", () => {
    const values = rsi(makeFrame(new Array<number>(16).fill(50)), 14).values;
    expect(values.slice(14)).toEqual([100, 100]);
  });

  it("should stay within [0, 100]", () => {
    const values = rsi(makeFrame(zigzag(200)), 5).values;
    for (const v of values) {
      if (v === null) continue;
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(100);
    }
  });
});

describe("macd", () => {
  it("should equal EMA(12) − EMA(26) exactly", () => {
    const frame = makeFrame(zigzag(80));
    const result = macd(frame);
    const fast = ema(frame, 12).values;
    const slow = ema(frame, 26).values;

    result.macd.values.forEach((v, i) => {
      const f = fast[i];
      const s = slow[i];
      expect(f).not.toBeNull();
      expect(s).not.toBeNull();
      if (f !== null && s !== null) expect(v).toBe(f - s);
    });
  });

  it("should set histogram = macd − signal", () => {
    const result = macd(makeFrame(zigzag(40)));
    result.histogram.values.forEach((h, i) => {
      const m = result.macd.values[i];
      const s = result.signal.values[i];
      if (m !== null && s !== null) expect(h).toBe(m - s);
    });
  });

  it("should be defined from the first bar, starting at zero", () => {
    const result = macd(makeFrame(zigzag(40)));
    expect(countLeadingNulls(result.macd.values)).toBe(0);
    expect(result.macd.values[0]).toBe(0);
    expect(result.signal.values[0]).toBe(0);
  });

  it("should return three empty series for an empty frame", () => {
    const result = macd(makeFrame([]));
    expect(result.macd.values).toEqual([]);
    expect(result.signal.values).toEqual([]);
    expect(result.histogram.values).toEqual([]);
  });
});

describe("stochastic", () => {
  const closes = [9, 11, 8, 12];
  const high = [10, 12, 11, 13];
  const low = [8, 9, 7, 10];

  it("should place the close within the window's high-low range", () => {
    const { k, d } = stochastic(makeFrame(closes, { high, low }), 3, 2);
    expect(k.values[0]).toBeNull();
    expect(k.values[1]).toBeNull();
    // (8 − 7) / (12 − 7)
    expect(k.values[2]).toBeCloseTo(20, 10);
    // (12 − 7) / (13 − 7)
    expect(k.values[3]).toBeCloseTo(500 / 6, 10);
    expect(d.values.slice(0, 3)).toEqual([null, null, null]);
    expect(d.values[3]).toBeCloseTo((20 + 500 / 6) / 2, 10);
  });

  it("should leave %K unavailable when high equals low", () => {
    const flat = [5, 5, 5, 5, 5];
    const { k, d } = stochastic(makeFrame(flat, { high: flat, low: flat }), 3, 2);
    expect(k.values).toEqual([null, null, null, null, null]);
    expect(d.values).toEqual([null, null, null, null, null]);
  });

  it("should warm up k − 1 bars for %K and k + d − 2 for %D", () => {
    const { k, d } = stochastic(makeFrame(zigzag(40)));
    expect(countLeadingNulls(k.values)).toBe(13);
    expect(countLeadingNulls(d.values)).toBe(15);
  });
});
