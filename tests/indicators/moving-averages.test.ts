/**
 * SMA / EMA Tests
 */

import { describe, it, expect } from "vitest";
import { ema, sma } from "../../src/indicators/moving-averages.js";
import { countLeadingNulls, makeFrame, zigzag } from "../helpers/bars.js";

describe("sma", () => {
  it("should average the trailing window of closes", () => {
    const frame = makeFrame([1, 2, 3, 4, 5]);
    expect(sma(frame, 3).values).toEqual([null, null, 2, 3, 4]);
  });

  it("should have exactly window − 1 leading nulls followed by finite values", () => {
    const frame = makeFrame(zigzag(30));
    for (const window of [1, 5, 20]) {
      const values = sma(frame, window).values;
      expect(values.length).toBe(30);
      expect(countLeadingNulls(values)).toBe(window - 1);
      expect(values.slice(window - 1).every((v) => v !== null && Number.isFinite(v))).toBe(true);
    }
  });

  it("should default to a 20-bar window", () => {
    const values = sma(makeFrame(zigzag(25))).values;
    expect(countLeadingNulls(values)).toBe(19);
  });

  it("should share the frame's timestamps", () => {
    const frame = makeFrame([1, 2, 3]);
    expect(sma(frame, 2).timestamps).toBe(frame.timestamps);
  });

  it("should return an empty series for an empty frame", () => {
    expect(sma(makeFrame([]), 20).values).toEqual([]);
  });
});

describe("ema", () => {
  it("should seed with the first close", () => {
    // window 3 → α = 0.5
    expect(ema(makeFrame([10, 20, 30]), 3).values).toEqual([10, 15, 22.5]);
  });

  it("should be defined from the first bar", () => {
    const values = ema(makeFrame(zigzag(30)), 20).values;
    expect(countLeadingNulls(values)).toBe(0);
    expect(values.every((v) => v !== null && Number.isFinite(v))).toBe(true);
  });

  it("should reject an invalid window", () => {
    expect(() => ema(makeFrame([1, 2, 3]), 0)).toThrow(RangeError);
  });
});
