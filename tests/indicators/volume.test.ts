/**
 * VWAP Tests
 */

import { describe, it, expect } from "vitest";
import { vwap } from "../../src/indicators/volume.js";
import { makeFrame, zigzag } from "../helpers/bars.js";

describe("vwap", () => {
  it("should accumulate from the first bar", () => {
    // (10·1 + 20·3) / 4
    expect(vwap(makeFrame([10, 20], { volume: [1, 3] })).values).toEqual([10, 17.5]);
  });

  it("should be unavailable until volume has traded", () => {
    expect(vwap(makeFrame([5, 6, 7], { volume: [0, 0, 2] })).values).toEqual([null, null, 7]);
  });

  it("should be unavailable everywhere when volume is always zero", () => {
    expect(vwap(makeFrame([5, 6, 7], { volume: [0, 0, 0] })).values).toEqual([null, null, null]);
  });

  it("should stay within the range of closes seen so far", () => {
    const closes = zigzag(50);
    const volume = closes.map((_, i) => 500 + (i % 7) * 100);
    const values = vwap(makeFrame(closes, { volume })).values;

    values.forEach((v, i) => {
      const seen = closes.slice(0, i + 1);
      expect(v).not.toBeNull();
      if (v === null) return;
      expect(v).toBeGreaterThanOrEqual(Math.min(...seen) - 1e-9);
      expect(v).toBeLessThanOrEqual(Math.max(...seen) + 1e-9);
    });
  });
});
