/**
 * CSV Export Tests
 */

import { describe, it, expect } from "vitest";
import {
  barsToCsv,
  keyMetricsToCsv,
  overlaysToCsv,
  parseBarsCsv,
  tableToCsv,
} from "../../src/export/csv.js";
import { computeOverlays } from "../../src/indicators/overlays.js";
import { SeriesValidationError } from "../../src/series/frame.js";
import { makeBars, makeFrame } from "../helpers/bars.js";

const HEADER = "Date,Open,High,Low,Close,Volume";

describe("barsToCsv", () => {
  it("should write one ISO-dated row per bar", () => {
    expect(barsToCsv(makeFrame([100, 101.5]))).toBe(
      [
        HEADER,
        "2024-01-01T00:00:00.000Z,100,101,99,100,1000",
        "2024-01-02T00:00:00.000Z,101.5,102.5,100.5,101.5,1000",
      ].join("\n")
    );
  });

  it("should write only the header for an empty frame", () => {
    expect(barsToCsv(makeFrame([]))).toBe(HEADER);
  });
});

describe("parseBarsCsv", () => {
  it("should read back what barsToCsv writes", () => {
    const bars = makeBars([10, 12.25, 11], { volume: [0, 300, 150] });
    expect(parseBarsCsv(barsToCsv(makeFrame([10, 12.25, 11], { volume: [0, 300, 150] })))).toEqual(bars);
  });

  it("should reject invalid bars", () => {
    const csv = `${HEADER}\n2024-01-01T00:00:00.000Z,1,2,0,1,-5`;
    expect(() => parseBarsCsv(csv)).toThrow(SeriesValidationError);
  });

  it("should reject rows with missing fields", () => {
    const csv = `${HEADER}\n2024-01-01T00:00:00.000Z,1,2`;
    expect(() => parseBarsCsv(csv)).toThrow(SeriesValidationError);
  });
});

describe("overlaysToCsv", () => {
  const frame = makeFrame([1, 2, 3]);

  it("should leave unavailable points empty", () => {
    const overlays = computeOverlays(frame, [{ kind: "sma", window: 2 }]);
    expect(overlaysToCsv(frame, overlays)).toBe(
      [
        "Date,SMA(2)",
        "2024-01-01T00:00:00.000Z,",
        "2024-01-02T00:00:00.000Z,1.5",
        "2024-01-03T00:00:00.000Z,2.5",
      ].join("\n")
    );
  });

  it("should suffix series names for multi-line overlays", () => {
    const overlays = computeOverlays(frame, [{ kind: "bollinger", window: 3, multiplier: 2 }]);
    const [header, , , last] = overlaysToCsv(frame, overlays).split("\n");
    expect(header).toBe("Date,Bollinger(3,2) upper,Bollinger(3,2) middle,Bollinger(3,2) lower");
    expect(last).toBe("2024-01-03T00:00:00.000Z,4,2,0");
  });
});

describe("tableToCsv", () => {
  it("should quote fields containing delimiters or quotes", () => {
    expect(
      tableToCsv([
        { Event: "Split 4:1, adjusted", Value: 1 },
        { Event: 'said "hold"', Value: null },
      ])
    ).toBe(['Event,Value', '"Split 4:1, adjusted",1', '"said ""hold""",'].join("\n"));
  });

  it("should follow an explicit column order", () => {
    expect(tableToCsv([{ a: 1, b: 2 }], ["b", "a"])).toBe("b,a\n2,1");
  });
});

describe("keyMetricsToCsv", () => {
  it("should write the metrics table with percent change to two decimals", () => {
    const csv = keyMetricsToCsv([
      { ticker: "AAPL", currentClose: 120, startClose: 106.81, pctChange: 12.3456, high: 121, low: 99 },
      { ticker: "ZERO", currentClose: 5, startClose: 0, pctChange: null, high: 5, low: 0 },
    ]);
    expect(csv).toBe(
      ["Ticker,Current Close,% Change,High,Low", "AAPL,120,12.35,121,99", "ZERO,5,,5,0"].join("\n")
    );
  });
});
