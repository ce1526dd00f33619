/**
 * Series Input Adapter
 *
 * Validates raw bars once at the boundary and turns them into the columnar
 * PriceFrame that indicators and the formula evaluator read from.
 */

import { PriceBarsSchema, formatIssues } from "../utils/validation.js";
import type {
  OhlcvColumn,
  PriceBar,
  PriceFrame,
  Series,
  SeriesValue,
} from "../types/market.js";

export class SeriesValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid bar series: ${issues.slice(0, 5).join("; ")}${issues.length > 5 ? ` (+${issues.length - 5} more)` : ""}`);
    this.name = "SeriesValidationError";
    this.issues = issues;
  }
}

/**
 * Parse untrusted input into bars.
 * Timestamps may be Date objects, ISO strings or epoch milliseconds.
 *
 * @throws SeriesValidationError when a bar is malformed or out of order
 */
export function parsePriceBars(input: unknown): PriceBar[] {
  const result = PriceBarsSchema.safeParse(input);
  if (!result.success) {
    throw new SeriesValidationError(formatIssues(result.error));
  }
  return result.data;
}

/** Build the columnar frame. An empty list gives an empty frame. */
export function toPriceFrame(bars: readonly PriceBar[]): PriceFrame {
  const validated = parsePriceBars(bars);
  return {
    length: validated.length,
    timestamps: validated.map((b) => b.timestamp),
    open: validated.map((b) => b.open),
    high: validated.map((b) => b.high),
    low: validated.map((b) => b.low),
    close: validated.map((b) => b.close),
    volume: validated.map((b) => b.volume),
  };
}

/** Rebuild bar records from a frame (CSV export, JSON responses) */
export function frameToBars(frame: PriceFrame): PriceBar[] {
  return frame.timestamps.map((timestamp, i) => ({
    timestamp,
    open: frame.open[i],
    high: frame.high[i],
    low: frame.low[i],
    close: frame.close[i],
    volume: frame.volume[i],
  }));
}

export function frameColumn(frame: PriceFrame, column: OhlcvColumn): readonly number[] {
  switch (column) {
    case "Open":
      return frame.open;
    case "High":
      return frame.high;
    case "Low":
      return frame.low;
    case "Close":
      return frame.close;
    case "Volume":
      return frame.volume;
  }
}

/**
 * Attach the frame's timestamps to computed values.
 * Non-finite numbers are stored as null so NaN/Infinity never reach a chart.
 */
export function toSeries(frame: PriceFrame, values: readonly SeriesValue[]): Series {
  if (values.length !== frame.length) {
    throw new RangeError(
      `Series length ${values.length} does not match frame length ${frame.length}`
    );
  }
  return {
    timestamps: frame.timestamps,
    values: values.map((v) => (v !== null && Number.isFinite(v) ? v : null)),
  };
}
