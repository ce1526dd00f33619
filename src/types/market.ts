/**
 * Market data type definitions.
 * Covers price bars, the columnar frame indicators consume, and derived series.
 */

/** Historical price bar */
export interface PriceBar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** The five columns a bar exposes, as named in formulas and CSV headers */
export type OhlcvColumn = "Open" | "High" | "Low" | "Close" | "Volume";

export const OHLCV_COLUMNS: readonly OhlcvColumn[] = [
  "Open",
  "High",
  "Low",
  "Close",
  "Volume",
];

/**
 * Columnar view of a validated bar list.
 * Built once at the input boundary; every indicator reads from it.
 */
export interface PriceFrame {
  readonly length: number;
  readonly timestamps: readonly Date[];
  readonly open: readonly number[];
  readonly high: readonly number[];
  readonly low: readonly number[];
  readonly close: readonly number[];
  readonly volume: readonly number[];
}

/** One computed point; null = not available (warm-up, shifted out, degenerate) */
export type SeriesValue = number | null;

/** Values index-aligned 1:1 with the frame they were computed from */
export interface Series {
  readonly timestamps: readonly Date[];
  readonly values: readonly SeriesValue[];
}

/** Bar interval understood by market-data providers */
export type BarInterval = "1m" | "15m" | "1d" | "1wk" | "1mo";

/** Chart timeframe as offered to users */
export type Timeframe = "Daily" | "Weekly" | "Monthly" | "Intraday";

export interface BarRange {
  start: Date;
  end: Date;
  interval: BarInterval;
}
