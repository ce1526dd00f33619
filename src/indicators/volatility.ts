/**
 * Volatility indicators: Bollinger Bands and Average True Range.
 */

import { toSeries } from "../series/frame.js";
import { combine, rolling } from "./rolling.js";
import type { PriceFrame, Series, SeriesValue } from "../types/market.js";

export interface BollingerResult {
  upper: Series;
  middle: Series;
  lower: Series;
}

/**
 * Bollinger Bands: middle = SMA(window), bands = middle ± multiplier · σ,
 * where σ is the sample standard deviation (n − 1) of the same window.
 */
export function bollingerBands(
  frame: PriceFrame,
  window: number = 20,
  multiplier: number = 2
): BollingerResult {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new RangeError(`multiplier must be a positive number, got ${multiplier}`);
  }
  const middle = rolling(frame.close, window, "mean");
  const std = rolling(frame.close, window, "std");

  return {
    upper: toSeries(frame, combine(middle, std, (m, s) => m + multiplier * s)),
    middle: toSeries(frame, middle),
    lower: toSeries(frame, combine(middle, std, (m, s) => m - multiplier * s)),
  };
}

/**
 * True Range = max(High − Low, |High − prevClose|, |Low − prevClose|).
 * The first bar has no previous close and is null.
 */
export function trueRange(frame: PriceFrame): SeriesValue[] {
  return frame.close.map((_, i) => {
    if (i === 0) return null;
    const prevClose = frame.close[i - 1];
    const high = frame.high[i];
    const low = frame.low[i];
    return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
  });
}

/** Average True Range: SMA of True Range. Warm-up is `window` bars. */
export function atr(frame: PriceFrame, window: number = 14): Series {
  return toSeries(frame, rolling(trueRange(frame), window, "mean"));
}
