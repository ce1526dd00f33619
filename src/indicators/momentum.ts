/**
 * Momentum oscillators: RSI, MACD and the Stochastic Oscillator.
 */

import { toSeries } from "../series/frame.js";
import {
  assertWindow,
  combine,
  diff,
  ewm,
  mapValues,
  rolling,
} from "./rolling.js";
import type { PriceFrame, Series, SeriesValue } from "../types/market.js";

// ─── RSI ───────────────────────────────────────────────────

/**
 * Relative Strength Index over simple rolling means of gains and losses.
 *
 * The first bar has no previous close, so the first `window` points are null.
 * A window without losses reports 100 (including a flat window); one without
 * gains reports 0.
 */
export function rsi(frame: PriceFrame, window: number = 14): Series {
  const delta = diff(frame.close);
  const gains = mapValues(delta, (d) => (d > 0 ? d : 0));
  const losses = mapValues(delta, (d) => (d < 0 ? -d : 0));

  const avgGain = rolling(gains, window, "mean");
  const avgLoss = rolling(losses, window, "mean");

  const values: SeriesValue[] = avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === null || loss === null) return null;
    if (loss === 0) return 100;
    const rs = gain / loss;
    return 100 - 100 / (1 + rs);
  });

  return toSeries(frame, values);
}

// ─── MACD ──────────────────────────────────────────────────

export interface MacdResult {
  macd: Series;
  signal: Series;
  histogram: Series;
}

/**
 * MACD line = EMA(fast) − EMA(slow); signal = EMA(signal) of the MACD line.
 * Inherits EMA seeding, so every point is defined.
 */
export function macd(
  frame: PriceFrame,
  fast: number = 12,
  slow: number = 26,
  signal: number = 9
): MacdResult {
  assertWindow(fast, "fast");
  assertWindow(slow, "slow");
  assertWindow(signal, "signal");

  const fastEma = ewm(frame.close, fast);
  const slowEma = ewm(frame.close, slow);
  const macdLine = combine(fastEma, slowEma, (f, s) => f - s);
  const signalLine = ewm(macdLine, signal);
  const histogram = combine(macdLine, signalLine, (m, s) => m - s);

  return {
    macd: toSeries(frame, macdLine),
    signal: toSeries(frame, signalLine),
    histogram: toSeries(frame, histogram),
  };
}

// ─── Stochastic Oscillator ─────────────────────────────────

export interface StochasticResult {
  k: Series;
  d: Series;
}

/**
 * %K = 100 · (Close − lowest Low) / (highest High − lowest Low) over kWindow bars;
 * %D = SMA(%K, dWindow). A window whose high equals its low has no %K.
 */
export function stochastic(
  frame: PriceFrame,
  kWindow: number = 14,
  dWindow: number = 3
): StochasticResult {
  assertWindow(kWindow, "kWindow");
  assertWindow(dWindow, "dWindow");

  const lowest = rolling(frame.low, kWindow, "min");
  const highest = rolling(frame.high, kWindow, "max");

  const k: SeriesValue[] = frame.close.map((close, i) => {
    const lo = lowest[i];
    const hi = highest[i];
    if (lo === null || hi === null || hi === lo) return null;
    return (100 * (close - lo)) / (hi - lo);
  });
  const d = rolling(k, dWindow, "mean");

  return { k: toSeries(frame, k), d: toSeries(frame, d) };
}
