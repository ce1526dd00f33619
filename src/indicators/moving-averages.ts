/**
 * Moving averages over Close.
 */

import { toSeries } from "../series/frame.js";
import { assertWindow, ewm, rolling } from "./rolling.js";
import type { PriceFrame, Series } from "../types/market.js";

/** Simple Moving Average: mean of the trailing `window` closes. Warm-up window − 1. */
export function sma(frame: PriceFrame, window: number = 20): Series {
  return toSeries(frame, rolling(frame.close, window, "mean"));
}

/**
 * Exponential Moving Average with α = 2 / (window + 1), seeded with the first
 * close. Defined from the first bar; early values lean on the seed.
 */
export function ema(frame: PriceFrame, window: number = 20): Series {
  assertWindow(window);
  return toSeries(frame, ewm(frame.close, window));
}
