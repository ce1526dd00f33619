/**
 * Volume-weighted indicators.
 */

import { toSeries } from "../series/frame.js";
import { combine, cumulativeSum } from "./rolling.js";
import type { PriceFrame, Series } from "../types/market.js";

/**
 * Volume Weighted Average Price, cumulative from the first bar (not rolling).
 * Points where no volume has traded yet are null.
 */
export function vwap(frame: PriceFrame): Series {
  const priceVolume = cumulativeSum(frame.close.map((c, i) => c * frame.volume[i]));
  const totalVolume = cumulativeSum(frame.volume);
  return toSeries(frame, combine(priceVolume, totalVolume, (pv, v) => pv / v));
}
