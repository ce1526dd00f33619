/**
 * Ichimoku Kinko Hyo.
 *
 *   Tenkan-sen     (conversion)  midpoint of High/Low over 9 bars
 *   Kijun-sen      (base)        midpoint of High/Low over 26 bars
 *   Senkou Span A  (leading A)   (Tenkan + Kijun) / 2, plotted 26 bars ahead
 *   Senkou Span B  (leading B)   midpoint over 52 bars, plotted 26 bars ahead
 *   Chikou Span    (lagging)     Close plotted 26 bars behind
 *
 * Output stays aligned to the input bars: leading spans lose the points that
 * would fall after the last bar, and the lagging span is null over the last
 * `displacement` bars.
 */

import { toSeries } from "../series/frame.js";
import { assertWindow, combine, rolling, shift } from "./rolling.js";
import type { PriceFrame, Series, SeriesValue } from "../types/market.js";

export interface IchimokuOptions {
  conversion: number;
  base: number;
  spanB: number;
  displacement: number;
}

export const DEFAULT_ICHIMOKU: IchimokuOptions = {
  conversion: 9,
  base: 26,
  spanB: 52,
  displacement: 26,
};

export interface IchimokuResult {
  tenkanSen: Series;
  kijunSen: Series;
  senkouSpanA: Series;
  senkouSpanB: Series;
  chikouSpan: Series;
}

function midpoint(frame: PriceFrame, window: number): SeriesValue[] {
  return combine(
    rolling(frame.high, window, "max"),
    rolling(frame.low, window, "min"),
    (hi, lo) => (hi + lo) / 2
  );
}

export function ichimoku(
  frame: PriceFrame,
  options: Partial<IchimokuOptions> = {}
): IchimokuResult {
  const { conversion, base, spanB, displacement } = { ...DEFAULT_ICHIMOKU, ...options };
  assertWindow(displacement, "displacement");

  const tenkan = midpoint(frame, conversion);
  const kijun = midpoint(frame, base);
  const leadingA = combine(tenkan, kijun, (t, k) => (t + k) / 2);
  const leadingB = midpoint(frame, spanB);

  return {
    tenkanSen: toSeries(frame, tenkan),
    kijunSen: toSeries(frame, kijun),
    senkouSpanA: toSeries(frame, shift(leadingA, displacement)),
    senkouSpanB: toSeries(frame, shift(leadingB, displacement)),
    chikouSpan: toSeries(frame, shift(frame.close, -displacement)),
  };
}
