/**
 * Per-ticker key metrics table: last close, change over the range, close high/low.
 */

import type { PriceFrame } from "../types/market.js";

export interface KeyMetrics {
  ticker: string;
  currentClose: number;
  startClose: number;
  /** Percent change from first to last close; null when the first close is 0 */
  pctChange: number | null;
  high: number;
  low: number;
}

/** Null for an empty frame */
export function keyMetrics(ticker: string, frame: PriceFrame): KeyMetrics | null {
  if (frame.length === 0) return null;

  const startClose = frame.close[0];
  const currentClose = frame.close[frame.length - 1];

  return {
    ticker,
    currentClose,
    startClose,
    pctChange: startClose !== 0 ? ((currentClose - startClose) / startClose) * 100 : null,
    high: Math.max(...frame.close),
    low: Math.min(...frame.close),
  };
}
