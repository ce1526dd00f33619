/**
 * Portfolio Analytics
 *
 * Stateless valuation and risk figures for a list of holdings:
 *   - Allocation by last close
 *   - Annualized volatility of the equal-weighted return stream
 *   - Beta against a benchmark
 *
 * Return streams are keyed by bar timestamp (epoch ms) so tickers with
 * different trading calendars line up on common dates only.
 */

import { aggregate } from "../indicators/rolling.js";
import type { Holding } from "../utils/validation.js";
import type { PriceFrame } from "../types/market.js";

export const TRADING_DAYS_PER_YEAR = 252;

/** Epoch ms → simple return, in chronological order */
export type ReturnStream = Map<number, number>;

export interface HoldingValuation {
  ticker: string;
  quantity: number;
  lastPrice: number;
  value: number;
  /** Share of total value in percent, 2 decimals; null when the total is 0 */
  allocationPct: number | null;
}

export interface PortfolioAllocation {
  holdings: HoldingValuation[];
  totalValue: number;
}

/**
 * Value each holding at its last close.
 * Holdings without bars are left out.
 */
export function portfolioAllocation(
  holdings: readonly Holding[],
  frames: ReadonlyMap<string, PriceFrame>
): PortfolioAllocation {
  const valued: Omit<HoldingValuation, "allocationPct">[] = [];

  for (const holding of holdings) {
    const frame = frames.get(holding.ticker);
    if (!frame || frame.length === 0) continue;
    const lastPrice = frame.close[frame.length - 1];
    valued.push({
      ticker: holding.ticker,
      quantity: holding.quantity,
      lastPrice,
      value: lastPrice * holding.quantity,
    });
  }

  const totalValue = valued.reduce((s, h) => s + h.value, 0);

  return {
    holdings: valued.map((h) => ({
      ...h,
      allocationPct: totalValue > 0 ? Math.round((h.value / totalValue) * 100 * 100) / 100 : null,
    })),
    totalValue,
  };
}

/** Close-to-close simple returns; bars after a zero close are skipped */
export function simpleReturns(frame: PriceFrame): ReturnStream {
  const returns: ReturnStream = new Map();
  for (let i = 1; i < frame.length; i++) {
    const prev = frame.close[i - 1];
    if (prev === 0) continue;
    returns.set(frame.timestamps[i].getTime(), (frame.close[i] - prev) / prev);
  }
  return returns;
}

/** Equal-weighted mean of whichever tickers have a return at each timestamp */
export function portfolioReturns(frames: readonly PriceFrame[]): ReturnStream {
  const buckets = new Map<number, number[]>();
  for (const frame of frames) {
    for (const [t, r] of simpleReturns(frame)) {
      const bucket = buckets.get(t);
      if (bucket) bucket.push(r);
      else buckets.set(t, [r]);
    }
  }

  const result: ReturnStream = new Map();
  for (const t of [...buckets.keys()].sort((a, b) => a - b)) {
    const bucket = buckets.get(t) ?? [];
    result.set(t, bucket.reduce((s, v) => s + v, 0) / bucket.length);
  }
  return result;
}

/** Annualized sample volatility; null with fewer than two returns */
export function portfolioVolatility(frames: readonly PriceFrame[]): number | null {
  const std = aggregate([...portfolioReturns(frames).values()], "std");
  return std === null ? null : std * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * β = cov(portfolio, benchmark) / var(benchmark) over common timestamps.
 * Null with fewer than two common points or a flat benchmark.
 */
export function beta(portfolio: ReturnStream, benchmark: ReturnStream): number | null {
  const pairs: [number, number][] = [];
  for (const [t, p] of portfolio) {
    const b = benchmark.get(t);
    if (b !== undefined) pairs.push([p, b]);
  }

  const n = pairs.length;
  if (n < 2) return null;

  const meanP = pairs.reduce((s, [p]) => s + p, 0) / n;
  const meanB = pairs.reduce((s, [, b]) => s + b, 0) / n;
  const covariance = pairs.reduce((s, [p, b]) => s + (p - meanP) * (b - meanB), 0) / (n - 1);
  const variance = pairs.reduce((s, [, b]) => s + (b - meanB) ** 2, 0) / (n - 1);

  if (variance === 0) return null;
  return covariance / variance;
}
