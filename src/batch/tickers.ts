/**
 * Ticker list parsing and timeframe mapping for batch requests.
 */

import { TickerSchema } from "../utils/validation.js";
import { moduleLogger } from "../utils/logger.js";
import type { BarInterval, Timeframe } from "../types/market.js";

const log = moduleLogger("tickers");

const TIMEFRAME_INTERVALS: Record<Timeframe, BarInterval> = {
  Daily: "1d",
  Weekly: "1wk",
  Monthly: "1mo",
  Intraday: "15m",
};

export function intervalForTimeframe(timeframe: Timeframe): BarInterval {
  return TIMEFRAME_INTERVALS[timeframe];
}

/**
 * Split free text such as "aapl, TSLA msft" into unique upper-case tickers,
 * preserving first-seen order. Entries that are not valid tickers are dropped.
 */
export function parseTickerList(input: string): string[] {
  const seen = new Set<string>();
  for (const raw of input.split(/[\s,]+/)) {
    const candidate = raw.trim().toUpperCase();
    if (candidate.length === 0) continue;
    if (!TickerSchema.safeParse(candidate).success) {
      log.warn(`Ignoring invalid ticker '${raw}'`);
      continue;
    }
    seen.add(candidate);
  }
  return [...seen];
}
