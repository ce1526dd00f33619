/**
 * Collaborator interfaces.
 *
 * Market data and corporate actions come from outside the core; these are the
 * only shapes the core expects from them.
 */

import type { BarRange, PriceBar } from "../types/market.js";
import type { EarningsRecord, SplitRecord } from "../types/events.js";

export interface BarProvider {
  /** Bars for the range, or an empty list when the ticker has none */
  getBars(ticker: string, range: BarRange): Promise<PriceBar[]>;
}

/** Best-effort source; callers treat rejections as "no events" */
export interface CorporateActionSource {
  getEarnings(ticker: string): Promise<EarningsRecord[]>;
  getSplits(ticker: string): Promise<SplitRecord[]>;
}
