/**
 * In-memory market data for demos and deterministic tests.
 *
 * Serves bars and corporate actions registered up front, and can be told to
 * fail for a ticker to exercise per-ticker error handling.
 */

import type { BarProvider, CorporateActionSource } from "./types.js";
import type { BarRange, PriceBar } from "../types/market.js";
import type { EarningsRecord, SplitRecord } from "../types/events.js";

export class InMemoryMarketData implements BarProvider, CorporateActionSource {
  private bars: Map<string, PriceBar[]> = new Map();
  private earnings: Map<string, EarningsRecord[]> = new Map();
  private splits: Map<string, SplitRecord[]> = new Map();
  private failures: Map<string, string> = new Map();

  /** Number of getBars calls served, failures included */
  requests = 0;

  setBars(ticker: string, bars: PriceBar[]): this {
    this.bars.set(ticker, [...bars]);
    return this;
  }

  setEarnings(ticker: string, records: EarningsRecord[]): this {
    this.earnings.set(ticker, [...records]);
    return this;
  }

  setSplits(ticker: string, records: SplitRecord[]): this {
    this.splits.set(ticker, [...records]);
    return this;
  }

  /** Make every request for `ticker` reject with `message` */
  failTicker(ticker: string, message: string): this {
    this.failures.set(ticker, message);
    return this;
  }

  async getBars(ticker: string, range: BarRange): Promise<PriceBar[]> {
    this.requests++;
    this.throwIfFailing(ticker);

    const start = range.start.getTime();
    const end = range.end.getTime();
    return (this.bars.get(ticker) ?? []).filter((bar) => {
      const t = bar.timestamp.getTime();
      return t >= start && t <= end;
    });
  }

  async getEarnings(ticker: string): Promise<EarningsRecord[]> {
    this.throwIfFailing(ticker);
    return [...(this.earnings.get(ticker) ?? [])];
  }

  async getSplits(ticker: string): Promise<SplitRecord[]> {
    this.throwIfFailing(ticker);
    return [...(this.splits.get(ticker) ?? [])];
  }

  private throwIfFailing(ticker: string): void {
    const message = this.failures.get(ticker);
    if (message !== undefined) {
      throw new Error(message);
    }
  }
}
