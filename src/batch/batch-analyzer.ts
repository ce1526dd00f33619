/**
 * Batch Analyzer
 *
 * Runs the same indicator selection over many tickers. Each ticker is an
 * independent task: they run concurrently, and every ticker ends in exactly
 * one outcome — ok, empty (no bars in range) or failed (provider or input
 * error) — so one bad ticker never sinks the batch.
 */

import { EventEmitter } from "eventemitter3";
import { toPriceFrame } from "../series/frame.js";
import { computeOverlays, type Overlay } from "../indicators/overlays.js";
import { keyMetrics, type KeyMetrics } from "../metrics/key-metrics.js";
import { getStockEvents } from "../events/event-filter.js";
import { moduleLogger } from "../utils/logger.js";
import type { FormulaOptions } from "../formula/evaluator.js";
import type { BarProvider, CorporateActionSource } from "../providers/types.js";
import type { IndicatorRequest } from "../utils/validation.js";
import type { BarRange, PriceFrame } from "../types/market.js";
import type { CorporateEvent } from "../types/events.js";

const log = moduleLogger("batch");

export type TickerOutcome =
  | {
      ticker: string;
      status: "ok";
      frame: PriceFrame;
      overlays: Overlay[];
      metrics: KeyMetrics;
      events: CorporateEvent[];
    }
  | { ticker: string; status: "empty" }
  | { ticker: string; status: "failed"; reason: string };

export interface BatchRequest {
  tickers: readonly string[];
  range: BarRange;
  indicators: readonly IndicatorRequest[];
}

export interface BatchAnalyzerOptions {
  bars: BarProvider;
  /** When set, each ok outcome also carries the corporate events in range */
  events?: CorporateActionSource;
  formula?: FormulaOptions;
}

export interface BatchEvents {
  ticker_complete: (outcome: TickerOutcome) => void;
  batch_complete: (outcomes: TickerOutcome[]) => void;
}

export class BatchAnalyzer extends EventEmitter<BatchEvents> {
  private readonly bars: BarProvider;
  private readonly events: CorporateActionSource | undefined;
  private readonly formula: FormulaOptions;

  constructor(options: BatchAnalyzerOptions) {
    super();
    this.bars = options.bars;
    this.events = options.events;
    this.formula = options.formula ?? {};
  }

  /** Analyze every ticker; outcomes come back in request order */
  async run(request: BatchRequest): Promise<TickerOutcome[]> {
    if (request.tickers.length === 0) {
      log.info("Batch requested with no tickers");
      this.notify("batch_complete", () => this.emit("batch_complete", []));
      return [];
    }

    log.info(`Analyzing ${request.tickers.length} ticker(s) at ${request.range.interval}`);
    const outcomes = await Promise.all(
      request.tickers.map(async (ticker) => {
        const outcome = await this.analyzeTicker(ticker, request);
        this.notify("ticker_complete", () => this.emit("ticker_complete", outcome));
        return outcome;
      })
    );

    const failed = outcomes.filter((o) => o.status === "failed").length;
    const empty = outcomes.filter((o) => o.status === "empty").length;
    log.info(`Batch complete: ${outcomes.length - failed - empty} ok, ${empty} empty, ${failed} failed`);
    this.notify("batch_complete", () => this.emit("batch_complete", outcomes));
    return outcomes;
  }

  /** A failing listener is logged; it never costs the batch its outcomes */
  private notify(event: keyof BatchEvents, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      log.error(`${event} listener failed`, { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async analyzeTicker(ticker: string, request: BatchRequest): Promise<TickerOutcome> {
    try {
      const bars = await this.bars.getBars(ticker, request.range);
      if (bars.length === 0) {
        log.info(`${ticker}: no bars in range`);
        return { ticker, status: "empty" };
      }

      const frame = toPriceFrame(bars);
      const metrics = keyMetrics(ticker, frame);
      if (metrics === null) {
        return { ticker, status: "empty" };
      }

      const overlays = computeOverlays(frame, request.indicators, this.formula);
      const events = this.events
        ? await getStockEvents(this.events, ticker, request.range.start, request.range.end)
        : [];

      return { ticker, status: "ok", frame, overlays, metrics, events };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn(`${ticker}: analysis failed`, { error: reason });
      return { ticker, status: "failed", reason };
    }
  }
}
