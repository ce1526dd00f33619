/**
 * HTTP request handlers.
 *
 * Plain functions from a parsed JSON body to a status + payload, so the route
 * logic can be exercised without a listening server. Payloads follow the
 * `{ success, data | error }` envelope.
 */

import { z } from "zod";
import { parsePriceBars, SeriesValidationError, toPriceFrame } from "../series/frame.js";
import { computeOverlays } from "../indicators/overlays.js";
import { tryEvaluateFormula, type FormulaOptions } from "../formula/evaluator.js";
import { filterEvents } from "../events/event-filter.js";
import { keyMetrics } from "../metrics/key-metrics.js";
import { barsToCsv } from "../export/csv.js";
import { moduleLogger } from "../utils/logger.js";
import {
  DateRangeSchema,
  EarningsRecordSchema,
  IndicatorRequestSchema,
  SplitRecordSchema,
  TickerSchema,
  formatIssues,
} from "../utils/validation.js";

const log = moduleLogger("api");

export type HandlerResult =
  | { status: number; contentType: "application/json"; body: ApiEnvelope }
  | { status: number; contentType: "text/csv"; body: string };

export type ApiEnvelope =
  | { success: true; data: unknown }
  | { success: false; error: string; issues?: string[] };

// ── Request schemas ────────────────────────────────────────

const BarsBody = z.object({ bars: z.array(z.unknown()) });

const OverlaysBody = BarsBody.extend({
  indicators: z.array(IndicatorRequestSchema).min(1).max(20),
});

const FormulaBody = BarsBody.extend({ formula: z.string() });

const EventsBody = z
  .object({
    earnings: z.array(EarningsRecordSchema).default([]),
    splits: z.array(SplitRecordSchema).default([]),
  })
  .and(DateRangeSchema);

const MetricsBody = BarsBody.extend({ ticker: TickerSchema });

// ── Helpers ────────────────────────────────────────────────

function ok(data: unknown): HandlerResult {
  return { status: 200, contentType: "application/json", body: { success: true, data } };
}

function fail(status: number, error: string, issues?: string[]): HandlerResult {
  return {
    status,
    contentType: "application/json",
    body: issues ? { success: false, error, issues } : { success: false, error },
  };
}

/**
 * Validate the body, run the handler and map known errors to 4xx.
 * Anything unexpected is logged and reported as 500.
 */
function handle<T>(
  route: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
  fn: (input: T) => HandlerResult
): HandlerResult {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return fail(400, "Invalid request body", formatIssues(parsed.error));
  }
  try {
    return fn(parsed.data);
  } catch (err) {
    if (err instanceof SeriesValidationError) {
      return fail(400, "Invalid bars", err.issues);
    }
    if (err instanceof RangeError) {
      return fail(400, err.message);
    }
    log.error(`${route} failed`, { error: String(err) });
    return fail(500, "Internal error");
  }
}

// ── Handlers ───────────────────────────────────────────────

export interface HandlerOptions {
  formula?: FormulaOptions;
}

export function createHandlers(options: HandlerOptions = {}) {
  const formulaOptions = options.formula ?? {};

  return {
    health(): HandlerResult {
      return ok({ status: "ok" });
    },

    /** POST /api/overlays — compute the requested indicator overlays */
    overlays(body: unknown): HandlerResult {
      return handle("overlays", OverlaysBody, body, ({ bars, indicators }) => {
        const frame = toPriceFrame(parsePriceBars(bars));
        return ok({ bars: frame.length, overlays: computeOverlays(frame, indicators, formulaOptions) });
      });
    },

    /** POST /api/formula — evaluate one user formula, explaining a rejection */
    formula(body: unknown): HandlerResult {
      return handle("formula", FormulaBody, body, ({ bars, formula }) => {
        const frame = toPriceFrame(parsePriceBars(bars));
        const outcome = tryEvaluateFormula(frame, formula, formulaOptions);
        return outcome.ok ? ok(outcome.series) : fail(422, outcome.reason);
      });
    },

    /** POST /api/events — filter corporate actions to a date window */
    events(body: unknown): HandlerResult {
      return handle("events", EventsBody, body, ({ earnings, splits, start, end }) =>
        ok(filterEvents({ earnings, splits }, start, end))
      );
    },

    /** POST /api/metrics — key metrics for one ticker's bars */
    metrics(body: unknown): HandlerResult {
      return handle("metrics", MetricsBody, body, ({ ticker, bars }) =>
        ok(keyMetrics(ticker, toPriceFrame(parsePriceBars(bars))))
      );
    },

    /** POST /api/export/bars — bars as CSV */
    exportBars(body: unknown): HandlerResult {
      return handle("export", BarsBody, body, ({ bars }) => ({
        status: 200,
        contentType: "text/csv",
        body: barsToCsv(toPriceFrame(parsePriceBars(bars))),
      }));
    },
  };
}

export type Handlers = ReturnType<typeof createHandlers>;
