/**
 * Input validation schemas shared by the adapter, the batch runner and the HTTP layer.
 */

import { z } from "zod";

/** Validate a stock ticker symbol (AAPL, BRK.B, RDS-A) */
export const TickerSchema = z
  .string()
  .min(1)
  .max(10)
  .regex(/^[A-Z][A-Z0-9.-]{0,9}$/, "Ticker must start with a letter and contain only A-Z, 0-9, '.' or '-'");

/** Accepts a Date, an ISO string or epoch milliseconds; null and booleans are rejected */
export const TimestampSchema = z
  .union([z.date(), z.string().min(1), z.number().finite()])
  .pipe(z.coerce.date());

const finitePrice = z.number().finite();

export const PriceBarSchema = z.object({
  timestamp: TimestampSchema,
  open: finitePrice,
  high: finitePrice,
  low: finitePrice,
  close: finitePrice,
  volume: z.number().finite().nonnegative(),
});

/** Bars must be strictly increasing by timestamp */
export const PriceBarsSchema = z.array(PriceBarSchema).superRefine((bars, ctx) => {
  for (let i = 1; i < bars.length; i++) {
    if (bars[i].timestamp.getTime() <= bars[i - 1].timestamp.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "timestamp"],
        message: `Bars must be in chronological order without duplicates (bar ${i} is not after bar ${i - 1})`,
      });
    }
  }
});

const windowSize = z.number().int().positive().max(5_000);

/** Indicator selection as submitted by a chart client */
export const IndicatorRequestSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("sma"), window: windowSize.default(20) }),
  z.object({ kind: z.literal("ema"), window: windowSize.default(20) }),
  z.object({ kind: z.literal("rsi"), window: windowSize.default(14) }),
  z.object({
    kind: z.literal("macd"),
    fast: windowSize.default(12),
    slow: windowSize.default(26),
    signal: windowSize.default(9),
  }),
  z.object({
    kind: z.literal("bollinger"),
    window: windowSize.default(20),
    multiplier: z.number().positive().finite().default(2),
  }),
  z.object({
    kind: z.literal("stochastic"),
    kWindow: windowSize.default(14),
    dWindow: windowSize.default(3),
  }),
  z.object({ kind: z.literal("atr"), window: windowSize.default(14) }),
  z.object({ kind: z.literal("vwap") }),
  z.object({ kind: z.literal("ichimoku") }),
  z.object({ kind: z.literal("formula"), formula: z.string().min(1) }),
]);

export type IndicatorRequest = z.infer<typeof IndicatorRequestSchema>;
export type IndicatorKind = IndicatorRequest["kind"];

/** Closed [start, end] window */
export const DateRangeSchema = z
  .object({
    start: TimestampSchema,
    end: TimestampSchema,
  })
  .refine((r) => r.start.getTime() <= r.end.getTime(), {
    message: "start must not be after end",
    path: ["start"],
  });

export const EarningsRecordSchema = z.object({
  date: TimestampSchema,
  actualEps: z.number().finite().nullish(),
  estimatedEps: z.number().finite().nullish(),
});

export const SplitRecordSchema = z.object({
  date: TimestampSchema,
  ratio: z.number().positive().finite(),
});

export const HoldingSchema = z.object({
  ticker: TickerSchema,
  quantity: z.number().positive().finite(),
});

export type Holding = z.infer<typeof HoldingSchema>;

/** Flatten zod issues into "path: message" lines */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
