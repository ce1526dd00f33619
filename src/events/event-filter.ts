/**
 * Event Range Filter
 *
 * Selects earnings and split records inside a closed [start, end] window and
 * labels them for chart annotation. The upstream source is best-effort: a
 * failure or an empty answer means no events, never an error.
 */

import { format, isValid } from "date-fns";
import { moduleLogger } from "../utils/logger.js";
import type { CorporateActionSource } from "../providers/types.js";
import type {
  CorporateEvent,
  EarningsRecord,
  SplitRecord,
} from "../types/events.js";

const log = moduleLogger("events");

export interface CorporateActionRecords {
  earnings?: readonly EarningsRecord[];
  splits?: readonly SplitRecord[];
}

function formatEps(value: number | null | undefined): string {
  return value === null || value === undefined ? "n/a" : value.toFixed(2);
}

/** Trim float noise from a ratio: 0.3333333 → 3 in "1:3" */
function formatRatioPart(value: number): string {
  return String(Number(value.toFixed(4)));
}

export function describeEarnings(record: EarningsRecord): string {
  return `EPS ${formatEps(record.actualEps)} vs est. ${formatEps(record.estimatedEps)}`;
}

/** 4 → "Split 4:1", 0.5 → "Split 1:2" */
export function describeSplit(record: SplitRecord): string {
  const ratio =
    record.ratio >= 1
      ? `${formatRatioPart(record.ratio)}:1`
      : `1:${formatRatioPart(1 / record.ratio)}`;
  return `Split ${ratio}`;
}

function formatDay(date: Date): string {
  return isValid(date) ? format(date, "yyyy-MM-dd") : "an invalid date";
}

function inWindow(date: Date, start: Date, end: Date): boolean {
  const t = date.getTime();
  return t >= start.getTime() && t <= end.getTime();
}

/**
 * Keep the records dated inside [start, end] (both ends inclusive).
 * Order is earnings then splits, each in input order; callers sort if needed.
 */
export function filterEvents(
  records: CorporateActionRecords,
  start: Date,
  end: Date
): CorporateEvent[] {
  const events: CorporateEvent[] = [];

  for (const record of records.earnings ?? []) {
    if (inWindow(record.date, start, end)) {
      events.push({ date: record.date, kind: "Earnings", description: describeEarnings(record) });
    }
  }

  for (const record of records.splits ?? []) {
    if (inWindow(record.date, start, end)) {
      events.push({ date: record.date, kind: "Split", description: describeSplit(record) });
    }
  }

  return events;
}

/**
 * Fetch corporate actions for a ticker and filter them to the window.
 * Earnings and splits are fetched independently so one failing leaves the other.
 */
export async function getStockEvents(
  source: CorporateActionSource,
  ticker: string,
  start: Date,
  end: Date
): Promise<CorporateEvent[]> {
  const [earnings, splits] = await Promise.allSettled([
    Promise.resolve().then(() => source.getEarnings(ticker)),
    Promise.resolve().then(() => source.getSplits(ticker)),
  ]);

  if (earnings.status === "rejected") {
    log.warn(`Earnings unavailable for ${ticker}`, { error: String(earnings.reason) });
  }
  if (splits.status === "rejected") {
    log.warn(`Splits unavailable for ${ticker}`, { error: String(splits.reason) });
  }

  const events = filterEvents(
    {
      earnings: earnings.status === "fulfilled" ? earnings.value : [],
      splits: splits.status === "fulfilled" ? splits.value : [],
    },
    start,
    end
  );

  if (log.isDebugEnabled()) {
    log.debug(`${ticker}: ${events.length} event(s) between ${formatDay(start)} and ${formatDay(end)}`);
  }
  return events;
}
