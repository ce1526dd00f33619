/**
 * CSV export
 *
 * Serializes bars, overlays and metric tables with papaparse, and reads the
 * bar format back. Dates are written as ISO-8601; unavailable values as
 * empty fields.
 */

import Papa, { type UnparseConfig } from "papaparse";
import { frameToBars, parsePriceBars, SeriesValidationError } from "../series/frame.js";
import type { Overlay } from "../indicators/overlays.js";
import type { KeyMetrics } from "../metrics/key-metrics.js";
import type { PriceBar, PriceFrame, SeriesValue } from "../types/market.js";

export type CsvCell = string | number | null;

export const BAR_COLUMNS = ["Date", "Open", "High", "Low", "Close", "Volume"] as const;

const UNPARSE_CONFIG: UnparseConfig = { newline: "\n" };

/** Write rows under the given header; columns default to the first row's keys */
export function tableToCsv(
  rows: readonly Record<string, CsvCell>[],
  columns?: readonly string[]
): string {
  const fields = columns ? [...columns] : Object.keys(rows[0] ?? {});
  const data = rows.map((row) => fields.map((f) => row[f] ?? null));
  return Papa.unparse({ fields, data }, UNPARSE_CONFIG);
}

export function barsToCsv(frame: PriceFrame): string {
  const data = frameToBars(frame).map((bar) => [
    bar.timestamp.toISOString(),
    bar.open,
    bar.high,
    bar.low,
    bar.close,
    bar.volume,
  ]);
  return Papa.unparse({ fields: [...BAR_COLUMNS], data }, UNPARSE_CONFIG);
}

/**
 * One Date column plus one column per overlay series. Single-series overlays
 * use the overlay label as the header; multi-series ones append the series name.
 */
export function overlaysToCsv(frame: PriceFrame, overlays: readonly Overlay[]): string {
  const columns: { header: string; values: readonly SeriesValue[] }[] = [];
  for (const overlay of overlays) {
    const entries = Object.entries(overlay.series);
    for (const [name, series] of entries) {
      columns.push({
        header: entries.length === 1 ? overlay.label : `${overlay.label} ${name}`,
        values: series.values,
      });
    }
  }

  const data = frame.timestamps.map((t, i) => [
    t.toISOString(),
    ...columns.map((c) => c.values[i]),
  ]);
  return Papa.unparse({ fields: ["Date", ...columns.map((c) => c.header)], data }, UNPARSE_CONFIG);
}

export function keyMetricsToCsv(metrics: readonly KeyMetrics[]): string {
  return tableToCsv(
    metrics.map((m) => ({
      Ticker: m.ticker,
      "Current Close": m.currentClose,
      "% Change": m.pctChange === null ? null : Number(m.pctChange.toFixed(2)),
      High: m.high,
      Low: m.low,
    })),
    ["Ticker", "Current Close", "% Change", "High", "Low"]
  );
}

/**
 * Read bars written by barsToCsv.
 *
 * @throws SeriesValidationError on malformed CSV or bars
 */
export function parseBarsCsv(text: string): PriceBar[] {
  const parsed = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    dynamicTyping: true,
    skipEmptyLines: true,
  });

  if (parsed.errors.length > 0) {
    throw new SeriesValidationError(
      parsed.errors.map((e) => (e.row === undefined ? e.message : `row ${e.row}: ${e.message}`))
    );
  }

  return parsePriceBars(
    parsed.data.map((row) => ({
      timestamp: row.Date,
      open: row.Open,
      high: row.High,
      low: row.Low,
      close: row.Close,
      volume: row.Volume,
    }))
  );
}
